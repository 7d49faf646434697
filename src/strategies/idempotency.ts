/**
 * Idempotency level resolver
 */

import {
  IdempotencyLevel,
  type HttpMethod,
  type IdempotencyConfig,
} from "../core/types.js";

/**
 * GET, POST and PUT share one retry discipline. DELETE runs once.
 * Create endpoints reject a second object with an existing id, so a
 * replayed POST fails instead of duplicating.
 */
export const DEFAULT_IDEMPOTENCY_LEVELS: ReadonlyMap<HttpMethod, IdempotencyLevel> = new Map([
  ["GET", IdempotencyLevel.SAFE],
  ["POST", IdempotencyLevel.IDEMPOTENT],
  ["PUT", IdempotencyLevel.IDEMPOTENT],
  ["DELETE", IdempotencyLevel.UNSAFE],
]);

export class IdempotencyResolver {
  private config: IdempotencyConfig;

  constructor(config: Partial<IdempotencyConfig> = {}) {
    this.config = {
      defaultLevels: config.defaultLevels ?? new Map(DEFAULT_IDEMPOTENCY_LEVELS),
      operationOverrides: config.operationOverrides ?? new Map(),
    };
  }

  getIdempotencyLevel(method: HttpMethod, endpoint: string): IdempotencyLevel {
    // Check for operation-specific override
    const override = this.findOverride(`${method} ${this.pathOf(endpoint)}`);
    if (override !== null) {
      return override;
    }

    return this.config.defaultLevels.get(method) ?? IdempotencyLevel.UNSAFE;
  }

  isRetryable(level: IdempotencyLevel): boolean {
    return level !== IdempotencyLevel.UNSAFE;
  }

  private findOverride(operationKey: string): IdempotencyLevel | null {
    const exact = this.config.operationOverrides.get(operationKey);
    if (exact !== undefined) {
      return exact;
    }

    // Pattern matching (e.g., "POST /messages/:id/tags")
    for (const [pattern, level] of this.config.operationOverrides.entries()) {
      if (this.matchesPattern(pattern, operationKey)) {
        return level;
      }
    }

    return null;
  }

  private matchesPattern(pattern: string, operationKey: string): boolean {
    const escaped = pattern
      .split(/:[\w-]+/)
      .map((literal) => literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"))
      .join("[^/]+");
    return new RegExp(`^${escaped}$`).test(operationKey);
  }

  /**
   * Path portion of an absolute or relative endpoint, without the query.
   */
  private pathOf(endpoint: string): string {
    const withoutQuery = endpoint.split("?")[0] ?? endpoint;
    const match = /^https?:\/\/[^/]+(\/.*)?$/i.exec(withoutQuery);
    return match ? match[1] ?? "/" : withoutQuery;
  }
}
