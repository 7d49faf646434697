/**
 * Client configuration
 */

import { z } from "zod";
import type { IdempotencyConfig, ObservabilityAdapter, RetryConfig } from "../core/types.js";
import type { FetchLike } from "../core/dispatcher.js";
import type { SanitizerOptions } from "../core/request-sanitizer.js";
import { InvalidConfigurationError } from "../core/errors.js";
import { normalizeBaseUrl } from "../core/urls.js";

export const DEFAULT_V1_BASE_PATH = "/restapi/vc";
export const DEFAULT_TIMEOUT = 30000;

/**
 * How the client authenticates. `session-login` exchanges a username and
 * password for a session key when the client is created.
 */
export type AuthSettings =
  | { type: "session-key"; sessionKey: string }
  | { type: "session-login"; username: string; password: string }
  | { type: "oauth2"; accessToken: string }
  | { type: "sso"; ssoToken: string };

export type AuthSettingsType = AuthSettings["type"];

export interface CommunityClientConfig {
  communityUrl: string;
  tenantId?: string;
  auth: AuthSettings;
  /** Ask v1 endpoints for JSON instead of XML (default: true) */
  preferJson?: boolean;
  /** Replace known error signatures with readable text (default: true) */
  translateErrors?: boolean;
  /** Path of the v1 REST API below the community URL (default: "/restapi/vc") */
  v1BasePath?: string;
  retry?: Partial<RetryConfig>;
  idempotency?: Partial<IdempotencyConfig>;
  /** Per-attempt timeout in ms (default: 30000) */
  timeout?: number;
  observability?: ObservabilityAdapter | ObservabilityAdapter[];
  sanitizer?: SanitizerOptions;
  /** Extra error signature translations, merged over the built-in table */
  errorTranslations?: Record<string, string>;
  fetch?: FetchLike;
}

const nonEmpty = (field: string) => z.string().trim().min(1, `${field} must not be empty`);

const authSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("session-key"), sessionKey: nonEmpty("sessionKey") }),
  z.object({
    type: z.literal("session-login"),
    username: nonEmpty("username"),
    password: nonEmpty("password"),
  }),
  z.object({ type: z.literal("oauth2"), accessToken: nonEmpty("accessToken") }),
  z.object({ type: z.literal("sso"), ssoToken: nonEmpty("ssoToken") }),
]);

const configSchema = z.object({
  communityUrl: nonEmpty("communityUrl"),
  tenantId: z.string().optional(),
  auth: authSchema,
  preferJson: z.boolean().optional(),
  translateErrors: z.boolean().optional(),
  v1BasePath: z.string().startsWith("/", "v1BasePath must start with '/'").optional(),
  retry: z
    .object({
      maxRetries: z.number().int().min(1, "maxRetries must be at least 1").optional(),
      baseDelay: z.number().nonnegative("baseDelay must be non-negative").optional(),
      maxDelay: z.number().nonnegative("maxDelay must be non-negative").optional(),
      jitter: z.boolean().optional(),
    })
    .optional(),
  timeout: z.number().positive("timeout must be positive").optional(),
  errorTranslations: z.record(z.string()).optional(),
});

/**
 * Validates a client configuration and reports every problem at once.
 *
 * @throws {InvalidConfigurationError} listing each issue as `path: message`
 */
export function validateConfig(config: CommunityClientConfig): void {
  const issues: string[] = [];

  const result = configSchema.safeParse(config);
  if (!result.success) {
    issues.push(...result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }

  if (typeof config.communityUrl === "string" && config.communityUrl.trim() !== "") {
    try {
      normalizeBaseUrl(config.communityUrl);
    } catch (error) {
      issues.push(`communityUrl: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }
}
