/**
 * Retry logic with exponential backoff and idempotency awareness
 *
 * An attempt is repeated only when BOTH hold:
 *   1. The error is explicitly marked as retryable
 *   2. The operation's idempotency level allows replay (anything but UNSAFE)
 *
 * `maxRetries` is the total number of attempts, so a transport that always
 * fails is called exactly `maxRetries` times.
 */

import type { FailedAttempt, RetryConfig } from "../core/types.js";
import { IdempotencyLevel } from "../core/types.js";

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelay: 250,
  maxDelay: 5000,
  jitter: true,
};

/**
 * Raised when every permitted attempt failed with a retryable error.
 */
export class RetryExhaustedError extends Error {
  readonly failures: FailedAttempt[];
  readonly lastError: unknown;

  constructor(failures: FailedAttempt[], lastError: unknown) {
    super(`Gave up after ${failures.length} attempt${failures.length === 1 ? "" : "s"}`);
    this.name = "RetryExhaustedError";
    this.failures = failures;
    this.lastError = lastError;
  }
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

export type FailedAttemptListener = (failure: FailedAttempt, maxAttempts: number) => void;

export class RetryStrategy {
  private config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = {
      maxRetries: config.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
      baseDelay: config.baseDelay ?? DEFAULT_RETRY_CONFIG.baseDelay,
      maxDelay: config.maxDelay ?? DEFAULT_RETRY_CONFIG.maxDelay,
      jitter: config.jitter ?? DEFAULT_RETRY_CONFIG.jitter,
    };
  }

  get maxAttempts(): number {
    return Math.max(1, this.config.maxRetries);
  }

  async execute<T>(
    fn: (attempt: number) => Promise<T>,
    idempotencyLevel: IdempotencyLevel,
    onFailedAttempt?: FailedAttemptListener
  ): Promise<RetryOutcome<T>> {
    const maxAttempts = idempotencyLevel === IdempotencyLevel.UNSAFE ? 1 : this.maxAttempts;
    const failures: FailedAttempt[] = [];

    for (let attempt = 1; ; attempt++) {
      try {
        const value = await fn(attempt);
        return { value, attempts: attempt };
      } catch (error) {
        // Errors without an explicit retryable flag propagate untouched
        if (!this.isExplicitlyRetryable(error)) {
          throw error;
        }

        const failure = this.describeFailure(error, attempt);
        failures.push(failure);
        onFailedAttempt?.(failure, maxAttempts);

        if (attempt >= maxAttempts) {
          throw new RetryExhaustedError(failures, error);
        }

        await this.sleep(this.calculateDelay(attempt - 1, this.retryAfterOf(error)));
      }
    }
  }

  /**
   * Checks if error is EXPLICITLY marked as retryable.
   */
  private isExplicitlyRetryable(error: unknown): boolean {
    if (error && typeof error === "object" && "retryable" in error) {
      return error.retryable === true;
    }
    return false;
  }

  private describeFailure(error: unknown, attempt: number): FailedAttempt {
    const failure: FailedAttempt = {
      attempt,
      errorType: "UnknownError",
      message: String(error),
    };
    if (error instanceof Error) {
      failure.message = error.message;
      failure.errorType = "errorType" in error && typeof error.errorType === "string"
        ? error.errorType
        : error.name;
    }
    if (error && typeof error === "object" && "response" in error) {
      const response = error.response;
      if (response && typeof response === "object" && "status" in response && typeof response.status === "number") {
        failure.status = response.status;
      }
    }
    return failure;
  }

  private retryAfterOf(error: unknown): Date | undefined {
    if (error && typeof error === "object" && "retryAfter" in error && error.retryAfter instanceof Date) {
      return error.retryAfter;
    }
    return undefined;
  }

  calculateDelay(retryIndex: number, retryAfter?: Date): number {
    if (retryAfter) {
      return Math.min(Math.max(0, retryAfter.getTime() - Date.now()), this.config.maxDelay);
    }

    // Exponential backoff: baseDelay * 2^retryIndex
    let delay = this.config.baseDelay * Math.pow(2, retryIndex);

    if (this.config.jitter) {
      delay += Math.random() * this.config.baseDelay;
    }

    // Cap at maxDelay
    return Math.min(delay, this.config.maxDelay);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
