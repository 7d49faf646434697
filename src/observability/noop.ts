/**
 * Silent and in-memory observability adapters
 */

import type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "../core/types.js";

export class NoOpObservability implements ObservabilityAdapter {
  logRequest(_context: RequestContext): void {}

  logResponse(_context: ResponseContext): void {}

  logError(_context: ErrorContext): void {}

  logWarning(_message: string, _metadata?: Record<string, unknown>): void {}

  recordMetric(_metric: Metric): void {}
}

export interface RecordedWarning {
  message: string;
  metadata: Record<string, unknown> | undefined;
}

/**
 * Keeps every event in memory. Useful for assertions and for callers that
 * forward events to their own logger in batches.
 */
export class MemoryObservability implements ObservabilityAdapter {
  readonly requests: RequestContext[] = [];
  readonly responses: ResponseContext[] = [];
  readonly errors: ErrorContext[] = [];
  readonly warnings: RecordedWarning[] = [];
  readonly metrics: Metric[] = [];

  logRequest(context: RequestContext): void {
    this.requests.push(context);
  }

  logResponse(context: ResponseContext): void {
    this.responses.push(context);
  }

  logError(context: ErrorContext): void {
    this.errors.push(context);
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    this.warnings.push({ message, metadata });
  }

  recordMetric(metric: Metric): void {
    this.metrics.push(metric);
  }

  clear(): void {
    this.requests.length = 0;
    this.responses.length = 0;
    this.errors.length = 0;
    this.warnings.length = 0;
    this.metrics.length = 0;
  }
}
