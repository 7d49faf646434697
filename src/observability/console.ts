/**
 * JSON-lines logging to the console
 *
 * Every event becomes one JSON object. Request headers arrive already
 * sanitized by the dispatcher.
 */

import type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "../core/types.js";
import { RequestError } from "../core/errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogSink = (level: LogLevel, line: string) => void;

export interface ConsoleObservabilityConfig {
  pretty?: boolean;
  /** Lowest level written (default: "debug") */
  level?: LogLevel;
  /** Name stamped on every entry (default: "community-api-client") */
  service?: string;
  sink?: LogSink;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = { debug: 0, info: 1, warn: 2, error: 3 };

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export class ConsoleObservability implements ObservabilityAdapter {
  private pretty: boolean;
  private threshold: number;
  private service: string;
  private sink: LogSink;

  constructor(config: ConsoleObservabilityConfig = {}) {
    this.pretty = config.pretty ?? false;
    this.threshold = LEVEL_ORDER[config.level ?? "debug"];
    this.service = config.service ?? "community-api-client";
    this.sink = config.sink ?? consoleSink;
  }

  logRequest(context: RequestContext): void {
    this.write("debug", "request", {
      requestId: context.requestId,
      method: context.method,
      endpoint: context.endpoint,
      headers: context.headers,
      body: context.bodyKind,
    }, context.timestamp);
  }

  logResponse(context: ResponseContext): void {
    this.write("info", "response", {
      requestId: context.requestId,
      method: context.method,
      endpoint: context.endpoint,
      statusCode: context.statusCode,
      attempts: context.attempts,
      durationMs: context.duration,
    }, context.timestamp);
  }

  logError(context: ErrorContext): void {
    const { error } = context;
    this.write("error", "error", {
      requestId: context.requestId,
      method: context.method,
      endpoint: context.endpoint,
      durationMs: context.duration,
      error: {
        name: error.name,
        category: error.category,
        message: error.message,
        ...(error instanceof RequestError ? { statusCode: error.statusCode, attempts: error.attempts } : {}),
      },
    }, context.timestamp);
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    this.write("warn", "warning", { message, ...(metadata ? { metadata } : {}) });
  }

  recordMetric(metric: Metric): void {
    this.write("debug", "metric", { name: metric.name, value: metric.value, tags: metric.tags }, metric.timestamp);
  }

  private write(level: LogLevel, event: string, fields: Record<string, unknown>, at: Date = new Date()): void {
    if (LEVEL_ORDER[level] < this.threshold) return;
    const entry = { level, event, service: this.service, time: at.toISOString(), ...fields };
    this.sink(level, this.pretty ? JSON.stringify(entry, null, 2) : JSON.stringify(entry));
  }
}
