/**
 * OpenTelemetry observability adapter
 *
 * Pass in tracer and meter instances from your own OTel SDK setup:
 * ```typescript
 * import { trace, metrics } from "@opentelemetry/api";
 *
 * const client = await CommunityClient.create({
 *   communityUrl: "https://community.example.com",
 *   auth: { type: "oauth2", accessToken: "..." },
 *   observability: new OpenTelemetryObservability({
 *     tracer: trace.getTracer("community-api-client"),
 *     meter: metrics.getMeter("community-api-client"),
 *   }),
 * });
 * ```
 *
 * Only the structural subset below is required, so the adapter does not pull
 * in @opentelemetry/api itself.
 */

import type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "../core/types.js";

export interface OTelTracer {
  startSpan(name: string, options?: { attributes?: Record<string, string | number | boolean> }): OTelSpan;
}

export interface OTelSpan {
  setAttribute(key: string, value: string | number | boolean): this;
  setStatus(status: { code: number; message?: string }): this;
  recordException(exception: Error): void;
  addEvent?(name: string, attributes?: Record<string, string | number | boolean>): this;
  end(): void;
}

export interface OTelMeter {
  createCounter(name: string, options?: { description?: string }): OTelCounter;
  createHistogram(name: string, options?: { description?: string; unit?: string }): OTelHistogram;
}

export interface OTelCounter {
  add(value: number, attributes?: Record<string, string>): void;
}

export interface OTelHistogram {
  record(value: number, attributes?: Record<string, string>): void;
}

export interface OpenTelemetryConfig {
  tracer: OTelTracer;
  meter: OTelMeter;
  /** Prefix for metric names (default: "community_client") */
  metricPrefix?: string;
}

// Span status codes as defined by OpenTelemetry
const SpanStatusCode = {
  UNSET: 0,
  OK: 1,
  ERROR: 2,
} as const;

export class OpenTelemetryObservability implements ObservabilityAdapter {
  private tracer: OTelTracer;
  private meter: OTelMeter;
  private requestCounter: OTelCounter;
  private errorCounter: OTelCounter;
  private warningCounter: OTelCounter;
  private durationHistogram: OTelHistogram;
  private activeSpans: Map<string, OTelSpan> = new Map();
  private forwardedCounters: Map<string, OTelCounter> = new Map();
  private forwardedHistograms: Map<string, OTelHistogram> = new Map();

  constructor(config: OpenTelemetryConfig) {
    this.tracer = config.tracer;
    this.meter = config.meter;
    const prefix = config.metricPrefix ?? "community_client";

    this.requestCounter = config.meter.createCounter(`${prefix}.requests`, {
      description: "Community API requests dispatched",
    });
    this.errorCounter = config.meter.createCounter(`${prefix}.errors`, {
      description: "Community API requests that ended in an error",
    });
    this.warningCounter = config.meter.createCounter(`${prefix}.warnings`, {
      description: "Failed attempts and decode warnings",
    });
    this.durationHistogram = config.meter.createHistogram(`${prefix}.duration`, {
      description: "Request duration including retries",
      unit: "ms",
    });
  }

  logRequest(context: RequestContext): void {
    const span = this.tracer.startSpan(`community.${context.method}`, {
      attributes: {
        "http.method": context.method,
        "http.url": context.endpoint,
        "community.request_id": context.requestId,
        "community.body_kind": context.bodyKind,
      },
    });
    this.activeSpans.set(context.requestId, span);

    this.requestCounter.add(1, { method: context.method });
  }

  logResponse(context: ResponseContext): void {
    const span = this.activeSpans.get(context.requestId);
    if (span) {
      span.setAttribute("http.status_code", context.statusCode);
      span.setAttribute("community.attempts", context.attempts);
      span.setAttribute("community.duration_ms", context.duration);
      span.setStatus({ code: context.statusCode < 400 ? SpanStatusCode.OK : SpanStatusCode.UNSET });
      span.end();
      this.activeSpans.delete(context.requestId);
    }

    this.durationHistogram.record(context.duration, {
      method: context.method,
      status: String(context.statusCode),
    });
  }

  logError(context: ErrorContext): void {
    const span = this.activeSpans.get(context.requestId);
    if (span) {
      span.setAttribute("community.error.category", context.error.category);
      span.setAttribute("community.duration_ms", context.duration);
      span.setStatus({ code: SpanStatusCode.ERROR, message: context.error.message });
      span.recordException(context.error);
      span.end();
      this.activeSpans.delete(context.requestId);
    }

    this.errorCounter.add(1, { method: context.method, category: context.error.category });
    this.durationHistogram.record(context.duration, {
      method: context.method,
      status: "error",
      category: context.error.category,
    });
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    const requestId = metadata?.requestId;
    const kind = metadata?.kind;
    const span = typeof requestId === "string" ? this.activeSpans.get(requestId) : undefined;
    span?.addEvent?.("warning", { message });

    this.warningCounter.add(1, { kind: typeof kind === "string" ? kind : "general" });
  }

  /**
   * Forwards dispatcher metrics under their own names. Names ending in
   * `.duration` become histograms, everything else a counter.
   */
  recordMetric(metric: Metric): void {
    if (metric.name.endsWith(".duration")) {
      let histogram = this.forwardedHistograms.get(metric.name);
      if (!histogram) {
        histogram = this.meter.createHistogram(metric.name, { unit: "ms" });
        this.forwardedHistograms.set(metric.name, histogram);
      }
      histogram.record(metric.value, metric.tags);
      return;
    }

    let counter = this.forwardedCounters.get(metric.name);
    if (!counter) {
      counter = this.meter.createCounter(metric.name);
      this.forwardedCounters.set(metric.name, counter);
    }
    counter.add(metric.value, metric.tags);
  }
}
