import { describe, it, expect } from "vitest";
import {
  OpenTelemetryObservability,
  type OTelCounter,
  type OTelHistogram,
  type OTelMeter,
  type OTelSpan,
  type OTelTracer,
} from "./otel.js";
import { CommunityError } from "../core/errors.js";

type Attributes = Record<string, string | number | boolean>;

class FakeSpan implements OTelSpan {
  readonly attributes = new Map<string, string | number | boolean>();
  readonly statuses: Array<{ code: number; message?: string }> = [];
  readonly exceptions: Error[] = [];
  readonly events: Array<[string, Attributes | undefined]> = [];
  ended = 0;

  setAttribute(key: string, value: string | number | boolean): this {
    this.attributes.set(key, value);
    return this;
  }

  setStatus(status: { code: number; message?: string }): this {
    this.statuses.push(status);
    return this;
  }

  recordException(exception: Error): void {
    this.exceptions.push(exception);
  }

  addEvent(name: string, attributes?: Attributes): this {
    this.events.push([name, attributes]);
    return this;
  }

  end(): void {
    this.ended++;
  }
}

class FakeTracer implements OTelTracer {
  readonly span = new FakeSpan();
  readonly started: Array<[string, { attributes?: Attributes } | undefined]> = [];

  startSpan(name: string, options?: { attributes?: Attributes }): OTelSpan {
    this.started.push([name, options]);
    return this.span;
  }
}

class FakeInstrument implements OTelCounter, OTelHistogram {
  readonly calls: Array<[number, Record<string, string> | undefined]> = [];

  add(value: number, attributes?: Record<string, string>): void {
    this.calls.push([value, attributes]);
  }

  record(value: number, attributes?: Record<string, string>): void {
    this.calls.push([value, attributes]);
  }
}

class FakeMeter implements OTelMeter {
  readonly instruments = new Map<string, FakeInstrument>();

  createCounter(name: string): OTelCounter {
    return this.create(name);
  }

  createHistogram(name: string): OTelHistogram {
    return this.create(name);
  }

  calls(name: string): Array<[number, Record<string, string> | undefined]> {
    return this.instruments.get(name)?.calls ?? [];
  }

  private create(name: string): FakeInstrument {
    const instrument = new FakeInstrument();
    this.instruments.set(name, instrument);
    return instrument;
  }
}

function createOTel() {
  const tracer = new FakeTracer();
  const meter = new FakeMeter();
  return { observability: new OpenTelemetryObservability({ tracer, meter }), tracer, meter, span: tracer.span };
}

const REQUEST = {
  endpoint: "https://community.example.com/api/2.0/boards",
  method: "GET",
  requestId: "req-1",
  timestamp: new Date(0),
  headers: {},
  bodyKind: "none",
} as const;

describe("OpenTelemetryObservability", () => {
  it("opens a span per request and closes it on the response", () => {
    const { observability, tracer, meter, span } = createOTel();

    observability.logRequest({ ...REQUEST, headers: {} });
    observability.logResponse({ ...REQUEST, statusCode: 200, attempts: 1, duration: 12 });

    expect(tracer.started).toEqual([
      [
        "community.GET",
        {
          attributes: {
            "http.method": "GET",
            "http.url": REQUEST.endpoint,
            "community.request_id": "req-1",
            "community.body_kind": "none",
          },
        },
      ],
    ]);
    expect(span.attributes.get("http.status_code")).toBe(200);
    expect(span.statuses).toEqual([{ code: 1 }]);
    expect(span.ended).toBe(1);
    expect(meter.calls("community_client.requests")).toEqual([[1, { method: "GET" }]]);
    expect(meter.calls("community_client.duration")).toEqual([[12, { method: "GET", status: "200" }]]);
  });

  it("marks the span as failed on an error", () => {
    const { observability, meter, span } = createOTel();
    const error = new CommunityError("boom", { category: "connection" });

    observability.logRequest({ ...REQUEST, headers: {} });
    observability.logError({ ...REQUEST, error, duration: 30 });

    expect(span.statuses).toEqual([{ code: 2, message: "boom" }]);
    expect(span.exceptions).toEqual([error]);
    expect(meter.calls("community_client.errors")).toEqual([[1, { method: "GET", category: "connection" }]]);
  });

  it("adds warnings to the active span", () => {
    const { observability, meter, span } = createOTel();

    observability.logRequest({ ...REQUEST, headers: {} });
    observability.logWarning("retrying", { requestId: "req-1", kind: "failed_attempt" });

    expect(span.events).toEqual([["warning", { message: "retrying" }]]);
    expect(meter.calls("community_client.warnings")).toEqual([[1, { kind: "failed_attempt" }]]);
  });

  it("forwards dispatcher metrics by name", () => {
    const { observability, meter } = createOTel();
    const timestamp = new Date(0);

    observability.recordMetric({ name: "community.request.count", value: 1, tags: { method: "GET" }, timestamp });
    observability.recordMetric({ name: "community.request.duration", value: 8, tags: { method: "GET" }, timestamp });

    expect(meter.calls("community.request.count")).toEqual([[1, { method: "GET" }]]);
    expect(meter.calls("community.request.duration")).toEqual([[8, { method: "GET" }]]);
  });
});
