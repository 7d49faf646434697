import { describe, it, expect, vi, afterEach } from "vitest";
import { ConsoleObservability, type LogLevel } from "./console.js";
import { GETRequestError } from "../core/errors.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function capture() {
  const lines: Array<[LogLevel, string]> = [];
  const sink = (level: LogLevel, line: string) => {
    lines.push([level, line]);
  };
  return { lines, sink };
}

const REQUEST = {
  endpoint: "https://community.example.com/api/2.0/boards",
  method: "GET",
  requestId: "req-1",
  timestamp: new Date(0),
} as const;

describe("ConsoleObservability", () => {
  it("writes one JSON line per request", () => {
    const { lines, sink } = capture();

    new ConsoleObservability({ sink }).logRequest({
      ...REQUEST,
      headers: { "li-api-session-key": "[REDACTED]" },
      bodyKind: "none",
    });

    expect(lines).toEqual([
      [
        "debug",
        '{"level":"debug","event":"request","service":"community-api-client","time":"1970-01-01T00:00:00.000Z","requestId":"req-1","method":"GET","endpoint":"https://community.example.com/api/2.0/boards","headers":{"li-api-session-key":"[REDACTED]"},"body":"none"}',
      ],
    ]);
  });

  it("adds status and attempts for request errors", () => {
    const { lines, sink } = capture();
    const error = new GETRequestError({ statusCode: 404, attempts: 1, apiMessage: "Not found" });

    new ConsoleObservability({ sink, service: "sync-job" }).logError({ ...REQUEST, error, duration: 5 });

    const [entry] = lines;
    expect(entry?.[0]).toBe("error");
    expect(JSON.parse(entry?.[1] ?? "{}")).toEqual({
      level: "error",
      event: "error",
      service: "sync-job",
      time: "1970-01-01T00:00:00.000Z",
      requestId: "req-1",
      method: "GET",
      endpoint: REQUEST.endpoint,
      durationMs: 5,
      error: {
        name: "GETRequestError",
        category: "request",
        message: "The GET request returned the 404 status code with the following message: Not found",
        statusCode: 404,
        attempts: 1,
      },
    });
  });

  it("skips entries below the configured level", () => {
    const { lines, sink } = capture();
    const observability = new ConsoleObservability({ sink, level: "warn" });

    observability.recordMetric({ name: "community.request.count", value: 1, tags: {}, timestamp: new Date(0) });
    observability.logResponse({ ...REQUEST, statusCode: 200, attempts: 1, duration: 3 });
    observability.logWarning("slow down", { kind: "failed_attempt" });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.[0]).toBe("warn");
  });

  it("routes warnings to console.warn by default", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    new ConsoleObservability().logWarning("slow down");

    expect(warn).toHaveBeenCalledTimes(1);
    const [line] = warn.mock.calls[0] ?? [];
    expect(typeof line === "string" ? JSON.parse(line) : undefined).toMatchObject({
      level: "warn",
      event: "warning",
      message: "slow down",
    });
  });
});
