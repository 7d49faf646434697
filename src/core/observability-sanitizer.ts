import type { Metric } from "./types.js";
import { DEFAULT_REDACTED_KEYS } from "./request-sanitizer.js";

export interface ObservabilitySanitizerOptions {
  redactedKeys?: string[];
}

function shouldRedact(key: string, redacted: string[]): boolean {
  const lower = key.toLowerCase();
  return redacted.some((r) => lower.includes(r));
}

export function sanitizeObject(obj: unknown, opts?: ObservabilitySanitizerOptions): unknown {
  const redacted = (opts?.redactedKeys ?? DEFAULT_REDACTED_KEYS).map((s) => s.toLowerCase());

  if (obj === null || typeof obj !== "object") return obj;

  if (Array.isArray(obj)) {
    return obj.map((v) => sanitizeObject(v, opts));
  }

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (shouldRedact(k, redacted)) {
      out[k] = "[REDACTED]";
    } else if (v && typeof v === "object") {
      out[k] = sanitizeObject(v, opts);
    } else {
      out[k] = v;
    }
  }
  return out;
}

/**
 * Sanitizes warning metadata, keeping the record shape.
 */
export function sanitizeMetadata(
  metadata: Record<string, unknown>,
  opts?: ObservabilitySanitizerOptions
): Record<string, unknown> {
  const redacted = (opts?.redactedKeys ?? DEFAULT_REDACTED_KEYS).map((s) => s.toLowerCase());
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(metadata)) {
    out[k] = shouldRedact(k, redacted) ? "[REDACTED]" : sanitizeObject(v, opts);
  }
  return out;
}

export function sanitizeMetric(metric: Metric, opts?: ObservabilitySanitizerOptions): Metric {
  const redacted = (opts?.redactedKeys ?? DEFAULT_REDACTED_KEYS).map((s) => s.toLowerCase());
  const tags: Record<string, string> = {};
  for (const [k, v] of Object.entries(metric.tags)) {
    tags[k] = shouldRedact(k, redacted) || shouldRedact(v, redacted) ? "[REDACTED]" : v;
  }
  return { ...metric, tags };
}
