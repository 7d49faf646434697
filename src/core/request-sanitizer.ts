import type { HeaderMap } from "./types.js";
import { toFetchHeaders } from "./headers.js";

export interface SanitizerOptions {
  redactedKeys?: string[];
}

export const DEFAULT_REDACTED_KEYS = [
  "authorization",
  "session-key",
  "cookie",
  "token",
  "password",
  "apikey",
  "api_key",
  "secret",
];

const REDACTED = "[REDACTED]";

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[-_.]/g, "");
}

/**
 * Replaces credential-bearing header values before they reach a log line.
 */
export function sanitizeHeaders(headers: HeaderMap, opts?: SanitizerOptions): Record<string, string> {
  const redacted = (opts?.redactedKeys ?? DEFAULT_REDACTED_KEYS).map(normalizeKey);
  const sanitized: Record<string, string> = {};

  for (const [key, value] of Object.entries(toFetchHeaders(headers))) {
    const lower = normalizeKey(key);
    sanitized[key] = redacted.some((r) => lower.includes(r)) ? REDACTED : value;
  }

  return sanitized;
}

/**
 * Strips credential query parameters (e.g. a login call's `user.password`) from a URL.
 */
export function sanitizeUrl(url: string, opts?: SanitizerOptions): string {
  const queryStart = url.indexOf("?");
  if (queryStart === -1) {
    return url;
  }

  const redacted = (opts?.redactedKeys ?? DEFAULT_REDACTED_KEYS).map(normalizeKey);
  const params = new URLSearchParams(url.slice(queryStart + 1));
  for (const key of [...params.keys()]) {
    if (redacted.some((r) => normalizeKey(key).includes(r))) {
      params.set(key, REDACTED);
    }
  }
  return `${url.slice(0, queryStart)}?${params.toString()}`;
}
