/**
 * Request header construction
 */

import type { HeaderMap, HeaderValue, SessionContext } from "./types.js";

/**
 * Keys whose values carry credentials. Their values are never case-folded.
 */
export const AUTH_HEADER_KEYS: ReadonlySet<string> = new Set([
  "authorization",
  "li-api-session-key",
]);

export interface HeaderOptions {
  /** Caller-supplied headers, overlaid case-insensitively on the defaults */
  headers?: HeaderMap;
  /** Drops content-type so the transport can write the multipart boundary */
  multipart?: boolean;
  /** Overrides the default application/json; null omits the header */
  contentType?: string | null;
}

/**
 * Returns the credential header for a session as a `[name, value]` pair.
 */
export function authHeaderFor(
  context: Pick<SessionContext, "authType" | "token">
): [string, string] {
  if (context.authType === "oauth2") {
    return ["authorization", `Bearer ${context.token}`];
  }
  return ["li-api-session-key", context.token];
}

/**
 * Builds the final header mapping for one request.
 */
export function buildHeaders(
  context: Pick<SessionContext, "authType" | "token">,
  options: HeaderOptions = {}
): HeaderMap {
  const [authKey, authValue] = authHeaderFor(context);
  const merged: HeaderMap = { [authKey]: authValue };

  const contentType = options.contentType === undefined ? "application/json" : options.contentType;
  if (contentType !== null) {
    merged["content-type"] = contentType;
  }

  for (const [key, value] of Object.entries(options.headers ?? {})) {
    merged[key.toLowerCase()] = value;
  }

  const headers = normalizeHeaders(merged);
  if (options.multipart) {
    delete headers["content-type"];
  }
  return headers;
}

/**
 * Lower-cases keys and values. Credential values and non-string values pass through.
 */
export function normalizeHeaders(headers: HeaderMap): HeaderMap {
  const normalized: HeaderMap = {};
  for (const [key, value] of Object.entries(headers)) {
    const lowerKey = key.toLowerCase();
    normalized[lowerKey] = AUTH_HEADER_KEYS.has(lowerKey) ? value : foldValue(value);
  }
  return normalized;
}

function foldValue(value: HeaderValue): HeaderValue {
  if (typeof value === "string") {
    return value.toLowerCase();
  }
  if (typeof value === "object") {
    return value.map((entry) => entry.toLowerCase());
  }
  return value;
}

/**
 * Flattens a header mapping into the string record fetch expects.
 */
export function toFetchHeaders(headers: HeaderMap): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    flat[key] = typeof value === "object" ? value.join(", ") : String(value);
  }
  return flat;
}
