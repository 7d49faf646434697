/**
 * URL helpers for the v1 and v2 endpoint families
 */

import { InvalidURLError } from "./errors.js";

const JSON_FORMAT_PARAM = "restapi.response_format";

/**
 * Validates a community URL and returns it without trailing slashes.
 * A URL without a scheme is assumed to be https.
 */
export function normalizeBaseUrl(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === "") {
    throw new InvalidURLError(raw, "The community URL cannot be empty.");
  }

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch (error) {
    throw new InvalidURLError(raw, error instanceof Error ? error.message : undefined);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new InvalidURLError(raw, "Only http and https URLs are supported.");
  }

  return withScheme.replace(/\/+$/, "");
}

/**
 * Joins a base and a relative path with exactly one slash. Absolute URLs pass through.
 */
export function joinUrl(base: string, path: string): string {
  if (/^https?:\/\//i.test(path)) {
    return path;
  }
  if (path === "") {
    return base;
  }
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

/**
 * Appends query parameters, skipping undefined values.
 */
export function appendQuery(
  url: string,
  params: Record<string, string | number | boolean | undefined>
): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.append(key, String(value));
    }
  }
  const query = search.toString();
  if (query === "") {
    return url;
  }
  return `${url}${url.includes("?") ? "&" : "?"}${query}`;
}

/**
 * Asks a v1 endpoint for JSON instead of XML.
 */
export function appendJsonFormat(url: string): string {
  if (url.includes(`${JSON_FORMAT_PARAM}=`)) {
    return url;
  }
  return appendQuery(url, { [JSON_FORMAT_PARAM]: "json" });
}
