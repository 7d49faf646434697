/**
 * Response header parsing utilities
 */

/**
 * Parses the Retry-After header value.
 *
 * The header can be:
 * - A number of seconds (e.g., "120")
 * - An HTTP-date (e.g., "Wed, 21 Oct 2015 07:28:00 GMT")
 *
 * @returns Date when retry is allowed, or null if invalid
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): Date | null {
  if (!header) {
    return null;
  }

  const trimmed = header.trim();

  // Seconds first (more common)
  if (/^\d+$/.test(trimmed)) {
    const seconds = parseInt(trimmed, 10);
    // Cap at 1 year to prevent overflow
    if (seconds <= 86400 * 365) {
      return new Date(now + seconds * 1000);
    }
    return null;
  }

  const date = Date.parse(trimmed);
  if (!isNaN(date) && date > now && date < now + 86400 * 365 * 1000) {
    return new Date(date);
  }

  return null;
}

/**
 * Media type of a response without parameters, lower-cased.
 */
export function parseMediaType(header: string | null): string | null {
  if (!header) {
    return null;
  }
  const mediaType = header.split(";")[0]?.trim().toLowerCase();
  return mediaType ? mediaType : null;
}

export function isJsonMediaType(header: string | null): boolean {
  const mediaType = parseMediaType(header);
  return mediaType !== null && (mediaType === "application/json" || mediaType.endsWith("+json"));
}

export function isXmlMediaType(header: string | null): boolean {
  const mediaType = parseMediaType(header);
  return mediaType !== null && (mediaType.endsWith("/xml") || mediaType.endsWith("+xml"));
}

export function isHtmlMediaType(header: string | null): boolean {
  return parseMediaType(header) === "text/html";
}
