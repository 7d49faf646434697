/**
 * Maps transport failures and HTTP responses onto the error taxonomy
 */

import type { HttpMethod, ParsedBody, RawResponse } from "./types.js";
import { requestErrorFor, type RequestError } from "./errors.js";
import { parseRetryAfter, isHtmlMediaType } from "./header-parser.js";

/**
 * Statuses that indicate a transient condition worth another attempt.
 */
export const TRANSIENT_STATUS_CODES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

const MAX_TEXT_MESSAGE_LENGTH = 500;

/**
 * A network-level failure (refused connection, DNS, timeout).
 * Internal to the dispatch loop; escapes as APIConnectionError.
 */
export class TransportFailure extends Error {
  readonly retryable = true;
  readonly errorType: string;

  constructor(message: string, errorType: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "TransportFailure";
    this.errorType = errorType;
  }
}

/**
 * A response whose status is in TRANSIENT_STATUS_CODES.
 * Internal to the dispatch loop; escapes as a verb-specific RequestError.
 */
export class TransientStatusFailure extends Error {
  readonly retryable = true;
  readonly errorType: string;
  readonly response: RawResponse;
  readonly retryAfter: Date | undefined;

  constructor(response: RawResponse) {
    super(`Received transient status ${response.status}`);
    this.name = "TransientStatusFailure";
    this.errorType = `HTTP ${response.status}`;
    this.response = response;
    const retryAfter =
      response.status === 429 || response.status === 503
        ? parseRetryAfter(response.headers.get("retry-after"))
        : null;
    this.retryAfter = retryAfter ?? undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

export class ErrorMapper {
  static isTransientStatus(status: number): boolean {
    return TRANSIENT_STATUS_CODES.has(status);
  }

  /**
   * Classifies an error thrown by fetch into an error type and message.
   */
  static describeTransportError(error: unknown): { errorType: string; message: string } {
    if (error instanceof Error) {
      const cause: unknown = error.cause;
      if (isRecord(cause) && typeof cause.code === "string") {
        return { errorType: cause.code, message: `${error.message} (${cause.code})` };
      }
      return { errorType: error.name, message: error.message };
    }
    return { errorType: "UnknownError", message: String(error) };
  }

  /**
   * Pulls the best available message text out of an error response.
   * Checks the v2 JSON shape, then the v1 shape, then HTML, then plain text.
   */
  static extractErrorMessage(response: RawResponse, body: ParsedBody): string | undefined {
    if (body.kind === "json" && isRecord(body.value)) {
      const fromJson = ErrorMapper.messageFromJson(body.value);
      if (fromJson !== undefined) {
        return fromJson;
      }
    }

    const text = response.text.trim();
    if (text === "") {
      return undefined;
    }

    if (isHtmlMediaType(response.headers.get("content-type")) || /<html[\s>]/i.test(text)) {
      return ErrorMapper.getErrorFromHtml(text);
    }

    if (body.kind === "raw") {
      return text.length > MAX_TEXT_MESSAGE_LENGTH ? `${text.slice(0, MAX_TEXT_MESSAGE_LENGTH)}...` : text;
    }
    return undefined;
  }

  private static messageFromJson(json: Record<string, unknown>): string | undefined {
    const message = nonEmptyString(json.message);
    const data = isRecord(json.data) ? json.data : undefined;
    const developerMessage =
      nonEmptyString(json.developer_message) ?? nonEmptyString(data?.developer_message);

    if (message && developerMessage && message !== developerMessage) {
      return `${message} - ${developerMessage}`;
    }
    if (message ?? developerMessage) {
      return message ?? developerMessage;
    }

    const v1 = isRecord(json.response) ? json.response : undefined;
    const v1Error = v1 && isRecord(v1.error) ? v1.error : undefined;
    if (v1Error) {
      return nonEmptyString(v1Error.message) ?? nonEmptyString(v1Error.$);
    }
    return undefined;
  }

  /**
   * Reads the heading and description out of a servlet-style HTML error page.
   */
  static getErrorFromHtml(html: string): string {
    const flat = html.replace(/\s+/g, " ");
    const title =
      /<body>\s*<h1>(.*?)<\/h1>/i.exec(flat)?.[1] ??
      /<title>(.*?)<\/title>/i.exec(flat)?.[1];
    const description = /description<\/b>\s*<u>(.*?)<\/u>/i.exec(flat)?.[1];
    const parts = [title, description]
      .map((part) => part?.trim())
      .filter((part): part is string => part !== undefined && part !== "");
    return parts.length > 0 ? parts.join(" ") : flat.trim().slice(0, MAX_TEXT_MESSAGE_LENGTH);
  }

  static toRequestError(
    method: HttpMethod,
    response: RawResponse,
    body: ParsedBody,
    attempts: number
  ): RequestError {
    const apiMessage = ErrorMapper.extractErrorMessage(response, body);
    return requestErrorFor(method, {
      statusCode: response.status,
      ...(apiMessage !== undefined ? { apiMessage } : {}),
      attempts,
      url: response.url,
    });
  }
}
