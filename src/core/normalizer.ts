/**
 * Response normalization
 *
 * v2 endpoints answer with `{ status, http_code, message, data }`; v1
 * endpoints answer with `{ response: { status, value | error } }` in JSON or
 * XML. Both collapse into one result contract here, and `deliver` projects
 * that contract onto whatever the caller asked for.
 */

import type {
  ApiStatus,
  Delivery,
  ErrorMessage,
  NormalizedResult,
  ParsedBody,
  RawResponse,
  ReturnedValue,
  ReturnFields,
  V1Result,
} from "./types.js";
import { ErrorTranslator, defaultTranslator } from "./translations.js";
import { looksLikeXml, xmlToV1Json } from "./xml.js";

export interface NormalizeOptions {
  translateErrors?: boolean;
  splitErrors?: boolean;
  translator?: ErrorTranslator;
}

type ProjectionFlag = Exclude<keyof ReturnFields, "fullResponse" | "splitErrors">;

/**
 * Projection order. Values come back in this order regardless of how the
 * caller listed the flags.
 */
const PROJECTION: ReadonlyArray<readonly [ProjectionFlag, (result: NormalizedResult) => ReturnedValue]> = [
  ["returnId", (result) => result.id],
  ["returnUrl", (result) => result.url],
  ["returnApiUrl", (result) => result.apiUrl],
  ["returnHttpCode", (result) => result.httpCode],
  ["returnStatus", (result) => result.status],
  ["returnErrorMessages", (result) => result.errorMessage],
];

const SUCCESS_STATUSES = new Set(["success", "successful"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return undefined;
}

/**
 * Coerces numbers and numeric strings to an integer.
 */
export function toInteger(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string" && /^\s*-?\d+(\.\d+)?\s*$/.test(value)) {
    return Math.trunc(Number(value));
  }
  return undefined;
}

export class ResponseNormalizer {
  /**
   * Normalizes a v2 response.
   */
  static normalizeV2(
    response: RawResponse,
    body: ParsedBody,
    options: NormalizeOptions = {}
  ): NormalizedResult {
    const json = body.kind === "json" && isRecord(body.value) ? body.value : undefined;
    const httpCode = toInteger(json?.http_code) ?? response.status;

    if (!json) {
      return {
        status: response.ok ? "success" : "error",
        httpCode,
        data: body.kind === "json" ? body.value : undefined,
      };
    }

    const data = isRecord(json.data) ? json.data : undefined;
    const message = optionalString(json.message);
    const developerMessage =
      optionalString(json.developer_message) ?? optionalString(data?.developer_message);

    const result: NormalizedResult = {
      status: ResponseNormalizer.resolveStatus(json.status, message, response.ok),
      httpCode,
      data: json.data,
    };

    const id = optionalString(data?.id);
    const url = optionalString(data?.view_href);
    const apiUrl = optionalString(data?.href);
    if (id !== undefined) result.id = id;
    if (url !== undefined) result.url = url;
    if (apiUrl !== undefined) result.apiUrl = apiUrl;

    if (message !== undefined || developerMessage !== undefined) {
      result.errorMessage = ResponseNormalizer.consolidateErrors(message, developerMessage, options);
    }

    return result;
  }

  /**
   * Merges `message` and `developer_message`.
   *
   * - split: always `[message, developerMessage]`
   * - both present and different: `"message - developerMessage"`
   * - otherwise: whichever one is non-empty
   */
  static consolidateErrors(
    message: string | undefined,
    developerMessage: string | undefined,
    options: NormalizeOptions = {}
  ): ErrorMessage {
    const translator = options.translator ?? defaultTranslator;
    const translate = (text: string): string =>
      options.translateErrors && text !== "" ? translator.translate(text) : text;

    const rawPrimary = message ?? "";
    const rawDeveloper = developerMessage ?? "";
    const primary = translate(rawPrimary);
    const developer = translate(rawDeveloper);

    if (options.splitErrors) {
      return [primary, developer];
    }
    // Equality is decided on the untranslated texts
    if (rawPrimary !== "" && rawDeveloper !== "" && rawPrimary !== rawDeveloper) {
      return `${primary} - ${developer}`;
    }
    return rawPrimary !== "" ? primary : developer;
  }

  /**
   * Normalizes a v1 response in its JSON form, or as XML text.
   */
  static normalizeV1(response: RawResponse, body: ParsedBody): V1Result {
    const json = ResponseNormalizer.v1Json(response, body);
    const envelope = isRecord(json) && isRecord(json.response) ? json.response : undefined;

    if (!envelope) {
      return {
        status: response.ok ? "success" : "error",
        httpCode: response.status,
        value: undefined,
        data: json,
      };
    }

    const status: ApiStatus = envelope.status === "success" ? "success" : "error";
    const result: V1Result = {
      status,
      httpCode: response.status,
      value: ResponseNormalizer.extractV1Value(envelope.value),
      data: json,
    };

    if (isRecord(envelope.error)) {
      const code = toInteger(envelope.error.code);
      const message = optionalString(envelope.error.message);
      if (code !== undefined) result.errorCode = code;
      if (message !== undefined) result.errorMessage = message;
    }

    return result;
  }

  /**
   * Extracts the scalar from a v1 `{ type, $ }` node.
   */
  static extractV1Value(node: unknown): string | number | boolean | undefined {
    if (typeof node === "string" || typeof node === "number" || typeof node === "boolean") {
      return node;
    }
    if (!isRecord(node) || !("$" in node)) {
      return undefined;
    }

    const raw = node.$;
    const type = typeof node.type === "string" ? node.type.toLowerCase() : "string";

    switch (type) {
      case "int":
      case "integer":
      case "long":
      case "float":
      case "double": {
        const numeric = typeof raw === "number" ? raw : Number(raw);
        return Number.isFinite(numeric) ? numeric : optionalString(raw);
      }
      case "boolean":
        return raw === true || raw === "true";
      default:
        return optionalString(raw) ?? (typeof raw === "boolean" ? raw : undefined);
    }
  }

  /**
   * Projects a normalized result onto the requested return fields.
   */
  static deliver(result: NormalizedResult, fields: ReturnFields, raw: RawResponse): Delivery {
    if (fields.fullResponse) {
      return raw;
    }

    const values = PROJECTION
      .filter(([flag]) => fields[flag] === true)
      .map(([, accessor]) => accessor(result));

    if (values.length === 0) {
      return result.status === "success";
    }
    if (values.length === 1) {
      return values[0];
    }
    return values;
  }

  /**
   * True when the caller asked for anything other than the default boolean.
   */
  static wantsStructuredResult(fields: ReturnFields): boolean {
    return fields.fullResponse === true || PROJECTION.some(([flag]) => fields[flag] === true);
  }

  private static resolveStatus(status: unknown, message: string | undefined, ok: boolean): ApiStatus {
    if (typeof status === "string") {
      return SUCCESS_STATUSES.has(status.toLowerCase()) ? "success" : "error";
    }
    // Without a status field, the absence of an error reads as success
    return ok && (message === undefined || message === "") ? "success" : "error";
  }

  private static v1Json(response: RawResponse, body: ParsedBody): unknown {
    if (body.kind === "json") {
      return body.value;
    }
    if (looksLikeXml(response.text)) {
      try {
        return xmlToV1Json(response.text);
      } catch {
        return undefined;
      }
    }
    return undefined;
  }
}
