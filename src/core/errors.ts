/**
 * Error taxonomy
 *
 * Every error raised by the client extends CommunityError. The opt-in
 * structured path (`Result`) carries the same instances, so a caller that
 * switches between throwing and non-throwing call styles sees identical
 * information either way.
 */

import type { FailedAttempt, HttpMethod } from "./types.js";

export type CommunityErrorCategory =
  | "connection"    // Transport failures that exhausted their retries
  | "request"       // Non-2xx responses
  | "auth"          // Missing or rejected credentials
  | "validation"    // Bad caller input (payloads, LiQL syntax, node references)
  | "configuration" // Invalid client or helper file settings
  | "decode";       // Unparseable response bodies

export interface CommunityErrorOptions {
  category: CommunityErrorCategory;
  retryable?: boolean;
  metadata?: Record<string, unknown>;
  cause?: unknown;
}

export class CommunityError extends Error {
  readonly category: CommunityErrorCategory;
  readonly retryable: boolean;
  readonly metadata: Record<string, unknown> | undefined;

  constructor(message: string, options: CommunityErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.category = options.category;
    this.retryable = options.retryable ?? false;
    this.metadata = options.metadata;
  }
}

// ============================================================================
// Result
// ============================================================================

export type Result<T, E = CommunityError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Returns the value or throws the carried error.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

// ============================================================================
// Transport and HTTP Errors
// ============================================================================

export interface ConnectionFailureDetails {
  method: HttpMethod;
  url: string;
  failedAttempts: FailedAttempt[];
  lastError: string;
  cause?: unknown;
}

export class APIConnectionError extends CommunityError {
  readonly method: HttpMethod;
  readonly url: string;
  readonly attempts: number;
  readonly lastError: string;
  readonly failedAttempts: FailedAttempt[];

  constructor(details: ConnectionFailureDetails) {
    const attempts = details.failedAttempts.length;
    super(
      `The ${details.method} request was unable to complete successfully after ${attempts} ` +
        `consecutive attempt${attempts === 1 ? "" : "s"}. Last error: ${details.lastError}`,
      {
        category: "connection",
        retryable: false,
        metadata: { url: details.url, attempts },
        cause: details.cause,
      }
    );
    this.method = details.method;
    this.url = details.url;
    this.attempts = attempts;
    this.lastError = details.lastError;
    this.failedAttempts = details.failedAttempts;
  }
}

export interface RequestErrorDetails {
  statusCode?: number;
  apiMessage?: string;
  attempts?: number;
  url?: string;
  metadata?: Record<string, unknown>;
}

function requestErrorMessage(method: HttpMethod, details: RequestErrorDetails): string {
  const { statusCode, apiMessage } = details;
  if (statusCode !== undefined && apiMessage) {
    return `The ${method} request returned the ${statusCode} status code with the following message: ${apiMessage}`;
  }
  if (statusCode !== undefined) {
    return `The ${method} request returned the ${statusCode} status code.`;
  }
  if (apiMessage) {
    return `The ${method} request failed with the following message: ${apiMessage}`;
  }
  return `The ${method} request did not return a successful response.`;
}

/**
 * Base for the verb-specific HTTP errors.
 */
export abstract class RequestError extends CommunityError {
  readonly method: HttpMethod;
  readonly statusCode: number | undefined;
  readonly apiMessage: string | undefined;
  readonly attempts: number;

  protected constructor(method: HttpMethod, details: RequestErrorDetails) {
    super(requestErrorMessage(method, details), {
      category: details.statusCode === 401 ? "auth" : "request",
      metadata: { ...details.metadata, url: details.url, statusCode: details.statusCode },
    });
    this.method = method;
    this.statusCode = details.statusCode;
    this.apiMessage = details.apiMessage;
    this.attempts = details.attempts ?? 1;
  }
}

export class GETRequestError extends RequestError {
  constructor(details: RequestErrorDetails = {}) {
    super("GET", details);
  }
}

export class POSTRequestError extends RequestError {
  constructor(details: RequestErrorDetails = {}) {
    super("POST", details);
  }
}

export class PUTRequestError extends RequestError {
  constructor(details: RequestErrorDetails = {}) {
    super("PUT", details);
  }
}

export class DELETERequestError extends RequestError {
  constructor(details: RequestErrorDetails = {}) {
    super("DELETE", details);
  }
}

export function requestErrorFor(method: HttpMethod, details: RequestErrorDetails): RequestError {
  switch (method) {
    case "GET":
      return new GETRequestError(details);
    case "POST":
      return new POSTRequestError(details);
    case "PUT":
      return new PUTRequestError(details);
    case "DELETE":
      return new DELETERequestError(details);
  }
}

// ============================================================================
// Domain Errors
// ============================================================================

export class MissingAuthDataError extends CommunityError {
  constructor(message = "Failed to perform the operation due to missing authentication data.") {
    super(message, { category: "auth" });
  }
}

export class InvalidURLError extends CommunityError {
  constructor(url?: string, reason?: string) {
    const base = url ? `The URL '${url}' is not valid.` : "The supplied URL is not valid.";
    super(reason ? `${base} ${reason}` : base, { category: "configuration", metadata: { url } });
  }
}

export class InvalidConfigurationError extends CommunityError {
  readonly issues: string[];

  constructor(issues: string[], subject = "client") {
    super(`Invalid ${subject} configuration:\n  - ${issues.join("\n  - ")}`, {
      category: "configuration",
    });
    this.issues = issues;
  }
}

export class InvalidHelperFileTypeError extends CommunityError {
  constructor(path?: string) {
    super(
      path
        ? `The helper file '${path}' is not a supported file type. Only JSON helper files are accepted.`
        : "The helper file is not a supported file type. Only JSON helper files are accepted.",
      { category: "configuration" }
    );
  }
}

export class MissingRequiredDataError extends CommunityError {
  constructor(message = "Missing one or more required parameters.") {
    super(message, { category: "validation" });
  }
}

export class InvalidPayloadValueError extends CommunityError {
  constructor(field?: string, value?: unknown) {
    super(
      field
        ? `The '${field}' payload field cannot have the value '${String(value)}'.`
        : "One or more payload values are invalid.",
      { category: "validation", metadata: { field } }
    );
  }
}

export class PayloadMismatchError extends CommunityError {
  constructor(kinds: string[] = []) {
    super(
      kinds.length > 0
        ? `Only one payload type may be supplied but received: ${kinds.join(", ")}.`
        : "Only one payload type may be supplied.",
      { category: "validation" }
    );
  }
}

export class DataMismatchError extends CommunityError {
  constructor(fields: readonly string[] = []) {
    super(
      fields.length > 0
        ? `The values supplied for ${fields.map((f) => `'${f}'`).join(" and ")} do not align.`
        : "The supplied data does not align.",
      { category: "validation" }
    );
  }
}

export class InvalidNodeTypeError extends CommunityError {
  constructor(nodeType?: string) {
    super(
      nodeType ? `The node type '${nodeType}' is not valid.` : "The node type is not valid.",
      { category: "validation" }
    );
  }
}

export class NodeIDNotFoundError extends CommunityError {
  constructor(url?: string) {
    super(
      url
        ? `The node ID could not be found in the URL '${url}'.`
        : "The node ID could not be found.",
      { category: "validation" }
    );
  }
}

export class NodeTypeNotFoundError extends CommunityError {
  constructor(url?: string) {
    super(
      url
        ? `The node type could not be identified from the URL '${url}'.`
        : "The node type could not be identified.",
      { category: "validation" }
    );
  }
}

export class InvalidFieldError extends CommunityError {
  constructor(message = "The field is not valid.") {
    super(message, { category: "validation" });
  }
}

export class InvalidOperatorError extends CommunityError {
  constructor(operator?: string) {
    super(
      operator ? `The operator '${operator}' is not valid.` : "The operator is not valid.",
      { category: "validation" }
    );
  }
}

export class OperatorMismatchError extends CommunityError {
  constructor(message = "The number of join operators does not match the number of clauses.") {
    super(message, { category: "validation" });
  }
}

export class LiQLParseError extends CommunityError {
  constructor(apiMessage?: string) {
    super(
      apiMessage
        ? `The LiQL response indicates an error: ${apiMessage}`
        : "The LiQL response could not be parsed.",
      { category: "decode" }
    );
  }
}

export class UserCreationError extends CommunityError {
  constructor(login?: string, apiMessage?: string) {
    const subject = login ? `The user '${login}'` : "The user";
    super(
      apiMessage
        ? `${subject} could not be created: ${apiMessage}`
        : `${subject} could not be created.`,
      { category: "request" }
    );
  }
}

export class FeatureNotConfiguredError extends CommunityError {
  constructor(feature?: string) {
    super(
      feature
        ? `The '${feature}' feature is not configured for this community.`
        : "The requested feature is not configured for this community.",
      { category: "request" }
    );
  }
}
