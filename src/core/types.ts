/**
 * Core type definitions for the community API client
 */

import type { CommunityError } from "./errors.js";

// ============================================================================
// HTTP Primitives
// ============================================================================

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type HeaderValue = string | number | boolean | readonly string[];

/**
 * Header mapping. Keys are lower-cased once they pass through the header builder.
 */
export type HeaderMap = Record<string, HeaderValue>;

/**
 * Request body variants accepted by the dispatcher.
 *
 * - `json`: serialized with JSON.stringify, sent as application/json
 * - `multipart`: a prebuilt FormData; the transport generates the boundary
 * - `text`: sent as text/plain
 * - `form`: url-encoded fields
 */
export type RequestBody =
  | { kind: "json"; payload: unknown }
  | { kind: "multipart"; form: FormData }
  | { kind: "text"; text: string }
  | { kind: "form"; fields: Record<string, string | number | boolean> };

/**
 * One HTTP call.
 *
 * INVARIANTS:
 * - url is absolute
 * - header keys are lower-case
 * - a multipart body never travels with a content-type header
 */
export interface RequestDescriptor {
  method: HttpMethod;
  url: string;
  headers: HeaderMap;
  body?: RequestBody;
  expectJson: boolean;
}

/**
 * Transport-level response. The body is read once; `json()` parses that text.
 */
export interface RawResponse {
  status: number;
  ok: boolean;
  url: string;
  headers: Headers;
  text: string;
  json(): unknown;
}

export type ParsedBody =
  | { kind: "json"; value: unknown }
  | { kind: "raw"; decodeError?: string };

export interface DispatchOutcome {
  response: RawResponse;
  body: ParsedBody;
  attempts: number;
}

// ============================================================================
// Session
// ============================================================================

export type AuthType = "session-key" | "oauth2" | "sso";

/**
 * One authenticated connection.
 *
 * INVARIANTS:
 * - communityUrl uses http or https and has no trailing slash
 * - the object is frozen; token refresh creates a new context
 */
export interface SessionContext {
  readonly communityUrl: string;
  readonly v2Base: string;
  readonly v1Base: string;
  readonly tenantId: string | undefined;
  readonly authType: AuthType;
  readonly token: string;
  readonly preferJson: boolean;
  readonly translateErrors: boolean;
}

// ============================================================================
// Normalized Results
// ============================================================================

export type ApiStatus = "success" | "error";

/**
 * A single merged message, or `[message, developerMessage]` when split.
 */
export type ErrorMessage = string | readonly [string, string];

export interface NormalizedResult<T = unknown> {
  status: ApiStatus;
  httpCode: number;
  errorMessage?: ErrorMessage;
  id?: string;
  url?: string;
  apiUrl?: string;
  data: T;
}

/**
 * Which parts of a result the caller wants back. All default to false.
 */
export interface ReturnFields {
  fullResponse?: boolean;
  returnId?: boolean;
  returnUrl?: boolean;
  returnApiUrl?: boolean;
  returnHttpCode?: boolean;
  returnStatus?: boolean;
  returnErrorMessages?: boolean;
  splitErrors?: boolean;
}

export type ReturnedValue = string | number | ErrorMessage | undefined;

/**
 * What a v2 operation hands back:
 * - boolean when no field was requested
 * - the raw response for `fullResponse`
 * - a bare value for one field, an ordered array for several
 */
export type Delivery = boolean | RawResponse | ReturnedValue | ReturnedValue[];

export interface V1Result {
  status: ApiStatus;
  httpCode: number;
  value: string | number | boolean | undefined;
  errorCode?: number;
  errorMessage?: string;
  data: unknown;
}

// ============================================================================
// Idempotency
// ============================================================================

export enum IdempotencyLevel {
  SAFE = "SAFE", // Read-only (GET)
  IDEMPOTENT = "IDEMPOTENT", // Replays are harmless (PUT, POST against id-keyed create endpoints)
  UNSAFE = "UNSAFE", // Never retry (DELETE)
}

export interface IdempotencyConfig {
  defaultLevels: Map<string, IdempotencyLevel>; // e.g., "GET" -> SAFE
  operationOverrides: Map<string, IdempotencyLevel>; // e.g., "POST /messages/:id/tags" -> UNSAFE
}

// ============================================================================
// Retry
// ============================================================================

export interface RetryConfig {
  maxRetries: number; // Total attempts for retryable methods
  baseDelay: number; // Base delay in ms
  maxDelay: number; // Max delay in ms
  jitter: boolean;
}

export interface FailedAttempt {
  attempt: number;
  errorType: string;
  message: string;
  status?: number;
}

// ============================================================================
// Observability
// ============================================================================

export interface RequestContext {
  endpoint: string;
  method: HttpMethod;
  requestId: string;
  timestamp: Date;
  headers: Record<string, string>;
  bodyKind: RequestBody["kind"] | "none";
}

export interface ResponseContext {
  endpoint: string;
  method: HttpMethod;
  requestId: string;
  statusCode: number;
  attempts: number;
  duration: number;
  timestamp: Date;
}

export interface ErrorContext {
  endpoint: string;
  method: HttpMethod;
  requestId: string;
  error: CommunityError;
  duration: number;
  timestamp: Date;
}

export interface Metric {
  name: string;
  value: number;
  tags: Record<string, string>;
  timestamp: Date;
}

export interface ObservabilityAdapter {
  logRequest(context: RequestContext): void;
  logResponse(context: ResponseContext): void;
  logError(context: ErrorContext): void;
  logWarning(message: string, metadata?: Record<string, unknown>): void;
  recordMetric(metric: Metric): void;
}
