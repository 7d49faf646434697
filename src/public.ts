/**
 * Public API surface of the community API client.
 *
 * This is the ONLY file consumers should import from.
 * All other modules are internal implementation details.
 */

// Main client
export { CommunityClient } from "./index.js";
export type { V1Client, V2Client } from "./index.js";

// Configuration
export type { AuthSettings, AuthSettingsType, CommunityClientConfig } from "./config/schema.js";
export { DEFAULT_TIMEOUT, DEFAULT_V1_BASE_PATH, validateConfig } from "./config/schema.js";
export {
  DEFAULT_ENVIRONMENT_VARIABLES,
  loadEnvironmentConfig,
  parseBoolean,
} from "./config/environment.js";
export type { Environment, EnvironmentVariableNames } from "./config/environment.js";
export { loadHelperFile, parseHelperSettings } from "./config/helper.js";

// Session
export { SessionAuthenticator, createSessionContext, withToken } from "./auth/session.js";
export type { SessionContextInit } from "./auth/session.js";

// Core types - consumer contracts
export type {
  ApiStatus,
  AuthType,
  Delivery,
  DispatchOutcome,
  ErrorMessage,
  HeaderMap,
  HttpMethod,
  NormalizedResult,
  ParsedBody,
  RawResponse,
  RequestBody,
  RequestDescriptor,
  RetryConfig,
  ReturnFields,
  ReturnedValue,
  SessionContext,
  V1Result,
} from "./core/types.js";

// Errors
export {
  APIConnectionError,
  CommunityError,
  DataMismatchError,
  DELETERequestError,
  FeatureNotConfiguredError,
  GETRequestError,
  InvalidConfigurationError,
  InvalidFieldError,
  InvalidHelperFileTypeError,
  InvalidNodeTypeError,
  InvalidOperatorError,
  InvalidPayloadValueError,
  InvalidURLError,
  LiQLParseError,
  MissingAuthDataError,
  MissingRequiredDataError,
  NodeIDNotFoundError,
  NodeTypeNotFoundError,
  OperatorMismatchError,
  PayloadMismatchError,
  POSTRequestError,
  PUTRequestError,
  RequestError,
  UserCreationError,
} from "./core/errors.js";
export type { CommunityErrorCategory, Result } from "./core/errors.js";

// Request helpers
export { buildHeaders } from "./core/headers.js";
export { appendJsonFormat } from "./core/urls.js";
export { MultipartFormBuilder } from "./core/multipart.js";
export { ResponseNormalizer } from "./core/normalizer.js";
export type { ApiRequestOptions, V1RequestOptions } from "./core/api.js";
export type { FetchLike } from "./core/dispatcher.js";
export type { SanitizerOptions } from "./core/request-sanitizer.js";

// LiQL
export { LiqlClient } from "./liql/client.js";
export type { LiqlItem, LiqlResponse, PaginateOptions } from "./liql/client.js";
export {
  formatQuery,
  getQueryUrl,
  parseQueryElements,
  parseSelectFields,
  parseWhereClause,
  structureCursorClause,
} from "./liql/query.js";
export type { QueryElements, QueryUrlOptions, WhereCondition, WhereInput } from "./liql/query.js";

// Resources
export { structureBoardPayload } from "./resources/boards.js";
export type { BlogSettings, BoardSettings, ContestSettings } from "./resources/boards.js";
export type { CategorySettings } from "./resources/categories.js";
export { structureGrouphubPayload } from "./resources/grouphubs.js";
export type { AvatarSource, GrouphubSettings } from "./resources/grouphubs.js";
export { NodeRef, getNodeIdFromUrl, getNodeTypeFromUrl, resolveNodeId } from "./resources/nodes.js";
export type { NodeType } from "./resources/nodes.js";
export { structureMessagePayload } from "./resources/messages.js";
export type { MessageSettings } from "./resources/messages.js";
export { consolidateAttachments, formatAttachmentPayload } from "./resources/attachments.js";
export type { Attachment } from "./resources/attachments.js";
export { structureSingleTagPayload, structureTagsForMessage } from "./resources/tags.js";
export { structureUserPayload } from "./resources/users.js";
export type { UserLookup, UserSettings } from "./resources/users.js";

// Observability
export type {
  ErrorContext,
  Metric,
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
} from "./core/types.js";
export { ConsoleObservability } from "./observability/console.js";
export type { ConsoleObservabilityConfig, LogLevel, LogSink } from "./observability/console.js";
export { MemoryObservability, NoOpObservability } from "./observability/noop.js";
export { OpenTelemetryObservability } from "./observability/otel.js";
export type { OpenTelemetryConfig } from "./observability/otel.js";

// Idempotency
export { IdempotencyLevel } from "./core/types.js";
export type { IdempotencyConfig } from "./core/types.js";
