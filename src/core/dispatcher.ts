/**
 * Request dispatcher
 * Flow: resolve idempotency → retry(fetch) → decode → map errors → observe
 */

import { randomUUID } from "crypto";
import type {
  DispatchOutcome,
  ErrorContext,
  FailedAttempt,
  HttpMethod,
  ObservabilityAdapter,
  ParsedBody,
  RawResponse,
  RequestContext,
  RequestDescriptor,
  ResponseContext,
} from "./types.js";
import {
  APIConnectionError,
  CommunityError,
  err,
  ok,
  unwrap,
  type Result,
} from "./errors.js";
import { ErrorMapper, TransientStatusFailure, TransportFailure } from "./error-mapper.js";
import { toFetchHeaders } from "./headers.js";
import { sanitizeHeaders, sanitizeUrl, type SanitizerOptions } from "./request-sanitizer.js";
import { sanitizeMetadata, sanitizeMetric } from "./observability-sanitizer.js";
import { RetryExhaustedError, RetryStrategy } from "../strategies/retry.js";
import { IdempotencyResolver } from "../strategies/idempotency.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface DispatcherConfig {
  retryStrategy: RetryStrategy;
  idempotencyResolver: IdempotencyResolver;
  observability: ObservabilityAdapter[];
  timeout: number;
  fetch?: FetchLike;
  sanitizerOptions?: SanitizerOptions;
}

export interface DispatchOptions {
  /**
   * Hand non-2xx responses back instead of raising the verb-specific error.
   * Used by callers that asked for structured results.
   */
  allowErrorStatus?: boolean;
}

/**
 * Wraps a fetch Response whose body has already been read as text.
 */
export function toRawResponse(
  status: number,
  url: string,
  headers: Headers,
  text: string
): RawResponse {
  return {
    status,
    ok: status >= 200 && status < 300,
    url,
    headers,
    text,
    json(): unknown {
      return JSON.parse(text);
    },
  };
}

export class RequestDispatcher {
  private config: DispatcherConfig;

  constructor(config: DispatcherConfig) {
    this.config = config;
  }

  /**
   * Broadcasts an observability event to every adapter.
   * Adapter failures are aggregated and written to console.error; they never
   * abort the request.
   */
  private safelyBroadcastObservability(
    action: (adapter: ObservabilityAdapter) => void,
    actionName: string
  ): void {
    const errors: Array<{ adapter: string; error: unknown }> = [];

    for (const obs of this.config.observability) {
      try {
        action(obs);
      } catch (error) {
        errors.push({
          adapter: obs.constructor?.name || "UnknownObservabilityAdapter",
          error,
        });
      }
    }

    // Not routed through the adapters, to avoid loops
    if (errors.length > 0) {
      const errorSummary = errors
        .map(
          ({ adapter, error }) =>
            `  - ${adapter}: ${error instanceof Error ? error.message : String(error)}`
        )
        .join("\n");

      console.error(
        `[community-api-client] Observability failure in ${actionName} (${errors.length}/${this.config.observability.length} adapters failed):\n${errorSummary}`
      );
    }
  }

  /**
   * Sends a sanitized warning to every adapter.
   */
  warn(message: string, metadata: Record<string, unknown> = {}): void {
    const safeMetadata = sanitizeMetadata(metadata, this.config.sanitizerOptions);
    this.safelyBroadcastObservability((obs) => obs.logWarning(message, safeMetadata), "logWarning");
  }

  /**
   * Dispatches a request and throws on failure.
   */
  async dispatch(descriptor: RequestDescriptor, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    return unwrap(await this.dispatchSafe(descriptor, options));
  }

  /**
   * Dispatches a request and returns failures as values.
   */
  async dispatchSafe(
    descriptor: RequestDescriptor,
    options: DispatchOptions = {}
  ): Promise<Result<DispatchOutcome>> {
    const requestId = randomUUID();
    const startTime = Date.now();
    const { method } = descriptor;
    const endpoint = sanitizeUrl(descriptor.url, this.config.sanitizerOptions);
    const idempotencyLevel = this.config.idempotencyResolver.getIdempotencyLevel(method, descriptor.url);

    const requestContext: RequestContext = {
      endpoint,
      method,
      requestId,
      timestamp: new Date(),
      headers: sanitizeHeaders(descriptor.headers, this.config.sanitizerOptions),
      bodyKind: descriptor.body?.kind ?? "none",
    };
    this.safelyBroadcastObservability((obs) => obs.logRequest(requestContext), "logRequest");

    let result: Result<DispatchOutcome>;
    try {
      const { value: response, attempts } = await this.config.retryStrategy.execute(
        async () => {
          const response = await this.send(descriptor);
          if (ErrorMapper.isTransientStatus(response.status)) {
            throw new TransientStatusFailure(response);
          }
          return response;
        },
        idempotencyLevel,
        (failure, maxAttempts) => this.reportFailedAttempt(requestId, method, endpoint, failure, maxAttempts)
      );
      result = this.complete(descriptor, response, attempts, options, requestId);
    } catch (error) {
      result = this.fromFailure(descriptor, error, options, requestId);
    }

    const duration = Date.now() - startTime;
    if (result.ok) {
      this.recordSuccess(method, endpoint, requestId, result.value, duration);
    } else {
      this.recordFailure(method, endpoint, requestId, result.error, duration);
    }
    return result;
  }

  private reportFailedAttempt(
    requestId: string,
    method: HttpMethod,
    endpoint: string,
    failure: FailedAttempt,
    maxAttempts: number
  ): void {
    this.warn(
      `The ${method} request failed (Attempt ${failure.attempt} of ${maxAttempts}): ${failure.message}`,
      {
        kind: "failed_attempt",
        requestId,
        endpoint,
        attempt: failure.attempt,
        maxAttempts,
        errorType: failure.errorType,
        ...(failure.status !== undefined ? { status: failure.status } : {}),
      }
    );
  }

  /**
   * Decodes a finished response and applies the status policy.
   */
  private complete(
    descriptor: RequestDescriptor,
    response: RawResponse,
    attempts: number,
    options: DispatchOptions,
    requestId: string
  ): Result<DispatchOutcome> {
    const body = this.decode(response, descriptor.expectJson, requestId);
    if (!response.ok && !options.allowErrorStatus) {
      return err(ErrorMapper.toRequestError(descriptor.method, response, body, attempts));
    }
    return ok({ response, body, attempts });
  }

  private fromFailure(
    descriptor: RequestDescriptor,
    error: unknown,
    options: DispatchOptions,
    requestId: string
  ): Result<DispatchOutcome> {
    if (error instanceof RetryExhaustedError) {
      const last = error.lastError;
      if (last instanceof TransientStatusFailure) {
        return this.complete(descriptor, last.response, error.failures.length, options, requestId);
      }
      const { message } = ErrorMapper.describeTransportError(last);
      return err(
        new APIConnectionError({
          method: descriptor.method,
          url: sanitizeUrl(descriptor.url, this.config.sanitizerOptions),
          failedAttempts: error.failures,
          lastError: message,
          cause: last,
        })
      );
    }

    if (error instanceof CommunityError) {
      return err(error);
    }

    return err(
      new CommunityError(
        `The ${descriptor.method} request could not be sent: ${error instanceof Error ? error.message : String(error)}`,
        { category: "request", cause: error }
      )
    );
  }

  /**
   * Attempts JSON decoding when requested. A body that fails to decode is
   * returned raw with a warning instead of an error.
   */
  private decode(response: RawResponse, expectJson: boolean, requestId: string): ParsedBody {
    if (!expectJson || response.text.trim() === "") {
      return { kind: "raw" };
    }
    try {
      return { kind: "json", value: response.json() };
    } catch (error) {
      const decodeError = error instanceof Error ? error.message : String(error);
      this.warn("The API response could not be converted to JSON and is returned unparsed.", {
        kind: "decode_failure",
        requestId,
        status: response.status,
        decodeError,
      });
      return { kind: "raw", decodeError };
    }
  }

  /**
   * One HTTP round trip. Network failures and timeouts become TransportFailure.
   */
  private async send(descriptor: RequestDescriptor): Promise<RawResponse> {
    const timeout = this.config.timeout;
    const fetchImpl: FetchLike = this.config.fetch ?? ((input, init) => fetch(input, init));
    const headers = toFetchHeaders(descriptor.headers);

    const init: RequestInit = { method: descriptor.method, headers };
    const body = descriptor.body;
    if (body) {
      switch (body.kind) {
        case "json":
          init.body = JSON.stringify(body.payload);
          break;
        case "multipart":
          // The transport writes the boundary
          delete headers["content-type"];
          init.body = body.form;
          break;
        case "text":
          headers["content-type"] ??= "text/plain";
          init.body = body.text;
          break;
        case "form": {
          const params = new URLSearchParams();
          for (const [key, value] of Object.entries(body.fields)) {
            params.append(key, String(value));
          }
          headers["content-type"] = "application/x-www-form-urlencoded";
          init.body = params.toString();
          break;
        }
      }
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    init.signal = controller.signal;

    try {
      const response = await fetchImpl(descriptor.url, init);
      const text = await response.text();
      return toRawResponse(response.status, response.url || descriptor.url, response.headers, text);
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TransportFailure(`Request timeout after ${timeout}ms`, "Timeout", error);
      }
      const { errorType, message } = ErrorMapper.describeTransportError(error);
      throw new TransportFailure(message, errorType, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private recordSuccess(
    method: HttpMethod,
    endpoint: string,
    requestId: string,
    outcome: DispatchOutcome,
    duration: number
  ): void {
    const responseContext: ResponseContext = {
      endpoint,
      method,
      requestId,
      statusCode: outcome.response.status,
      attempts: outcome.attempts,
      duration,
      timestamp: new Date(),
    };
    this.safelyBroadcastObservability((obs) => obs.logResponse(responseContext), "logResponse");

    this.safelyBroadcastObservability(
      (obs) => obs.recordMetric(sanitizeMetric({
        name: "community.request.count",
        value: 1,
        tags: { method, status: String(outcome.response.status) },
        timestamp: new Date(),
      }, this.config.sanitizerOptions)),
      "recordMetric:request.count"
    );

    this.safelyBroadcastObservability(
      (obs) => obs.recordMetric(sanitizeMetric({
        name: "community.request.duration",
        value: duration,
        tags: { method },
        timestamp: new Date(),
      }, this.config.sanitizerOptions)),
      "recordMetric:request.duration"
    );
  }

  private recordFailure(
    method: HttpMethod,
    endpoint: string,
    requestId: string,
    error: CommunityError,
    duration: number
  ): void {
    const errorContext: ErrorContext = {
      endpoint,
      method,
      requestId,
      error,
      duration,
      timestamp: new Date(),
    };
    this.safelyBroadcastObservability((obs) => obs.logError(errorContext), "logError");

    this.safelyBroadcastObservability(
      (obs) => obs.recordMetric(sanitizeMetric({
        name: "community.request.error",
        value: 1,
        tags: { method, errorCategory: error.category },
        timestamp: new Date(),
      }, this.config.sanitizerOptions)),
      "recordMetric:request.error"
    );
  }
}
