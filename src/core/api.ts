/**
 * Versioned API requests
 *
 * Builds request descriptors against the v1 and v2 bases of a session, hands
 * them to the dispatcher and normalizes what comes back.
 */

import type {
  Delivery,
  DispatchOutcome,
  HeaderMap,
  HttpMethod,
  NormalizedResult,
  RequestBody,
  RequestDescriptor,
  ReturnFields,
  SessionContext,
  V1Result,
} from "./types.js";
import {
  PayloadMismatchError,
  ok,
  requestErrorFor,
  unwrap,
  type RequestErrorDetails,
  type Result,
} from "./errors.js";
import { buildHeaders, type HeaderOptions } from "./headers.js";
import { appendJsonFormat, appendQuery, joinUrl } from "./urls.js";
import { MultipartFormBuilder } from "./multipart.js";
import { ResponseNormalizer, type NormalizeOptions } from "./normalizer.js";
import { ErrorTranslator, defaultTranslator } from "./translations.js";
import type { RequestDispatcher } from "./dispatcher.js";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type FormFields = Record<string, string | number | boolean>;

export interface ApiRequestOptions extends ReturnFields {
  json?: unknown;
  multipart?: FormData | MultipartFormBuilder;
  text?: string;
  form?: FormFields;
  query?: QueryParams;
  headers?: HeaderMap;
  /** Attempt to decode the response as JSON (default: true) */
  expectJson?: boolean;
}

export interface V1RequestOptions {
  method?: HttpMethod;
  params?: QueryParams;
  form?: FormFields;
  headers?: HeaderMap;
  /** Throw the verb-specific error when the v1 status is not success (default: true) */
  raiseOnError?: boolean;
}

/**
 * A v2 call that was allowed to finish with an error status.
 */
export interface V2Exchange {
  result: NormalizedResult;
  outcome: DispatchOutcome;
}

export class ApiRequester {
  private session: SessionContext;
  private dispatcher: RequestDispatcher;
  private translator: ErrorTranslator;

  constructor(session: SessionContext, dispatcher: RequestDispatcher, translator: ErrorTranslator = defaultTranslator) {
    this.session = session;
    this.dispatcher = dispatcher;
    this.translator = translator;
  }

  get context(): SessionContext {
    return this.session;
  }

  /**
   * Swaps in a refreshed session. The previous context is left untouched.
   */
  useSession(session: SessionContext): void {
    this.session = session;
  }

  warn(message: string, metadata: Record<string, unknown> = {}): void {
    this.dispatcher.warn(message, metadata);
  }

  /**
   * Builds the descriptor for a v2 call. Relative paths resolve against the v2 base.
   */
  describe(method: HttpMethod, path: string, options: ApiRequestOptions = {}): RequestDescriptor {
    const body = this.resolveBody(options);
    const url = appendQuery(joinUrl(this.session.v2Base, path), options.query ?? {});

    const headerOptions: HeaderOptions = { multipart: body?.kind === "multipart" };
    if (options.headers) headerOptions.headers = options.headers;
    if (body?.kind === "text") headerOptions.contentType = "text/plain";
    if (body?.kind === "form") headerOptions.contentType = null;

    const descriptor: RequestDescriptor = {
      method,
      url,
      headers: buildHeaders(this.session, headerOptions),
      expectJson: options.expectJson ?? true,
    };
    if (body) {
      descriptor.body = body;
    }
    return descriptor;
  }

  /**
   * Performs a v2 call and delivers the requested projection. Non-2xx
   * responses throw unless return fields were requested.
   */
  async v2(method: HttpMethod, path: string, options: ApiRequestOptions = {}): Promise<Delivery> {
    return unwrap(await this.v2Safe(method, path, options));
  }

  async v2Safe(method: HttpMethod, path: string, options: ApiRequestOptions = {}): Promise<Result<Delivery>> {
    const allowErrorStatus = ResponseNormalizer.wantsStructuredResult(options);
    const outcome = await this.dispatcher.dispatchSafe(this.describe(method, path, options), { allowErrorStatus });
    if (!outcome.ok) {
      return outcome;
    }
    return ok(this.deliver({ result: this.normalize(outcome.value, options), outcome: outcome.value }, options));
  }

  /**
   * Performs a v2 call that never throws on an error status, for callers that
   * inspect the normalized result before deciding.
   */
  async v2Exchange(method: HttpMethod, path: string, options: ApiRequestOptions = {}): Promise<V2Exchange> {
    const outcome = await this.dispatcher.dispatch(this.describe(method, path, options), { allowErrorStatus: true });
    return { result: this.normalize(outcome, options), outcome };
  }

  /**
   * Performs a v2 call and returns the decoded outcome as-is. Non-2xx responses throw.
   */
  async request(method: HttpMethod, path: string, options: ApiRequestOptions = {}): Promise<DispatchOutcome> {
    return this.dispatcher.dispatch(this.describe(method, path, options));
  }

  deliver(exchange: V2Exchange, fields: ReturnFields): Delivery {
    return ResponseNormalizer.deliver(exchange.result, fields, exchange.outcome.response);
  }

  /**
   * Performs a v1 call. Relative endpoints resolve against the v1 base.
   */
  async v1(endpoint: string, options: V1RequestOptions = {}): Promise<V1Result> {
    const method = options.method ?? "GET";
    let url = appendQuery(joinUrl(this.session.v1Base, endpoint), options.params ?? {});
    if (this.session.preferJson) {
      url = appendJsonFormat(url);
    }

    const headerOptions: HeaderOptions = { contentType: null };
    if (options.headers) headerOptions.headers = options.headers;

    const descriptor: RequestDescriptor = {
      method,
      url,
      headers: buildHeaders(this.session, headerOptions),
      expectJson: this.session.preferJson,
    };
    if (options.form) {
      descriptor.body = { kind: "form", fields: options.form };
    }

    const outcome = await this.dispatcher.dispatch(descriptor, { allowErrorStatus: true });
    const result = ResponseNormalizer.normalizeV1(outcome.response, outcome.body);

    if (result.status === "error" && options.raiseOnError !== false) {
      const details: RequestErrorDetails = {
        statusCode: result.httpCode,
        attempts: outcome.attempts,
        metadata: { errorCode: result.errorCode },
      };
      if (result.errorMessage !== undefined) details.apiMessage = result.errorMessage;
      throw requestErrorFor(method, details);
    }
    return result;
  }

  private normalize(outcome: DispatchOutcome, fields: ReturnFields): NormalizedResult {
    const options: NormalizeOptions = {
      translateErrors: this.session.translateErrors,
      translator: this.translator,
    };
    if (fields.splitErrors !== undefined) options.splitErrors = fields.splitErrors;
    return ResponseNormalizer.normalizeV2(outcome.response, outcome.body, options);
  }

  private resolveBody(options: ApiRequestOptions): RequestBody | undefined {
    const bodies: RequestBody[] = [];
    if (options.json !== undefined) {
      bodies.push({ kind: "json", payload: options.json });
    }
    if (options.multipart !== undefined) {
      const form = options.multipart instanceof MultipartFormBuilder ? options.multipart.build() : options.multipart;
      bodies.push({ kind: "multipart", form });
    }
    if (options.text !== undefined) {
      bodies.push({ kind: "text", text: options.text });
    }
    if (options.form !== undefined) {
      bodies.push({ kind: "form", fields: options.form });
    }

    if (bodies.length > 1) {
      throw new PayloadMismatchError(bodies.map((body) => body.kind));
    }
    return bodies[0];
  }
}
