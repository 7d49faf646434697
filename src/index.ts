/**
 * Community API client - main entry point
 */

import type {
  Delivery,
  DispatchOutcome,
  ObservabilityAdapter,
  RequestDescriptor,
  SessionContext,
  V1Result,
} from "./core/types.js";
import type { Result } from "./core/errors.js";
import { ApiRequester, type ApiRequestOptions, type V1RequestOptions } from "./core/api.js";
import { RequestDispatcher, type DispatchOptions } from "./core/dispatcher.js";
import { ErrorTranslator } from "./core/translations.js";
import { RetryStrategy } from "./strategies/retry.js";
import { IdempotencyResolver } from "./strategies/idempotency.js";
import { ConsoleObservability } from "./observability/console.js";
import { DEFAULT_TIMEOUT, validateConfig, type CommunityClientConfig } from "./config/schema.js";
import { loadEnvironmentConfig, type Environment, type EnvironmentVariableNames } from "./config/environment.js";
import { loadHelperFile } from "./config/helper.js";
import {
  SessionAuthenticator,
  createSessionContext,
  credentialsFor,
  withToken,
  type SessionContextInit,
} from "./auth/session.js";
import { LiqlClient } from "./liql/client.js";
import { BoardsResource } from "./resources/boards.js";
import { CategoriesResource } from "./resources/categories.js";
import { GrouphubsResource } from "./resources/grouphubs.js";
import { MessagesResource } from "./resources/messages.js";
import { NodesResource } from "./resources/nodes.js";
import { TagsResource } from "./resources/tags.js";
import { UsersResource } from "./resources/users.js";

type V2Call = (path: string, options?: ApiRequestOptions) => Promise<Delivery>;

export interface V2Client {
  get: V2Call;
  post: V2Call;
  put: V2Call;
  delete: V2Call;
}

export interface V1Client {
  request(endpoint: string, options?: V1RequestOptions): Promise<V1Result>;
}

/**
 * One configured, authenticated connection to a community.
 *
 * @example
 * ```typescript
 * const client = await CommunityClient.create({
 *   communityUrl: "https://community.example.com",
 *   auth: { type: "oauth2", accessToken: process.env.COMMUNITY_OAUTH2_TOKEN ?? "" },
 * });
 * const id = await client.boards.create({ id: "ideas", title: "Ideas", discussionStyle: "idea" }, { returnId: true });
 * ```
 */
export class CommunityClient {
  readonly v2: V2Client;
  readonly v1: V1Client;
  readonly liql: LiqlClient;
  readonly boards: BoardsResource;
  readonly categories: CategoriesResource;
  readonly grouphubs: GrouphubsResource;
  readonly messages: MessagesResource;
  readonly nodes: NodesResource;
  readonly tags: TagsResource;
  readonly users: UsersResource;

  private api: ApiRequester;
  private dispatcher: RequestDispatcher;
  private authenticator: SessionAuthenticator;

  private constructor(api: ApiRequester, dispatcher: RequestDispatcher) {
    this.api = api;
    this.dispatcher = dispatcher;
    this.authenticator = new SessionAuthenticator(dispatcher);

    this.v2 = {
      get: (path, options) => api.v2("GET", path, options),
      post: (path, options) => api.v2("POST", path, options),
      put: (path, options) => api.v2("PUT", path, options),
      delete: (path, options) => api.v2("DELETE", path, options),
    };
    this.v1 = {
      request: (endpoint, options) => api.v1(endpoint, options),
    };

    this.liql = new LiqlClient(api);
    this.boards = new BoardsResource(api, this.liql);
    this.categories = new CategoriesResource(api, this.liql);
    this.grouphubs = new GrouphubsResource(api, this.liql);
    this.messages = new MessagesResource(api);
    this.nodes = new NodesResource(this.liql);
    this.tags = new TagsResource(api, this.liql);
    this.users = new UsersResource(api, this.liql);
  }

  /**
   * Validates the configuration, resolves the session (logging in for
   * `session-login`) and wires every resource.
   *
   * @throws {InvalidConfigurationError} when the configuration does not validate
   * @throws {POSTRequestError} when a session login is rejected
   */
  static async create(config: CommunityClientConfig): Promise<CommunityClient> {
    validateConfig(config);

    const observability: ObservabilityAdapter[] = Array.isArray(config.observability)
      ? config.observability
      : config.observability
        ? [config.observability]
        : [new ConsoleObservability()];

    const dispatcher = new RequestDispatcher({
      retryStrategy: new RetryStrategy(config.retry),
      idempotencyResolver: new IdempotencyResolver(config.idempotency),
      observability,
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      ...(config.fetch ? { fetch: config.fetch } : {}),
      ...(config.sanitizer ? { sanitizerOptions: config.sanitizer } : {}),
    });

    const init: Omit<SessionContextInit, "authType" | "token"> = { communityUrl: config.communityUrl };
    if (config.tenantId !== undefined) init.tenantId = config.tenantId;
    if (config.preferJson !== undefined) init.preferJson = config.preferJson;
    if (config.translateErrors !== undefined) init.translateErrors = config.translateErrors;
    if (config.v1BasePath !== undefined) init.v1BasePath = config.v1BasePath;

    let session: SessionContext;
    if (config.auth.type === "session-login") {
      // The login endpoint needs the v1 base before a key exists
      const pending = createSessionContext({ ...init, authType: "session-key", token: "pending" });
      const sessionKey = await new SessionAuthenticator(dispatcher).login(
        pending,
        config.auth.username,
        config.auth.password
      );
      session = withToken(pending, sessionKey);
    } else {
      session = createSessionContext({ ...init, ...credentialsFor(config.auth) });
    }

    const translator = new ErrorTranslator(config.errorTranslations);
    return new CommunityClient(new ApiRequester(session, dispatcher, translator), dispatcher);
  }

  /**
   * Builds a client from environment variables, with optional overrides.
   */
  static async fromEnvironment(
    env: Environment = process.env,
    overrides: Partial<CommunityClientConfig> = {},
    names: Partial<EnvironmentVariableNames> = {}
  ): Promise<CommunityClient> {
    return CommunityClient.create({ ...loadEnvironmentConfig(env, names), ...overrides });
  }

  /**
   * Builds a client from a JSON helper file, with optional overrides.
   */
  static async fromHelperFile(
    path: string,
    overrides: Partial<CommunityClientConfig> = {}
  ): Promise<CommunityClient> {
    return CommunityClient.create({ ...(await loadHelperFile(path)), ...overrides });
  }

  get session(): SessionContext {
    return this.api.context;
  }

  /**
   * Replaces the token used on every later request.
   */
  refreshSession(token: string): SessionContext {
    const next = withToken(this.api.context, token);
    this.api.useSession(next);
    return next;
  }

  /**
   * Logs the current session out on the server.
   */
  async invalidateSession(): Promise<void> {
    await this.authenticator.invalidate(this.api.context);
  }

  /**
   * Dispatches a prebuilt request and throws on failure.
   */
  async dispatch(descriptor: RequestDescriptor, options?: DispatchOptions): Promise<DispatchOutcome> {
    return this.dispatcher.dispatch(descriptor, options);
  }

  async dispatchSafe(descriptor: RequestDescriptor, options?: DispatchOptions): Promise<Result<DispatchOutcome>> {
    return this.dispatcher.dispatchSafe(descriptor, options);
  }

  /**
   * Builds a v2 request descriptor against this client's session.
   */
  describe(method: RequestDescriptor["method"], path: string, options?: ApiRequestOptions): RequestDescriptor {
    return this.api.describe(method, path, options);
  }
}
