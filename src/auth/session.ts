/**
 * Session context and session-key authentication
 */

import type { AuthType, RequestDescriptor, SessionContext } from "../core/types.js";
import { MissingAuthDataError, POSTRequestError, type RequestErrorDetails } from "../core/errors.js";
import { buildHeaders } from "../core/headers.js";
import { appendJsonFormat, joinUrl, normalizeBaseUrl } from "../core/urls.js";
import { ResponseNormalizer } from "../core/normalizer.js";
import type { RequestDispatcher } from "../core/dispatcher.js";
import { DEFAULT_V1_BASE_PATH, type AuthSettings } from "../config/schema.js";

export const V2_BASE_PATH = "/api/2.0";

export interface SessionContextInit {
  communityUrl: string;
  tenantId?: string;
  authType: AuthType;
  token: string;
  preferJson?: boolean;
  translateErrors?: boolean;
  v1BasePath?: string;
}

/**
 * Validates the community URL, derives both API bases and freezes the result.
 *
 * @throws {InvalidURLError} for a URL that is not http or https
 * @throws {MissingAuthDataError} for an empty token
 */
export function createSessionContext(init: SessionContextInit): SessionContext {
  const communityUrl = normalizeBaseUrl(init.communityUrl);
  if (init.token.trim() === "") {
    throw new MissingAuthDataError("A session cannot be created without an authentication token.");
  }

  return Object.freeze({
    communityUrl,
    v2Base: `${communityUrl}${V2_BASE_PATH}`,
    v1Base: joinUrl(communityUrl, init.v1BasePath ?? DEFAULT_V1_BASE_PATH),
    tenantId: init.tenantId,
    authType: init.authType,
    token: init.token,
    preferJson: init.preferJson ?? true,
    translateErrors: init.translateErrors ?? true,
  });
}

/**
 * Returns a new context carrying a refreshed token.
 */
export function withToken(context: SessionContext, token: string, authType: AuthType = context.authType): SessionContext {
  if (token.trim() === "") {
    throw new MissingAuthDataError("A session cannot be refreshed with an empty token.");
  }
  return Object.freeze({ ...context, token, authType });
}

export type TokenAuthSettings = Exclude<AuthSettings, { type: "session-login" }>;

/**
 * Maps token-bearing credentials onto a header scheme.
 */
export function credentialsFor(auth: TokenAuthSettings): { authType: AuthType; token: string } {
  switch (auth.type) {
    case "oauth2":
      return { authType: "oauth2", token: auth.accessToken };
    case "session-key":
      return { authType: "session-key", token: auth.sessionKey };
    case "sso":
      return { authType: "sso", token: auth.ssoToken };
  }
}

/**
 * Exchanges credentials for a session key on the v1 authentication endpoints.
 */
export class SessionAuthenticator {
  private dispatcher: RequestDispatcher;

  constructor(dispatcher: RequestDispatcher) {
    this.dispatcher = dispatcher;
  }

  /**
   * Logs in and returns the session key.
   *
   * @throws {MissingAuthDataError} when a credential is empty or no key comes back
   * @throws {POSTRequestError} when the login is rejected
   */
  async login(
    context: Pick<SessionContext, "v1Base">,
    username: string,
    password: string
  ): Promise<string> {
    if (username.trim() === "" || password === "") {
      throw new MissingAuthDataError("A username and password are required to log in.");
    }

    const descriptor: RequestDescriptor = {
      method: "POST",
      url: appendJsonFormat(joinUrl(context.v1Base, "authentication/sessions/login")),
      headers: {},
      body: { kind: "form", fields: { "user.login": username, "user.password": password } },
      expectJson: true,
    };

    const outcome = await this.dispatcher.dispatch(descriptor, { allowErrorStatus: true });
    const result = ResponseNormalizer.normalizeV1(outcome.response, outcome.body);

    if (result.status === "error") {
      const details: RequestErrorDetails = { statusCode: result.httpCode, attempts: outcome.attempts };
      if (result.errorMessage !== undefined) details.apiMessage = result.errorMessage;
      throw new POSTRequestError(details);
    }
    if (typeof result.value !== "string" || result.value === "") {
      throw new MissingAuthDataError("The login response did not contain a session key.");
    }
    return result.value;
  }

  /**
   * Ends the server-side session behind a context.
   */
  async invalidate(context: SessionContext): Promise<void> {
    const descriptor: RequestDescriptor = {
      method: "POST",
      url: appendJsonFormat(joinUrl(context.v1Base, "authentication/sessions/logout")),
      headers: buildHeaders(context, { contentType: null }),
      expectJson: true,
    };
    await this.dispatcher.dispatch(descriptor);
  }
}
