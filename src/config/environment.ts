/**
 * Configuration from environment variables
 */

import { InvalidConfigurationError, MissingAuthDataError } from "../core/errors.js";
import type { AuthSettings, AuthSettingsType, CommunityClientConfig } from "./schema.js";

export interface EnvironmentVariableNames {
  communityUrl: string;
  tenantId: string;
  defaultAuth: string;
  oauth2Token: string;
  sessionKey: string;
  sessionUser: string;
  sessionPassword: string;
  ssoToken: string;
  preferJson: string;
  translateErrors: string;
}

export const DEFAULT_ENVIRONMENT_VARIABLES: Readonly<EnvironmentVariableNames> = {
  communityUrl: "COMMUNITY_URL",
  tenantId: "COMMUNITY_TENANT_ID",
  defaultAuth: "COMMUNITY_DEFAULT_AUTH",
  oauth2Token: "COMMUNITY_OAUTH2_TOKEN",
  sessionKey: "COMMUNITY_SESSION_KEY",
  sessionUser: "COMMUNITY_SESSION_USER",
  sessionPassword: "COMMUNITY_SESSION_PW",
  ssoToken: "COMMUNITY_SSO_TOKEN",
  preferJson: "COMMUNITY_PREFER_JSON",
  translateErrors: "COMMUNITY_TRANSLATE_ERRORS",
};

export type Environment = Record<string, string | undefined>;

const TRUE_VALUES = new Set(["yes", "true", "1", "on"]);
const FALSE_VALUES = new Set(["no", "false", "0", "off"]);
const AUTH_TYPES: ReadonlySet<string> = new Set<AuthSettingsType>(["session-key", "session-login", "oauth2", "sso"]);

function isAuthType(value: string): value is AuthSettingsType {
  return AUTH_TYPES.has(value);
}

/**
 * Reads a yes/no style flag. Returns undefined when the variable is unset.
 */
export function parseBoolean(value: string | undefined, name: string): boolean | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new InvalidConfigurationError([`${name}: '${value}' is not a boolean value`], "environment");
}

/**
 * Builds a client configuration from environment variables.
 *
 * When the default auth variable is unset the auth type is taken from the
 * first credential found, in the order OAuth token, session key, session
 * login, SSO token.
 *
 * @example
 * ```typescript
 * const config = loadEnvironmentConfig(process.env, { communityUrl: "MY_COMMUNITY_URL" });
 * ```
 */
export function loadEnvironmentConfig(
  env: Environment = process.env,
  names: Partial<EnvironmentVariableNames> = {}
): CommunityClientConfig {
  const vars: EnvironmentVariableNames = { ...DEFAULT_ENVIRONMENT_VARIABLES, ...names };
  const read = (key: keyof EnvironmentVariableNames): string | undefined => {
    const value = env[vars[key]]?.trim();
    return value === "" ? undefined : value;
  };

  const communityUrl = read("communityUrl");
  if (communityUrl === undefined) {
    throw new InvalidConfigurationError([`${vars.communityUrl} is not set`], "environment");
  }

  const config: CommunityClientConfig = {
    communityUrl,
    auth: resolveAuth(read, vars),
  };

  const tenantId = read("tenantId");
  if (tenantId !== undefined) config.tenantId = tenantId;

  const preferJson = parseBoolean(read("preferJson"), vars.preferJson);
  if (preferJson !== undefined) config.preferJson = preferJson;

  const translateErrors = parseBoolean(read("translateErrors"), vars.translateErrors);
  if (translateErrors !== undefined) config.translateErrors = translateErrors;

  return config;
}

function resolveAuth(
  read: (key: keyof EnvironmentVariableNames) => string | undefined,
  vars: EnvironmentVariableNames
): AuthSettings {
  const requested = read("defaultAuth")?.toLowerCase();
  if (requested !== undefined && !isAuthType(requested)) {
    throw new InvalidConfigurationError(
      [`${vars.defaultAuth}: '${requested}' is not one of session-key, session-login, oauth2, sso`],
      "environment"
    );
  }

  const accessToken = read("oauth2Token");
  const sessionKey = read("sessionKey");
  const username = read("sessionUser");
  const password = read("sessionPassword");
  const ssoToken = read("ssoToken");

  const type: AuthSettingsType | undefined =
    requested ??
    (accessToken !== undefined ? "oauth2"
      : sessionKey !== undefined ? "session-key"
      : username !== undefined || password !== undefined ? "session-login"
      : ssoToken !== undefined ? "sso"
      : undefined);

  switch (type) {
    case "oauth2":
      if (accessToken !== undefined) return { type, accessToken };
      throw new MissingAuthDataError(`${vars.oauth2Token} is required for OAuth 2.0 authentication.`);
    case "session-key":
      if (sessionKey !== undefined) return { type, sessionKey };
      throw new MissingAuthDataError(`${vars.sessionKey} is required for session key authentication.`);
    case "session-login":
      if (username !== undefined && password !== undefined) return { type, username, password };
      throw new MissingAuthDataError(
        `${vars.sessionUser} and ${vars.sessionPassword} are required for session authentication.`
      );
    case "sso":
      if (ssoToken !== undefined) return { type, ssoToken };
      throw new MissingAuthDataError(`${vars.ssoToken} is required for SSO authentication.`);
    case undefined:
      throw new MissingAuthDataError("No authentication credentials were found in the environment.");
  }
}
