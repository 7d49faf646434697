/**
 * Helper file loading
 *
 * A helper file keeps connection and auth settings outside the code:
 * ```json
 * {
 *   "connection": {
 *     "community_url": "https://community.example.com",
 *     "tenant_id": "example-tenant",
 *     "default_auth_type": "session_auth",
 *     "session_auth": { "username": "api-user", "password": "test-secret" }
 *   },
 *   "prefer_json": true,
 *   "translate_errors": "yes"
 * }
 * ```
 */

import { readFile } from "fs/promises";
import { extname } from "path";
import { z } from "zod";
import {
  InvalidConfigurationError,
  InvalidHelperFileTypeError,
  MissingAuthDataError,
} from "../core/errors.js";
import type { AuthSettings, CommunityClientConfig } from "./schema.js";

const flag = z.union([
  z.boolean(),
  z.enum(["yes", "no", "true", "false"]).transform((value) => value === "yes" || value === "true"),
]);

const helperSchema = z.object({
  connection: z.object({
    community_url: z.string().min(1, "community_url must not be empty"),
    tenant_id: z.string().optional(),
    default_auth_type: z.enum(["session_auth", "session_key", "oauth2", "sso"]).optional(),
    oauth2: z.object({ access_token: z.string().min(1) }).optional(),
    session_auth: z.object({ username: z.string().min(1), password: z.string().min(1) }).optional(),
    session_key: z.string().min(1).optional(),
    sso: z.object({ sso_token: z.string().min(1) }).optional(),
  }),
  prefer_json: flag.optional(),
  translate_errors: flag.optional(),
});

export type HelperFile = z.infer<typeof helperSchema>;

/**
 * Reads a JSON helper file into a client configuration.
 *
 * @throws {InvalidHelperFileTypeError} when the file is not `.json`
 * @throws {InvalidConfigurationError} when the contents do not validate
 */
export async function loadHelperFile(path: string): Promise<CommunityClientConfig> {
  if (extname(path).toLowerCase() !== ".json") {
    throw new InvalidHelperFileTypeError(path);
  }

  const contents = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new InvalidConfigurationError(
      [`${path}: ${error instanceof Error ? error.message : String(error)}`],
      "helper file"
    );
  }
  return parseHelperSettings(raw);
}

/**
 * Validates already-parsed helper settings.
 */
export function parseHelperSettings(raw: unknown): CommunityClientConfig {
  const result = helperSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      "helper file"
    );
  }

  const helper = result.data;
  const config: CommunityClientConfig = {
    communityUrl: helper.connection.community_url,
    auth: resolveHelperAuth(helper.connection),
  };
  if (helper.connection.tenant_id !== undefined) config.tenantId = helper.connection.tenant_id;
  if (helper.prefer_json !== undefined) config.preferJson = helper.prefer_json;
  if (helper.translate_errors !== undefined) config.translateErrors = helper.translate_errors;
  return config;
}

function resolveHelperAuth(connection: HelperFile["connection"]): AuthSettings {
  const type =
    connection.default_auth_type ??
    (connection.oauth2 ? "oauth2"
      : connection.session_key ? "session_key"
      : connection.session_auth ? "session_auth"
      : connection.sso ? "sso"
      : undefined);

  switch (type) {
    case "oauth2":
      if (connection.oauth2) return { type: "oauth2", accessToken: connection.oauth2.access_token };
      break;
    case "session_key":
      if (connection.session_key) return { type: "session-key", sessionKey: connection.session_key };
      break;
    case "session_auth":
      if (connection.session_auth) {
        return {
          type: "session-login",
          username: connection.session_auth.username,
          password: connection.session_auth.password,
        };
      }
      break;
    case "sso":
      if (connection.sso) return { type: "sso", ssoToken: connection.sso.sso_token };
      break;
    case undefined:
      break;
  }

  throw new MissingAuthDataError(
    type
      ? `The helper file selects '${type}' authentication but does not contain its credentials.`
      : "The helper file does not contain any authentication credentials."
  );
}
