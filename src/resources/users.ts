/**
 * Users
 */

import type { Delivery, ReturnFields } from "../core/types.js";
import {
  FeatureNotConfiguredError,
  MissingRequiredDataError,
  UserCreationError,
} from "../core/errors.js";
import { ErrorMapper } from "../core/error-mapper.js";
import { ResponseNormalizer, toInteger } from "../core/normalizer.js";
import type { ApiRequester } from "../core/api.js";
import type { LiqlClient } from "../liql/client.js";
import type { WhereRecord } from "../liql/query.js";

export interface UserSettings {
  login: string;
  email: string;
  password?: string;
  firstName?: string;
  lastName?: string;
  biography?: string;
  ssoId?: string;
  webPageUrl?: string;
  coverImage?: string;
}

export interface UserPayload {
  data: { type: "user" } & Record<string, string>;
}

/**
 * Identifies a user for an id lookup.
 */
export type UserLookup =
  | { login: string }
  | { email: string }
  | { firstName: string; lastName: string };

const FEATURE_NOT_CONFIGURED = "Feature is not configured";

export function structureUserPayload(settings: UserSettings): UserPayload {
  if (!settings.login || !settings.email) {
    throw new MissingRequiredDataError("The 'login' and 'email' fields are required to create a user.");
  }

  const data: UserPayload["data"] = { type: "user", login: settings.login, email: settings.email };
  const optional: Array<[string, string | undefined]> = [
    ["password", settings.password],
    ["first_name", settings.firstName],
    ["last_name", settings.lastName],
    ["biography", settings.biography],
    ["sso_id", settings.ssoId],
    ["web_page_url", settings.webPageUrl],
    ["cover_image", settings.coverImage],
  ];
  for (const [key, value] of optional) {
    if (value) data[key] = value;
  }
  return { data };
}

function lookupConditions(lookup: UserLookup): WhereRecord {
  if ("login" in lookup) return { login: lookup.login };
  if ("email" in lookup) return { email: lookup.email };
  return { first_name: lookup.firstName, last_name: lookup.lastName };
}

/**
 * Reads the feature name out of a `... (identifier: name)` style message.
 */
function featureIdentifier(text: string): string | undefined {
  return /identifier:\s*([^\s")]+)/.exec(text)?.[1];
}

export class UsersResource {
  private api: ApiRequester;
  private liql: LiqlClient;

  constructor(api: ApiRequester, liql: LiqlClient) {
    this.api = api;
    this.liql = liql;
  }

  /**
   * @throws {UserCreationError} when the API rejects the user, unless `ignoreExceptions` is set
   */
  async create(
    settings: UserSettings,
    options: ReturnFields & { ignoreExceptions?: boolean } = {}
  ): Promise<Delivery> {
    const { ignoreExceptions = false, ...fields } = options;
    const exchange = await this.api.v2Exchange("POST", "/users", { ...fields, json: structureUserPayload(settings) });

    if (exchange.result.status === "error" && !ignoreExceptions) {
      const message = exchange.result.errorMessage;
      throw new UserCreationError(settings.login, typeof message === "string" ? message : message?.join(" - "));
    }
    return this.api.deliver(exchange, fields);
  }

  /**
   * Deletes a user. Sent once; a DELETE is never retried.
   *
   * @throws {FeatureNotConfiguredError} when user deletion is disabled for the community
   */
  async delete(userId: string, fields: ReturnFields = {}): Promise<Delivery> {
    if (!userId) {
      throw new MissingRequiredDataError("A user ID is required to delete a user.");
    }
    const exchange = await this.api.v2Exchange("DELETE", `/users/${encodeURIComponent(userId)}`, fields);
    const { response, body, attempts } = exchange.outcome;

    if (response.status === 403 && response.text.includes(FEATURE_NOT_CONFIGURED)) {
      throw new FeatureNotConfiguredError(featureIdentifier(response.text));
    }
    if (!response.ok && !ResponseNormalizer.wantsStructuredResult(fields)) {
      throw ErrorMapper.toRequestError("DELETE", response, body, attempts);
    }
    return this.api.deliver(exchange, fields);
  }

  async getUserId(lookup: UserLookup): Promise<string | undefined> {
    const [item] = await this.liql.queryItems({
      select: "id",
      from: "users",
      where: lookupConditions(lookup),
      limit: 1,
    });
    const id = item?.id;
    if (typeof id === "number") return String(id);
    return typeof id === "string" ? id : undefined;
  }

  /**
   * Number of users currently signed in, from the v1 API.
   */
  async getOnlineUserCount(): Promise<number> {
    const result = await this.api.v1("users/online/count");
    return toInteger(result.value) ?? 0;
  }
}
