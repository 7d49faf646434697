/**
 * Message tags
 */

import { InvalidPayloadValueError, POSTRequestError, type RequestErrorDetails } from "../core/errors.js";
import { ErrorMapper } from "../core/error-mapper.js";
import type { ApiRequester } from "../core/api.js";
import type { LiqlClient } from "../liql/client.js";

export interface TagItem {
  type: "tag";
  text: string;
}

export interface TagOptions {
  /** Throw POSTRequestError instead of warning when the API rejects a tag */
  allowExceptions?: boolean;
}

export function structureSingleTagPayload(text: string): { data: TagItem } {
  if (text.trim() === "") {
    throw new InvalidPayloadValueError("text", text);
  }
  return { data: { type: "tag", text } };
}

export function structureTagsForMessage(...tags: string[]): TagItem[] {
  return tags.map((text) => ({ type: "tag", text }));
}

export class TagsResource {
  private api: ApiRequester;
  private liql: LiqlClient;

  constructor(api: ApiRequester, liql: LiqlClient) {
    this.api = api;
    this.liql = liql;
  }

  /**
   * Adds one tag to an existing message and reports whether it was accepted.
   */
  async addSingleTagToMessage(tag: string, messageId: string, options: TagOptions = {}): Promise<boolean> {
    const payload = structureSingleTagPayload(tag);
    const { result, outcome } = await this.api.v2Exchange(
      "POST",
      `/messages/${encodeURIComponent(messageId)}/tags`,
      { json: payload }
    );
    if (result.status === "success") {
      return true;
    }

    const apiMessage = ErrorMapper.extractErrorMessage(outcome.response, outcome.body);
    if (options.allowExceptions) {
      const details: RequestErrorDetails = { statusCode: result.httpCode, attempts: outcome.attempts };
      if (apiMessage !== undefined) details.apiMessage = apiMessage;
      throw new POSTRequestError(details);
    }
    this.api.warn(`The tag '${tag}' could not be added to message ${messageId}: ${apiMessage ?? "unknown error"}`, {
      kind: "tag_rejected",
      messageId,
      status: result.httpCode,
    });
    return false;
  }

  /**
   * Adds tags one request at a time, in order.
   */
  async addTagsToMessage(tags: string | readonly string[], messageId: string, options: TagOptions = {}): Promise<boolean[]> {
    const results: boolean[] = [];
    for (const tag of typeof tags === "string" ? [tags] : tags) {
      results.push(await this.addSingleTagToMessage(tag, messageId, options));
    }
    return results;
  }

  async getTagsForMessage(messageId: string): Promise<string[]> {
    const items = await this.liql.queryItems({
      select: "text",
      from: "tags",
      where: [["messages.id", messageId]],
    });
    return items
      .map((item) => item.text)
      .filter((text): text is string => typeof text === "string");
  }
}
