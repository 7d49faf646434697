/**
 * Group hubs
 */

import { readFile } from "fs/promises";
import { basename } from "path";
import type { Delivery, ReturnFields } from "../core/types.js";
import { InvalidPayloadValueError, MissingRequiredDataError } from "../core/errors.js";
import type { ApiRequester } from "../core/api.js";
import { MultipartFormBuilder, type MultipartContent } from "../core/multipart.js";
import type { LiqlClient } from "../liql/client.js";
import { DISCUSSION_STYLES } from "./boards.js";
import { resolveNodeId, type NodeRef } from "./nodes.js";

export const MEMBERSHIP_TYPES = ["open", "closed", "closed_hidden"] as const;

export type MembershipType = (typeof MEMBERSHIP_TYPES)[number];

/**
 * An avatar image, given as a file path or as in-memory content.
 */
export type AvatarSource = string | { content: MultipartContent; filename: string; contentType?: string };

export interface GrouphubSettings {
  id: string;
  title: string;
  description?: string;
  membershipType: string;
  /** Defaults to every discussion style */
  discussionStyles?: string[];
  parentCategoryId?: string;
}

export interface GrouphubPayload {
  grouphub: {
    id: string;
    title: string;
    description?: string;
    membership_type: MembershipType;
    conversation_styles: string[];
    parent_category?: { id: string };
  };
}

const MEMBERSHIP_TYPE_VALUES: ReadonlySet<string> = new Set(MEMBERSHIP_TYPES);
const DISCUSSION_STYLE_VALUES: ReadonlySet<string> = new Set(DISCUSSION_STYLES);

function isMembershipType(value: string): value is MembershipType {
  return MEMBERSHIP_TYPE_VALUES.has(value);
}

/**
 * @throws {MissingRequiredDataError} when the id, title or membership type is missing
 * @throws {InvalidPayloadValueError} for an unknown discussion style
 */
export function structureGrouphubPayload(settings: GrouphubSettings): GrouphubPayload {
  if (!settings.id || !settings.title) {
    throw new MissingRequiredDataError("The 'id' and 'title' fields are required to create a group hub.");
  }
  if (!isMembershipType(settings.membershipType)) {
    throw new MissingRequiredDataError(
      `The membership type must be one of ${MEMBERSHIP_TYPES.join(", ")} when creating a new group hub.`
    );
  }

  const styles = settings.discussionStyles ?? [...DISCUSSION_STYLES];
  if (styles.length === 0) {
    throw new MissingRequiredDataError("At least one discussion style must be defined when creating a new group hub.");
  }
  for (const style of styles) {
    if (!DISCUSSION_STYLE_VALUES.has(style)) {
      throw new InvalidPayloadValueError("conversation_styles", style);
    }
  }

  const payload: GrouphubPayload = {
    grouphub: {
      id: settings.id,
      title: settings.title,
      membership_type: settings.membershipType,
      conversation_styles: styles,
    },
  };
  if (settings.description) payload.grouphub.description = settings.description;
  if (settings.parentCategoryId) payload.grouphub.parent_category = { id: settings.parentCategoryId };
  return payload;
}

async function addAvatar(form: MultipartFormBuilder, avatar: AvatarSource): Promise<void> {
  if (typeof avatar === "string") {
    form.addFile("avatar", await readFile(avatar), basename(avatar));
    return;
  }
  form.addFile("avatar", avatar.content, avatar.filename, avatar.contentType);
}

export class GrouphubsResource {
  private api: ApiRequester;
  private liql: LiqlClient;

  constructor(api: ApiRequester, liql: LiqlClient) {
    this.api = api;
    this.liql = liql;
  }

  /**
   * Creates a group hub. With an avatar the request becomes multipart, with
   * the payload in the `api.request` part.
   */
  async create(
    settings: GrouphubSettings,
    options: ReturnFields & { avatar?: AvatarSource } = {}
  ): Promise<Delivery> {
    const { avatar, ...fields } = options;
    const payload = structureGrouphubPayload(settings);

    if (avatar === undefined) {
      return this.api.v2("POST", "/grouphubs", { ...fields, json: payload });
    }

    const form = MultipartFormBuilder.create().addJson("api.request", payload);
    await addAvatar(form, avatar);
    return this.api.v2("POST", "/grouphubs", { ...fields, multipart: form });
  }

  async updateTitle(ref: NodeRef, title: string, fields: ReturnFields = {}): Promise<Delivery> {
    if (!title) {
      throw new MissingRequiredDataError("A new title must be supplied.");
    }
    const id = resolveNodeId(ref);
    return this.api.v2("PUT", `/grouphubs/${encodeURIComponent(id)}`, {
      ...fields,
      json: { grouphub: { title } },
    });
  }

  async exists(ref: NodeRef): Promise<boolean> {
    return (await this.liql.getTotalCount("grouphubs", [["id", resolveNodeId(ref)]])) > 0;
  }

  async getTotalCount(): Promise<number> {
    return this.liql.getTotalCount("grouphubs");
  }
}
