/**
 * Messages
 */

import type { Delivery, ReturnFields } from "../core/types.js";
import { MissingRequiredDataError } from "../core/errors.js";
import type { ApiRequester } from "../core/api.js";
import { MultipartFormBuilder } from "../core/multipart.js";
import { buildAttachmentParts, formatAttachmentPayload, type Attachment } from "./attachments.js";
import { resolveNodeId, type NodeRef } from "./nodes.js";
import { structureTagsForMessage } from "./tags.js";

export interface MessageSettings {
  subject: string;
  body?: string;
  /** Board the message is posted to */
  node: NodeRef;
  tags?: string[];
  labels?: string[];
}

export interface MessagePayload {
  data: { type: "message" } & Record<string, unknown>;
}

export function structureMessagePayload(
  settings: MessageSettings,
  attachments: readonly Attachment[] = []
): MessagePayload {
  if (!settings.subject) {
    throw new MissingRequiredDataError("A subject is required to create a message.");
  }

  const data: MessagePayload["data"] = {
    type: "message",
    subject: settings.subject,
    board: { id: resolveNodeId(settings.node) },
  };
  if (settings.body) data.body = settings.body;
  if (settings.tags && settings.tags.length > 0) {
    data.tags = { items: structureTagsForMessage(...settings.tags) };
  }
  if (settings.labels && settings.labels.length > 0) {
    data.labels = { items: settings.labels.map((text) => ({ type: "label", text })) };
  }
  if (attachments.length > 0) {
    data.attachments = formatAttachmentPayload(attachments);
  }
  return { data };
}

export class MessagesResource {
  private api: ApiRequester;

  constructor(api: ApiRequester) {
    this.api = api;
  }

  /**
   * Posts a message. Attachments turn the request into a multipart upload
   * with the payload in the `api.request` part.
   */
  async create(
    settings: MessageSettings,
    options: ReturnFields & { attachments?: readonly Attachment[] } = {}
  ): Promise<Delivery> {
    const { attachments = [], ...fields } = options;
    const payload = structureMessagePayload(settings, attachments);

    if (attachments.length === 0) {
      return this.api.v2("POST", "/messages", { ...fields, json: payload });
    }

    const form = MultipartFormBuilder.create().addJson("api.request", payload);
    await buildAttachmentParts(form, attachments);
    return this.api.v2("POST", "/messages", { ...fields, multipart: form });
  }
}
