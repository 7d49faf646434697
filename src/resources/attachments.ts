/**
 * Message attachments
 */

import { readFile } from "fs/promises";
import { basename } from "path";
import { DataMismatchError, MissingRequiredDataError } from "../core/errors.js";
import type { MultipartContent, MultipartFormBuilder } from "../core/multipart.js";

/**
 * One file to attach. `title` names the multipart part that carries it.
 * Content is read from `path` when not given directly.
 */
export interface Attachment {
  title: string;
  filename: string;
  path?: string;
  content?: MultipartContent;
  contentType?: string;
}

export interface AttachmentItem {
  type: "attachment";
  field: string;
  filename: string;
}

export interface AttachmentPayload {
  list_item_type: "attachment";
  items: AttachmentItem[];
}

function asList(value: string | readonly string[]): readonly string[] {
  return typeof value === "string" ? [value] : value;
}

/**
 * Pairs attachment titles with file paths, position by position.
 *
 * @throws {MissingRequiredDataError} when either side is empty
 * @throws {DataMismatchError} when the counts differ
 */
export function consolidateAttachments(
  titles: string | readonly string[],
  filePaths: string | readonly string[]
): Attachment[] {
  const titleList = asList(titles);
  const pathList = asList(filePaths);
  if (titleList.length === 0 || pathList.length === 0) {
    throw new MissingRequiredDataError("Missing required attachment data");
  }
  if (titleList.length !== pathList.length) {
    throw new DataMismatchError(["attachmentTitles", "filePaths"]);
  }
  return titleList.map((title, index) => {
    const path = pathList[index] ?? "";
    return { title, path, filename: basename(path) };
  });
}

export function formatAttachmentPayload(attachments: readonly Attachment[]): AttachmentPayload {
  if (attachments.length === 0) {
    throw new MissingRequiredDataError("Missing required attachment data");
  }
  return {
    list_item_type: "attachment",
    items: attachments.map((attachment) => ({
      type: "attachment",
      field: attachment.title,
      filename: attachment.filename,
    })),
  };
}

/**
 * Adds one file part per attachment to a multipart form.
 */
export async function buildAttachmentParts(
  form: MultipartFormBuilder,
  attachments: readonly Attachment[]
): Promise<MultipartFormBuilder> {
  for (const attachment of attachments) {
    let content = attachment.content;
    if (content === undefined) {
      if (attachment.path === undefined) {
        throw new MissingRequiredDataError(`The attachment '${attachment.title}' has neither content nor a path.`);
      }
      content = await readFile(attachment.path);
    }
    form.addFile(attachment.title, content, attachment.filename, attachment.contentType);
  }
  return form;
}
