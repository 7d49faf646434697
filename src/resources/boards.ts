/**
 * Boards (blogs, contests, forums, idea exchanges, Q&A and TKB boards)
 */

import type { Delivery, ReturnFields } from "../core/types.js";
import { InvalidNodeTypeError, MissingRequiredDataError } from "../core/errors.js";
import type { ApiRequester } from "../core/api.js";
import type { LiqlClient } from "../liql/client.js";
import { resolveNodeId, type NodeRef } from "./nodes.js";

export const DISCUSSION_STYLES = ["blog", "contest", "forum", "idea", "qanda", "tkb"] as const;

export type DiscussionStyle = (typeof DISCUSSION_STYLES)[number];

export const ALLOWED_LABELS = ["freeform-only", "predefined-only", "freeform and pre-defined"] as const;

export type AllowedLabels = (typeof ALLOWED_LABELS)[number];

export interface BlogSettings {
  commentsEnabled?: boolean;
  authorIds?: string[];
  authorLogins?: string[];
  moderatorIds?: string[];
  moderatorLogins?: string[];
}

export interface ContestSettings {
  oneEntryPerContest?: boolean;
  oneKudoPerContest?: boolean;
  postingDateStart?: string;
  postingDateEnd?: string;
  votingDateStart?: string;
  votingDateEnd?: string;
  winnerAnnouncedDate?: string;
}

export interface BoardSettings {
  id: string;
  title: string;
  discussionStyle: string;
  description?: string;
  parentCategoryId?: string;
  hidden?: boolean;
  mediaType?: string;
  allowedLabels?: string;
  /** Overrides allowedLabels together with usePredefinedLabels */
  useFreeformLabels?: boolean;
  usePredefinedLabels?: boolean;
  predefinedLabels?: string[];
  /** Only applied to blog boards */
  blog?: BlogSettings;
  /** Only applied to contest boards */
  contest?: ContestSettings;
}

export interface BoardPayload {
  data: { type: "board" } & Record<string, unknown>;
}

export type PayloadWarning = (message: string) => void;

const ALLOWED_LABEL_VALUES: ReadonlySet<string> = new Set(ALLOWED_LABELS);
const DISCUSSION_STYLE_VALUES: ReadonlySet<string> = new Set(DISCUSSION_STYLES);

const CONTEST_FIELDS: ReadonlyArray<readonly [keyof ContestSettings, string]> = [
  ["oneEntryPerContest", "one_entry_per_contest"],
  ["oneKudoPerContest", "one_kudo_per_contest"],
  ["postingDateEnd", "posting_date_end"],
  ["postingDateStart", "posting_date_start"],
  ["votingDateEnd", "voting_date_end"],
  ["votingDateStart", "voting_date_start"],
  ["winnerAnnouncedDate", "winner_announced_date"],
];

function hasValues(settings: object | undefined): boolean {
  return settings !== undefined && Object.values(settings).some((value) => value !== undefined);
}

function userList(ids: string[] = [], logins: string[] = []): Array<Record<string, string>> {
  return [
    ...ids.map((id) => ({ type: "user", id })),
    ...logins.map((login) => ({ type: "user", login })),
  ];
}

/**
 * Builds the v2 payload for a new board.
 *
 * Settings that do not apply to the discussion style, and unknown
 * allowedLabels values, are dropped and reported through `warn`.
 *
 * @throws {MissingRequiredDataError} when the id, title or style is missing
 * @throws {InvalidNodeTypeError} when the discussion style is unknown
 */
export function structureBoardPayload(settings: BoardSettings, warn: PayloadWarning = () => {}): BoardPayload {
  if (!settings.id || !settings.title || !settings.discussionStyle) {
    throw new MissingRequiredDataError(
      "The 'id', 'title' and 'discussionStyle' fields are required to create a board."
    );
  }
  if (!DISCUSSION_STYLE_VALUES.has(settings.discussionStyle)) {
    throw new InvalidNodeTypeError(settings.discussionStyle);
  }

  const data: BoardPayload["data"] = {
    type: "board",
    id: settings.id,
    title: settings.title,
    conversation_style: settings.discussionStyle,
  };

  if (settings.parentCategoryId) {
    data.parent_category = { id: settings.parentCategoryId };
  }
  if (settings.description) data.description = settings.description;
  if (settings.hidden) data.hidden = settings.hidden;
  if (settings.mediaType) data.media_type = settings.mediaType;

  if (settings.allowedLabels) {
    if (ALLOWED_LABEL_VALUES.has(settings.allowedLabels)) {
      data.allowed_labels = settings.allowedLabels;
    } else {
      warn(`The value '${settings.allowedLabels}' for the 'allowedLabels' field is not valid and will be ignored.`);
    }
  }
  if (settings.useFreeformLabels && settings.usePredefinedLabels) {
    data.allowed_labels = "freeform and pre-defined";
  } else if (settings.useFreeformLabels) {
    data.allowed_labels = "freeform-only";
  } else if (settings.usePredefinedLabels) {
    data.allowed_labels = "predefined-only";
  }
  if (settings.predefinedLabels && settings.predefinedLabels.length > 0) {
    data.predefined_labels = settings.predefinedLabels;
  }

  const { blog, contest } = settings;
  if (hasValues(blog)) {
    if (settings.discussionStyle !== "blog") {
      warn(`Because the discussion style is '${settings.discussionStyle}' all blog-specific fields provided will be ignored.`);
    } else if (blog) {
      if (blog.commentsEnabled !== undefined) data.comments_enabled = blog.commentsEnabled;
      const authors = userList(blog.authorIds, blog.authorLogins);
      if (authors.length > 0) data.authors = authors;
      const moderators = userList(blog.moderatorIds, blog.moderatorLogins);
      if (moderators.length > 0) data.moderators = moderators;
    }
  }

  if (hasValues(contest)) {
    if (settings.discussionStyle !== "contest") {
      warn(`Because the discussion style is '${settings.discussionStyle}' all contest-specific fields provided will be ignored.`);
    } else if (contest) {
      for (const [key, field] of CONTEST_FIELDS) {
        const value = contest[key];
        if (value !== undefined) data[field] = value;
      }
    }
  }

  return { data };
}

export class BoardsResource {
  private api: ApiRequester;
  private liql: LiqlClient;

  constructor(api: ApiRequester, liql: LiqlClient) {
    this.api = api;
    this.liql = liql;
  }

  /**
   * Creates a board.
   *
   * @example
   * ```typescript
   * const id = await client.boards.create(
   *   { id: "product-blog", title: "Product Blog", discussionStyle: "blog" },
   *   { returnId: true }
   * );
   * ```
   */
  async create(settings: BoardSettings, fields: ReturnFields = {}): Promise<Delivery> {
    const payload = structureBoardPayload(settings, (message) =>
      this.api.warn(message, { kind: "payload", structure: "board" })
    );
    return this.api.v2("POST", "/boards", { ...fields, json: payload });
  }

  async exists(ref: NodeRef): Promise<boolean> {
    return (await this.liql.getTotalCount("boards", [["id", resolveNodeId(ref)]])) > 0;
  }

  async getTotalCount(): Promise<number> {
    return this.liql.getTotalCount("boards");
  }
}
