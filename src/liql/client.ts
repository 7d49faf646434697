/**
 * LiQL query execution
 */

import { z } from "zod";
import { CommunityError, LiQLParseError } from "../core/errors.js";
import type { ApiRequester } from "../core/api.js";
import {
  getQueryUrl,
  parseQueryElements,
  type QueryElements,
  type QueryUrlOptions,
  type WhereInput,
} from "./query.js";

const DEFAULT_MAX_PAGES = 1000;

const liqlItemSchema = z.record(z.unknown());

const liqlResponseSchema = z
  .object({
    status: z.string(),
    message: z.string().optional(),
    http_code: z.union([z.number(), z.string()]).optional(),
    data: z
      .object({
        type: z.string().optional(),
        list_item_type: z.string().optional(),
        size: z.number().optional(),
        items: z.array(liqlItemSchema).optional(),
        next_cursor: z.string().optional(),
        count: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type LiqlItem = z.infer<typeof liqlItemSchema>;
export type LiqlResponse = z.infer<typeof liqlResponseSchema>;

export interface PaginateOptions extends QueryUrlOptions {
  maxPages?: number;
}

export class LiqlClient {
  private api: ApiRequester;

  constructor(api: ApiRequester) {
    this.api = api;
  }

  /**
   * Runs a LiQL statement against the search endpoint.
   *
   * @throws {GETRequestError} on a non-2xx response
   * @throws {LiQLParseError} when the body is not a LiQL response
   */
  async query(statement: string, options: QueryUrlOptions = {}): Promise<LiqlResponse> {
    const outcome = await this.api.request("GET", getQueryUrl(this.api.context, statement, options));
    if (outcome.body.kind !== "json") {
      throw new LiQLParseError();
    }

    const parsed = liqlResponseSchema.safeParse(outcome.body.value);
    if (!parsed.success) {
      throw new LiQLParseError();
    }
    return parsed.data;
  }

  /**
   * Builds a statement from its parts and returns the matching items.
   */
  async queryItems(elements: QueryElements, options: QueryUrlOptions = {}): Promise<LiqlItem[]> {
    return this.getReturnedItems(await this.query(parseQueryElements(elements), options));
  }

  getReturnedItems(response: LiqlResponse): LiqlItem[] {
    if (response.status.toLowerCase() !== "success") {
      throw new LiQLParseError(response.message || undefined);
    }
    return response.data?.items ?? [];
  }

  getFirstItem(response: LiqlResponse): LiqlItem | undefined {
    return this.getReturnedItems(response)[0];
  }

  /**
   * Counts the entries of a collection, optionally filtered.
   *
   * @example
   * ```typescript
   * await liql.getTotalCount("boards", [["conversation_style", "blog"]]);
   * // SELECT count(*) FROM boards WHERE conversation_style = 'blog'
   * ```
   */
  async getTotalCount(collection: string, where?: WhereInput): Promise<number> {
    const elements: QueryElements = { select: "count(*)", from: collection };
    if (where !== undefined) {
      elements.where = where;
    }

    const response = await this.query(parseQueryElements(elements));
    if (response.status.toLowerCase() !== "success") {
      throw new LiQLParseError(response.message || undefined);
    }

    const count = response.data?.count;
    if (count === undefined) {
      throw new LiQLParseError();
    }
    return count;
  }

  /**
   * Walks every page of a query by following `next_cursor`.
   *
   * Stops when a page carries no cursor. Throws when a cursor repeats or when
   * maxPages is reached with pages left.
   */
  async *paginate(elements: QueryElements, options: PaginateOptions = {}): AsyncGenerator<LiqlItem[]> {
    const { maxPages = DEFAULT_MAX_PAGES, ...urlOptions } = options;
    const seenCursors = new Set<string>();
    let current: QueryElements = { ...elements };
    let pageCount = 0;

    while (pageCount < maxPages) {
      const response = await this.query(parseQueryElements(current), urlOptions);
      pageCount++;

      yield this.getReturnedItems(response);

      const cursor = response.data?.next_cursor;
      if (!cursor) {
        return;
      }
      if (seenCursors.has(cursor)) {
        throw new CommunityError(
          `Pagination cycle detected: cursor "${cursor}" was encountered twice. Stopping at page ${pageCount}.`,
          { category: "decode", metadata: { cursor, pageCount } }
        );
      }
      seenCursors.add(cursor);
      current = { ...current, cursor };
    }

    throw new CommunityError(
      `Pagination limit reached: ${maxPages} pages. Consider using a more specific query.`,
      { category: "validation", metadata: { maxPages } }
    );
  }
}
