/**
 * Categories
 */

import type { V1Result } from "../core/types.js";
import { MissingRequiredDataError } from "../core/errors.js";
import type { ApiRequester } from "../core/api.js";
import type { LiqlClient } from "../liql/client.js";
import { resolveNodeId, type NodeRef } from "./nodes.js";

export interface CategorySettings {
  id: string;
  title: string;
  parentId?: string;
}

export class CategoriesResource {
  private api: ApiRequester;
  private liql: LiqlClient;

  constructor(api: ApiRequester, liql: LiqlClient) {
    this.api = api;
    this.liql = liql;
  }

  /**
   * Creates a category, optionally below a parent category.
   * Goes through the v1 API; v2 has no category creation endpoint.
   */
  async create(settings: CategorySettings): Promise<V1Result> {
    if (!settings.id || !settings.title) {
      throw new MissingRequiredDataError("The 'id' and 'title' fields are required to create a category.");
    }

    const parent = settings.parentId ? `categories/id/${encodeURIComponent(settings.parentId)}/` : "";
    return this.api.v1(`${parent}categories/add`, {
      method: "POST",
      form: {
        "category.id": settings.id,
        "category.title": settings.title,
      },
    });
  }

  async exists(ref: NodeRef): Promise<boolean> {
    return (await this.liql.getTotalCount("categories", [["id", resolveNodeId(ref)]])) > 0;
  }

  async getTotalCount(): Promise<number> {
    return this.liql.getTotalCount("categories");
  }
}
