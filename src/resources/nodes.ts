/**
 * Nodes: the categories, boards and group hubs that make up the community tree
 */

import {
  InvalidNodeTypeError,
  MissingRequiredDataError,
  NodeIDNotFoundError,
  NodeTypeNotFoundError,
} from "../core/errors.js";
import type { LiqlClient } from "../liql/client.js";

export type NodeType =
  | "category"
  | "blog"
  | "contest"
  | "board"
  | "group"
  | "idea"
  | "message"
  | "qa"
  | "tkb";

/**
 * URL path segment that precedes a node ID, per node type. Lookup order matters
 * for URLs that nest several node segments.
 */
export const NODE_URL_CODES: ReadonlyMap<NodeType, string> = new Map([
  ["category", "ct-p"],
  ["blog", "bg-p"],
  ["contest", "con-p"],
  ["board", "bd-p"],
  ["group", "gp-p"],
  ["idea", "idb-p"],
  ["message", "m-p"],
  ["qa", "qa-p"],
  ["tkb", "tkb-p"],
]);

const DISPLAY_NAMES: ReadonlyMap<string, NodeType> = new Map([
  ["Category", "category"],
  ["Blog", "blog"],
  ["Board", "board"],
  ["Contest", "contest"],
  ["Forum", "board"],
  ["Group", "group"],
  ["Idea Exchange", "idea"],
  ["Message", "message"],
  ["Q&A", "qa"],
  ["TKB", "tkb"],
]);

/**
 * A node identified by its ID, its URL, or an entry from a LiQL collection
 * (whose `id` may carry a `type:` prefix).
 */
export type NodeRef =
  | { kind: "id"; id: string }
  | { kind: "url"; url: string; nodeType?: string }
  | { kind: "collection"; collection: string; id: string };

/**
 * NodeRef factory functions.
 */
export const NodeRef = {
  byId(id: string): NodeRef {
    return { kind: "id", id };
  },
  byUrl(url: string, nodeType?: string): NodeRef {
    return nodeType === undefined ? { kind: "url", url } : { kind: "url", url, nodeType };
  },
  byCollection(collection: string, id: string): NodeRef {
    return { kind: "collection", collection, id };
  },
};

const NODE_TYPES: ReadonlySet<string> = new Set(NODE_URL_CODES.keys());

function isNodeType(value: string): value is NodeType {
  return NODE_TYPES.has(value);
}

function resolveNodeType(nodeType: string): NodeType {
  if (isNodeType(nodeType)) {
    return nodeType;
  }
  const mapped = DISPLAY_NAMES.get(nodeType);
  if (mapped === undefined) {
    throw new InvalidNodeTypeError(nodeType);
  }
  return mapped;
}

/**
 * Identifies the node type of a community URL.
 *
 * @throws {NodeTypeNotFoundError} when no node segment is present
 */
export function getNodeTypeFromUrl(url: string): NodeType {
  for (const [nodeType, code] of NODE_URL_CODES) {
    if (url.includes(`/${code}/`)) {
      return nodeType;
    }
  }
  throw new NodeTypeNotFoundError(url);
}

/**
 * Extracts the node ID that follows the node segment of a URL.
 *
 * @example
 * ```typescript
 * getNodeIdFromUrl("https://community.example.com/t5/Product-Ideas/idb-p/product-ideas");
 * // "product-ideas"
 * ```
 */
export function getNodeIdFromUrl(url: string, nodeType?: string): string {
  if (url.trim() === "") {
    throw new MissingRequiredDataError("A node URL must be supplied.");
  }

  const type = nodeType === undefined ? getNodeTypeFromUrl(url) : resolveNodeType(nodeType);
  const segment = `/${NODE_URL_CODES.get(type) ?? ""}/`;
  const index = url.lastIndexOf(segment);
  if (index === -1) {
    throw new InvalidNodeTypeError(type);
  }

  const nodeId = url.slice(index + segment.length).split(/[/?#]/)[0] ?? "";
  if (nodeId === "") {
    throw new NodeIDNotFoundError(url);
  }
  return nodeId;
}

/**
 * Resolves any NodeRef variant to the canonical node ID.
 */
export function resolveNodeId(ref: NodeRef): string {
  switch (ref.kind) {
    case "id": {
      const id = ref.id.trim();
      if (id === "") {
        throw new MissingRequiredDataError("A node ID must not be empty.");
      }
      return id;
    }
    case "url":
      return getNodeIdFromUrl(ref.url, ref.nodeType);
    case "collection": {
      const separator = ref.id.indexOf(":");
      const id = (separator === -1 ? ref.id : ref.id.slice(separator + 1)).trim();
      if (id === "") {
        throw new NodeIDNotFoundError();
      }
      return id;
    }
  }
}

export class NodesResource {
  private liql: LiqlClient;

  constructor(liql: LiqlClient) {
    this.liql = liql;
  }

  async exists(ref: NodeRef): Promise<boolean> {
    return (await this.liql.getTotalCount("nodes", [["id", resolveNodeId(ref)]])) > 0;
  }

  async getTotalCount(): Promise<number> {
    return this.liql.getTotalCount("nodes");
  }
}
