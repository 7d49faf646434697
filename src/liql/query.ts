/**
 * LiQL statement construction and URL formatting
 */

import type { SessionContext } from "../core/types.js";
import {
  InvalidFieldError,
  InvalidOperatorError,
  MissingRequiredDataError,
  OperatorMismatchError,
} from "../core/errors.js";
import { COMPARISON_OPERATORS, LIQL_COLLECTIONS, LOGIC_OPERATORS } from "./collections.js";

export type WhereValue = string | number | boolean;

/**
 * `[field, value]` compares with `=`; `[field, operator, value]` uses the operator.
 */
export type WhereCondition =
  | readonly [field: string, value: WhereValue]
  | readonly [field: string, operator: string, value: WhereValue];

/**
 * Field to value, or field to `[operator, value]`.
 */
export type WhereRecord = Readonly<Record<string, WhereValue | readonly [string, WhereValue]>>;

export type WhereInput = string | WhereCondition | readonly WhereCondition[] | WhereRecord;

export interface QueryElements {
  select: string | readonly string[];
  from: string;
  where?: WhereInput;
  joinLogic?: string | readonly string[];
  orderBy?: string | readonly string[];
  /** Sort direction for orderBy (default: true) */
  descending?: boolean;
  limit?: number;
  cursor?: string;
}

export interface QueryUrlOptions {
  prettyPrint?: boolean;
  /** Counts the query toward search analytics (`api.for_ui_search`) */
  trackInSearch?: boolean;
  alwaysOk?: boolean;
  errorCode?: string;
}

const STATEMENT_KEYWORDS = /\b(select|from|where|order by|limit|offset|asc|desc|and|or|in|matches|cursor)\b/gi;

// '%' must be first so later escapes are not double-encoded
const CHARACTER_ENCODINGS: ReadonlyArray<readonly [string, string]> = [
  ["%", "%25"],
  ["+", "%2B"],
  ["&", "%26"],
  ["#", "%23"],
  [" ", "+"],
  ["=", "%3D"],
  ['"', "%22"],
  ["'", "%27"],
  ["(", "%28"],
  [")", "%29"],
  ["@", "%40"],
];

/**
 * Upper-cases statement keywords outside quoted literals.
 */
function uppercaseKeywords(query: string): string {
  return query
    .split(/('(?:\\'|[^'])*'|"(?:\\"|[^"])*")/)
    .map((segment, index) =>
      index % 2 === 1 ? segment : segment.replace(STATEMENT_KEYWORDS, (keyword) => keyword.toUpperCase())
    )
    .join("");
}

/**
 * Encodes a LiQL statement for the `q` parameter and appends `api.*` options.
 *
 * @example
 * ```typescript
 * formatQuery("select id from boards where id = 'ideas';");
 * // "SELECT+id+FROM+boards+WHERE+id+%3D+%27ideas%27"
 * ```
 */
export function formatQuery(query: string, options: QueryUrlOptions = {}): string {
  let formatted = uppercaseKeywords(query.trim().replace(/;+$/, "").trim());

  for (const [character, encoded] of CHARACTER_ENCODINGS) {
    formatted = formatted.split(character).join(encoded);
  }

  if (options.prettyPrint) formatted += "&api.pretty_print=true";
  if (options.trackInSearch) formatted += "&api.for_ui_search=true";
  if (options.alwaysOk) formatted += "&api.always_ok";
  if (options.errorCode) formatted += `&api.error_code=${encodeURIComponent(options.errorCode)}`;

  return formatted;
}

export function getQueryUrl(
  context: Pick<SessionContext, "v2Base">,
  query: string,
  options: QueryUrlOptions = {}
): string {
  return `${context.v2Base}/search?q=${formatQuery(query, options)}`;
}

export function parseSelectFields(fields: string | readonly string[]): string {
  const parsed = typeof fields === "string"
    ? fields.replace(/;/g, ",").replace(/,\s+/g, ",").trim()
    : fields.map((field) => field.trim()).filter((field) => field !== "").join(",");

  if (parsed === "") {
    throw new InvalidFieldError("At least one field must be selected.");
  }
  return parsed;
}

/**
 * Integers stay bare; everything else is single-quoted.
 */
function wrapValue(value: WhereValue): string {
  if (typeof value === "number" && Number.isInteger(value)) {
    return String(value);
  }
  if (typeof value === "boolean") {
    return String(value);
  }
  const text = String(value);
  if (/^-?\d+$/.test(text)) {
    return text;
  }
  return `'${text.replace(/'/g, "\\'")}'`;
}

function isWhereRecord(where: WhereInput): where is WhereRecord {
  return typeof where === "object" && !Array.isArray(where);
}

function isSingleCondition(where: WhereCondition | readonly WhereCondition[]): where is WhereCondition {
  return typeof where[0] === "string";
}

function conditionsFromRecord(where: WhereRecord): WhereCondition[] {
  return Object.entries(where).map(([field, value]): WhereCondition => {
    if (typeof value === "object") {
      return [field, value[0], value[1]];
    }
    return [field, value];
  });
}

function resolveJoinLogic(joinLogic: string | readonly string[], clauseCount: number): string[] {
  const requested = typeof joinLogic === "string" ? [joinLogic] : [...joinLogic];
  const operators = requested.map((operator) => operator.toUpperCase());

  for (const operator of operators) {
    if (!LOGIC_OPERATORS.has(operator)) {
      throw new InvalidOperatorError(operator);
    }
  }

  if (operators.length === 1) {
    return Array.from({ length: Math.max(0, clauseCount - 1) }, () => operators[0] ?? "AND");
  }
  if (operators.length !== clauseCount - 1) {
    throw new OperatorMismatchError();
  }
  return operators;
}

function renderCondition(condition: WhereCondition): string {
  if (condition.length === 2) {
    const [field, value] = condition;
    return `${field} = ${wrapValue(value)}`;
  }
  const [field, operator, value] = condition;
  if (!COMPARISON_OPERATORS.has(operator)) {
    throw new InvalidOperatorError(operator);
  }
  return `${field} ${operator} ${wrapValue(value)}`;
}

/**
 * Renders a WHERE clause (without the WHERE keyword).
 *
 * @example
 * ```typescript
 * parseWhereClause([["id", 5], ["replies.count(*)", ">", 2]], "OR");
 * // "id = 5 OR replies.count(*) > 2"
 * ```
 */
export function parseWhereClause(where: WhereInput, joinLogic: string | readonly string[] = "AND"): string {
  if (typeof where === "string") {
    return where.trim();
  }

  let conditions: readonly WhereCondition[];
  if (isWhereRecord(where)) {
    conditions = conditionsFromRecord(where);
  } else if (isSingleCondition(where)) {
    conditions = [where];
  } else {
    conditions = where;
  }

  if (conditions.length === 0) {
    return "";
  }

  const logic = resolveJoinLogic(joinLogic, conditions.length);
  return conditions
    .map((condition, index) => (index === 0 ? "" : `${logic[index - 1]} `) + renderCondition(condition))
    .join(" ");
}

export function structureCursorClause(cursor: string): string {
  const trimmed = cursor.trim();
  if (trimmed === "") {
    throw new MissingRequiredDataError("A cursor value is required to build a CURSOR clause.");
  }
  return /^cursor\b/i.test(trimmed) ? trimmed : `CURSOR '${trimmed}'`;
}

/**
 * Assembles a full LiQL statement from its parts.
 */
export function parseQueryElements(elements: QueryElements): string {
  const from = elements.from.trim();
  if (!LIQL_COLLECTIONS.has(from.toLowerCase())) {
    throw new InvalidFieldError(`'${elements.from}' is not a valid LiQL collection.`);
  }

  let statement = `SELECT ${parseSelectFields(elements.select)} FROM ${from}`;

  if (elements.where !== undefined) {
    const whereClause = parseWhereClause(elements.where, elements.joinLogic);
    if (whereClause !== "") {
      statement += ` WHERE ${whereClause}`;
    }
  }

  if (elements.orderBy !== undefined) {
    const orderBy = typeof elements.orderBy === "string" ? elements.orderBy : elements.orderBy.join(",");
    statement += ` ORDER BY ${orderBy} ${elements.descending === false ? "ASC" : "DESC"}`;
  }

  if (elements.limit !== undefined && elements.limit > 0) {
    statement += ` LIMIT ${Math.trunc(elements.limit)}`;
  }

  if (elements.cursor !== undefined) {
    statement += ` ${structureCursorClause(elements.cursor)}`;
  }

  return statement;
}
