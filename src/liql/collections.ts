/**
 * Collections that can appear in a LiQL FROM clause
 */
export const LIQL_COLLECTIONS: ReadonlySet<string> = new Set([
  "albums",
  "attachments",
  "boards",
  "bookmarks",
  "categories",
  "communities",
  "custom_tags",
  "floated_messages",
  "grouphubs",
  "images",
  "inbox_notes",
  "kudos",
  "labels",
  "me_toos",
  "membership_requests",
  "messages",
  "metrics",
  "nodes",
  "notes_threads",
  "notification_feeds",
  "outbox_notes",
  "product_categories",
  "products",
  "ranks",
  "ratings",
  "review_comments",
  "review_dimensions",
  "review_ratings",
  "reviews",
  "roles",
  "subscriptions",
  "tags",
  "threaded_notes",
  "tkb_helpfulness_ratings",
  "users",
  "videos",
]);

export const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(["=", "!=", ">", "<", ">=", "<="]);

export const LOGIC_OPERATORS: ReadonlySet<string> = new Set(["AND", "OR", "IN", "MATCHES"]);
