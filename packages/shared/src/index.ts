export type ItemSource = {
  name: string;
};

export type Item = {
  id: string;
  title: string;
  source: ItemSource;
  publishedAt: string;
  url: string;
  summary: string;
  tags: string[];
};

/** Create payload as accepted on the wire; `tags` falls back to an empty list. */
export type ItemInput = {
  title: string;
  source: ItemSource;
  publishedAt: string;
  url: string;
  summary: string;
  tags?: string[];
};

export type ItemPatch = Partial<Omit<Item, "id">>;

export const PATCHABLE_FIELDS = ["title", "source", "publishedAt", "url", "summary", "tags"] as const;

export type PatchableField = (typeof PATCHABLE_FIELDS)[number];

// Flat storage shape; tags hold a JSON-encoded string array.
export type ItemRow = {
  id: string;
  title: string;
  source_name: string;
  publishedAt: string;
  url: string;
  summary: string;
  tags: string;
};

export const LIST_LIMIT_MIN = 1;
export const LIST_LIMIT_MAX = 20;
export const LIST_LIMIT_DEFAULT = 10;

export const PUBLISHED_AT_MESSAGE =
  "publishedAt must be a valid UTC datetime string (ISO 8601 format with Z, e.g., 2025-03-01T09:00:00Z)";

export { ERROR_CODES, HTTP_STATUS_BY_CODE, failure, ok } from "./envelope.js";
export type { ErrorCode, ErrorEnvelope, OkEnvelope } from "./envelope.js";
export { ITEM_ID_PREFIX, newItemId } from "./ids.js";
