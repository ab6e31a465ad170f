import type { Page } from "../types.js";

// Null (nothing matched) pages as an empty list; any other non-list value
// becomes a single item.
export function toItems(result: unknown): unknown[] {
  if (result === null || result === undefined) return [];
  return Array.isArray(result) ? result : [result];
}

export function paginate(result: unknown, offset: number, limit: number): Page {
  const items = toItems(result);
  const total = items.length;
  return {
    items: items.slice(offset, offset + limit),
    total,
    offset,
    limit,
    hasMore: offset + limit < total,
  };
}
