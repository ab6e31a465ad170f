import type { AriaTree, FlatEntry } from "../types.js";
import { serializeTree } from "../aria/serializer.js";
import { isObject } from "./runtime.js";

/**
 * Depth-first, pre-order listing of every node and text leaf in serialized
 * snapshot data. Each entry loses its `children` and gains `_depth`,
 * `_parent_role` and `_index`, so "role X at any depth" becomes a single
 * filter: `[?role == 'link']`.
 *
 * Text leaves come out as `{ text, _depth, _parent_role, _index }`.
 */
export function flattenSnapshot(data: unknown): FlatEntry[] {
  const entries: FlatEntry[] = [];

  const visit = (item: unknown, depth: number, parentRole: string | null): void => {
    if (Array.isArray(item)) {
      for (const child of item) visit(child, depth, parentRole);
      return;
    }
    if (typeof item === "string") {
      entries.push({ text: item, _depth: depth, _parent_role: parentRole, _index: entries.length });
      return;
    }
    if (!isObject(item)) return;

    const { children, ...fields } = item;
    entries.push({ ...fields, _depth: depth, _parent_role: parentRole, _index: entries.length });
    if (Array.isArray(children)) {
      visit(children, depth + 1, typeof item.role === "string" ? item.role : null);
    }
  };

  visit(data, 0, null);
  return entries;
}

export function flattenTree(tree: AriaTree): FlatEntry[] {
  return flattenSnapshot(serializeTree(tree));
}
