import { describe, it, expect } from "vitest";

import { parseAriaSnapshot } from "../../src/aria/parser.js";
import { flattenSnapshot, flattenTree } from "../../src/query/flatten.js";

const page = [
  "- main:",
  '  - navigation "Primary":',
  '    - link "Home"',
  '    - link "Docs"',
  '  - heading "Welcome" [level=1]',
  "  - text: Hello there",
  '- contentinfo "Footer"',
].join("\n");

describe("flattenTree", () => {
  it("lists every node and text leaf in pre-order with depth and parent role", () => {
    const { tree } = parseAriaSnapshot(page);
    const entries = flattenTree(tree ?? []);

    expect(entries.map((e) => [e.role ?? e.text, e._depth, e._parent_role, e._index])).toEqual([
      ["main", 0, null, 0],
      ["navigation", 1, "main", 1],
      ["link", 2, "navigation", 2],
      ["link", 2, "navigation", 3],
      ["heading", 1, "main", 4],
      ["Hello there", 1, "main", 5],
      ["contentinfo", 0, null, 6],
    ]);
  });

  it("strips children and keeps the other fields", () => {
    const { tree } = parseAriaSnapshot(page);
    const [, , home] = flattenTree(tree ?? []);
    expect(home).toEqual({
      role: "link",
      name: { value: "Home", is_regex: false },
      _depth: 2,
      _parent_role: "navigation",
      _index: 2,
    });
  });
});

describe("flattenSnapshot", () => {
  it("returns nothing for non-tree data", () => {
    expect(flattenSnapshot(null)).toEqual([]);
    expect(flattenSnapshot(42)).toEqual([]);
  });

  it("gives children of a role-less object a null parent role", () => {
    expect(flattenSnapshot([{ kind: "group", children: ["a"] }])).toEqual([
      { kind: "group", _depth: 0, _parent_role: null, _index: 0 },
      { text: "a", _depth: 1, _parent_role: null, _index: 1 },
    ]);
  });
});
