import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import { parseAriaSnapshot } from "../../src/aria/parser.js";
import { deserializeTree, serializeTree } from "../../src/aria/serializer.js";
import { formatOutput } from "../../src/output/format.js";

function fixture(name: string): string {
  return readFileSync(resolve(import.meta.dirname, "../fixtures", name), "utf-8");
}

describe("serializeTree", () => {
  it("omits absent fields and keeps a fixed key order", () => {
    const { tree } = parseAriaSnapshot('- heading "Title" [level=2] [ref=e1]');
    const data = serializeTree(tree ?? []);
    expect(data).toEqual([{ role: "heading", name: { value: "Title", is_regex: false }, ref: "e1", level: 2, children: [] }]);

    const [heading] = data;
    expect(typeof heading === "object" ? Object.keys(heading) : []).toEqual(["role", "name", "ref", "level", "children"]);
  });

  it("emits props only when present and keeps text leaves as strings", () => {
    const { tree } = parseAriaSnapshot('- link "Docs":\n  - /url: https://example.com/docs\n  - text: Read more');
    expect(serializeTree(tree ?? [])).toEqual([
      {
        role: "link",
        name: { value: "Docs", is_regex: false },
        props: { url: "https://example.com/docs" },
        children: ["Read more"],
      },
    ]);
  });

  it("deserializes back to the parsed tree", () => {
    const { tree } = parseAriaSnapshot(fixture("attributes.txt"));
    expect(deserializeTree(serializeTree(tree ?? []))).toEqual(tree);
  });
});

describe("structured snapshots", () => {
  it.each([
    ["example-domain.txt", fixture("example-domain.txt")],
    ["attributes.txt", fixture("attributes.txt")],
    ["regex and text", '- list:\n  - link /Home|About/\n  - text: Search for Images\n  - checkbox "Mixed" [checked=mixed]'],
    ["a leading text leaf", '- text: hello\n- button "Go"'],
  ])("round-trips %s through YAML output", (_label, input) => {
    const first = parseAriaSnapshot(input);
    expect(first.errors).toEqual([]);

    const yaml = formatOutput(serializeTree(first.tree ?? []), "yaml");
    const second = parseAriaSnapshot(yaml);
    expect(second.errors).toEqual([]);
    expect(second.tree).toEqual(first.tree);
  });

  it("reads YAML whose first root item is a text leaf", () => {
    const yaml = '- hello\n- role: button\n  name:\n    value: Go\n    is_regex: false\n  children: []\n';
    expect(parseAriaSnapshot(yaml)).toEqual({
      tree: ["hello", { kind: "node", role: "button", name: { value: "Go", isRegex: false }, props: {}, children: [] }],
      errors: [],
    });
  });

  it("only looks at root items to detect serializer output", () => {
    const { tree, errors } = parseAriaSnapshot("- group:\n  - role: admin");
    expect(errors).toEqual([]);
    expect(tree).toEqual([
      {
        kind: "node",
        role: "group",
        props: {},
        children: [{ kind: "node", role: "role", name: { value: "admin", isRegex: false }, props: {}, children: [] }],
      },
    ]);
  });

  it("fills in missing children", () => {
    const { tree, errors } = parseAriaSnapshot("- role: button\n  ref: e1");
    expect(errors).toEqual([]);
    expect(tree).toEqual([{ kind: "node", role: "button", ref: "e1", props: {}, children: [] }]);
  });

  it("reports the path of an invalid field", () => {
    expect(parseAriaSnapshot("- role: heading\n  level: high")).toEqual({
      tree: [],
      errors: [{ message: "[0].level: Expected number, received string" }],
    });
  });

  it("reports YAML syntax errors with a line number", () => {
    const { tree, errors } = parseAriaSnapshot('- role: button\n  name: "unclosed');
    expect(tree).toEqual([]);
    expect(errors).toHaveLength(1);
    expect(errors[0].message.startsWith("Invalid structured snapshot: ")).toBe(true);
    expect(typeof errors[0].line).toBe("number");
  });
});
