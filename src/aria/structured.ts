import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";
import type { ParseResult } from "../types.js";
import { deserializeTree } from "./serializer.js";
import type { SerializedNodeInput } from "./serializer.js";

// Serialized nodes written back out as YAML open with `- role: ...`.
const STRUCTURED_ITEM_RE = /^-\s+role:(\s|$)/;

const checkedStateSchema = z.union([z.boolean(), z.literal("mixed")]);

const nodeSchema: z.ZodType<SerializedNodeInput> = z.lazy(() =>
  z
    .object({
      role: z.string().min(1),
      name: z.object({ value: z.string(), is_regex: z.boolean() }).strict().optional(),
      ref: z.string().optional(),
      checked: checkedStateSchema.optional(),
      disabled: z.boolean().optional(),
      expanded: z.boolean().optional(),
      active: z.boolean().optional(),
      level: z.number().int().optional(),
      pressed: checkedStateSchema.optional(),
      selected: z.boolean().optional(),
      props: z.record(z.string()).optional(),
      children: z.array(z.union([z.string(), nodeSchema])).optional(),
    })
    .strict(),
);

const treeSchema = z.array(z.union([z.string(), nodeSchema]));

// Root items sit at the smallest indent; any of them reading `- role: ...`
// marks the whole text as serializer output.
export function isStructuredSnapshot(text: string): boolean {
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== "");
  if (lines.length === 0) return false;
  const indentOf = (line: string) => line.length - line.trimStart().length;
  const rootIndent = lines.reduce((min, line) => Math.min(min, indentOf(line)), Infinity);
  return lines.some((line) => indentOf(line) === rootIndent && STRUCTURED_ITEM_RE.test(line.trimStart()));
}

// A failed union reports every branch; keep the branch that got past the
// type check, since that is the one the input was meant to match.
function flattenIssues(issues: z.ZodIssue[]): z.ZodIssue[] {
  return issues.flatMap((issue) => {
    if (issue.code !== "invalid_union") return [issue];
    const branch =
      issue.unionErrors.find((error) =>
        error.issues.some((i) => i.path.length > issue.path.length || i.code !== "invalid_type"),
      ) ?? issue.unionErrors[0];
    return branch ? flattenIssues(branch.issues) : [issue];
  });
}

function formatPath(path: (string | number)[]): string {
  return path.length === 0 ? "snapshot" : path.map((p) => (typeof p === "number" ? `[${p}]` : `.${p}`)).join("").replace(/^\./, "");
}

/**
 * Load a snapshot previously emitted by the serializer and YAML formatter.
 * Validation problems come back as parse errors, not exceptions.
 */
export function parseStructuredSnapshot(text: string, lineOffset = 0): ParseResult {
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (err) {
    const line = err instanceof YAMLParseError && err.linePos ? err.linePos[0].line + lineOffset : undefined;
    const message = err instanceof Error ? err.message : String(err);
    return { tree: [], errors: [{ line, message: `Invalid structured snapshot: ${message}` }] };
  }

  const parsed = treeSchema.safeParse(data);
  if (!parsed.success) {
    return {
      tree: [],
      errors: flattenIssues(parsed.error.issues).map((issue) => ({ message: `${formatPath(issue.path)}: ${issue.message}` })),
    };
  }
  return { tree: deserializeTree(parsed.data), errors: [] };
}
