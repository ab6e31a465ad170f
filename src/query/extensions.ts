import type { FunctionTable } from "./runtime.js";

const INTEGER_STRING_RE = /^\s*[+-]?\d+\s*$/;

function toInt(value: unknown): number | null {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number") return Number.isFinite(value) ? Math.trunc(value) : null;
  if (typeof value === "string" && INTEGER_STRING_RE.test(value)) return Number.parseInt(value.trim(), 10);
  return null;
}

function toStr(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

function regexReplace(pattern: unknown, replacement: unknown, value: unknown): unknown {
  if (typeof value !== "string" || typeof pattern !== "string" || typeof replacement !== "string") return value;
  let re: RegExp;
  try {
    re = new RegExp(pattern, "g");
  } catch {
    // Invalid pattern leaves the value untouched.
    return value;
  }
  return value.replace(re, replacement);
}

/**
 * Snapshot-oriented additions to the built-in function set.
 *
 * `nvl(value, default)` is the usual guard when filtering on fields that
 * only some nodes carry, e.g. `[?nvl(level, `0`) > `1`]`.
 */
export const snapshotFunctions: FunctionTable = {
  nvl: {
    signature: [{ types: ["any"] }, { types: ["any"] }],
    call: ([value, fallback]) => (value === null || value === undefined ? fallback : value),
  },
  int: {
    signature: [{ types: ["any"] }],
    call: ([value]) => toInt(value),
  },
  str: {
    signature: [{ types: ["any"] }],
    call: ([value]) => toStr(value),
  },
  regex_replace: {
    signature: [{ types: ["string"] }, { types: ["string"] }, { types: ["string", "null"] }],
    call: ([pattern, replacement, value]) => regexReplace(pattern, replacement, value),
  },
};
