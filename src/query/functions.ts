import { QueryError } from "./errors.js";
import { ExpressionRef, deepEqual, isObject, typeOf } from "./runtime.js";
import type { FunctionContext, FunctionTable } from "./runtime.js";

// Arguments reach these implementations already checked against their
// signatures; the guards below only narrow for the compiler.

function num(value: unknown): number {
  if (typeof value !== "number") throw new QueryError("TypeError", `Expected a number, received ${typeOf(value)}`);
  return value;
}

function str(value: unknown): string {
  if (typeof value !== "string") throw new QueryError("TypeError", `Expected a string, received ${typeOf(value)}`);
  return value;
}

function arr(value: unknown): unknown[] {
  if (!Array.isArray(value)) throw new QueryError("TypeError", `Expected an array, received ${typeOf(value)}`);
  return value;
}

function obj(value: unknown): Record<string, unknown> {
  if (!isObject(value)) throw new QueryError("TypeError", `Expected an object, received ${typeOf(value)}`);
  return value;
}

function ref(value: unknown): ExpressionRef {
  if (!(value instanceof ExpressionRef)) {
    throw new QueryError("TypeError", `Expected an expression reference, received ${typeOf(value)}`);
  }
  return value;
}

function compareSortable(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  throw new QueryError("TypeError", `Cannot compare ${typeOf(a)} with ${typeOf(b)}`);
}

// Keys must be all numbers or all strings.
function sortKeys(name: string, items: unknown[], keyOf: (item: unknown) => unknown): unknown[] {
  const keys = items.map(keyOf);
  const kind = typeOf(keys[0]);
  if (keys.some((key) => typeOf(key) !== kind) || (keys.length > 0 && kind !== "number" && kind !== "string")) {
    throw new QueryError("TypeError", `${name}() expression must return all numbers or all strings`);
  }
  return keys;
}

function sortBy(name: string, items: unknown[], keyRef: ExpressionRef, context: FunctionContext): unknown[] {
  const keys = sortKeys(name, items, (item) => context.evaluate(keyRef, item));
  return items
    .map((item, i) => ({ item, key: keys[i], i }))
    .sort((a, b) => compareSortable(a.key, b.key) || a.i - b.i)
    .map((entry) => entry.item);
}

function extremeBy(
  name: string,
  items: unknown[],
  keyRef: ExpressionRef,
  context: FunctionContext,
  pick: (cmp: number) => boolean,
): unknown {
  if (items.length === 0) return null;
  const keys = sortKeys(name, items, (item) => context.evaluate(keyRef, item));
  let best = 0;
  for (let i = 1; i < items.length; i++) {
    if (pick(compareSortable(keys[i], keys[best]))) best = i;
  }
  return items[best];
}

function extreme(items: unknown[], pick: (cmp: number) => boolean): unknown {
  if (items.length === 0) return null;
  return items.reduce((best, item) => (pick(compareSortable(item, best)) ? item : best));
}

const NUMBER_STRING_RE = /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/;

export const builtinFunctions: FunctionTable = {
  abs: {
    signature: [{ types: ["number"] }],
    call: ([value]) => Math.abs(num(value)),
  },
  avg: {
    signature: [{ types: ["array-number"] }],
    call: ([values]) => {
      const items = arr(values).map(num);
      return items.length === 0 ? null : items.reduce((sum, n) => sum + n, 0) / items.length;
    },
  },
  ceil: {
    signature: [{ types: ["number"] }],
    call: ([value]) => Math.ceil(num(value)),
  },
  contains: {
    signature: [{ types: ["array", "string"] }, { types: ["any"] }],
    call: ([subject, search]) => {
      if (typeof subject === "string") return typeof search === "string" && subject.includes(search);
      return arr(subject).some((item) => deepEqual(item, search));
    },
  },
  ends_with: {
    signature: [{ types: ["string"] }, { types: ["string"] }],
    call: ([subject, suffix]) => str(subject).endsWith(str(suffix)),
  },
  floor: {
    signature: [{ types: ["number"] }],
    call: ([value]) => Math.floor(num(value)),
  },
  join: {
    signature: [{ types: ["string"] }, { types: ["array-string"] }],
    call: ([glue, items]) => arr(items).map(str).join(str(glue)),
  },
  keys: {
    signature: [{ types: ["object"] }],
    call: ([value]) => Object.keys(obj(value)),
  },
  length: {
    signature: [{ types: ["string", "array", "object"] }],
    call: ([value]) => {
      if (typeof value === "string") return [...value].length;
      if (Array.isArray(value)) return value.length;
      return Object.keys(obj(value)).length;
    },
  },
  map: {
    signature: [{ types: ["expref"] }, { types: ["array"] }],
    call: ([mapper, items], context) => arr(items).map((item) => context.evaluate(ref(mapper), item)),
  },
  max: {
    signature: [{ types: ["array-number", "array-string"] }],
    call: ([items]) => extreme(arr(items), (cmp) => cmp > 0),
  },
  max_by: {
    signature: [{ types: ["array"] }, { types: ["expref"] }],
    call: ([items, keyRef], context) => extremeBy("max_by", arr(items), ref(keyRef), context, (cmp) => cmp > 0),
  },
  merge: {
    signature: [{ types: ["object"], variadic: true }],
    call: (objects) => Object.assign({}, ...objects.map(obj)),
  },
  min: {
    signature: [{ types: ["array-number", "array-string"] }],
    call: ([items]) => extreme(arr(items), (cmp) => cmp < 0),
  },
  min_by: {
    signature: [{ types: ["array"] }, { types: ["expref"] }],
    call: ([items, keyRef], context) => extremeBy("min_by", arr(items), ref(keyRef), context, (cmp) => cmp < 0),
  },
  not_null: {
    signature: [{ types: ["any"], variadic: true }],
    call: (values) => values.find((value) => value !== null && value !== undefined) ?? null,
  },
  reverse: {
    signature: [{ types: ["string", "array"] }],
    call: ([value]) => (typeof value === "string" ? [...value].reverse().join("") : [...arr(value)].reverse()),
  },
  sort: {
    signature: [{ types: ["array-number", "array-string"] }],
    call: ([items]) => [...arr(items)].sort(compareSortable),
  },
  sort_by: {
    signature: [{ types: ["array"] }, { types: ["expref"] }],
    call: ([items, keyRef], context) => sortBy("sort_by", arr(items), ref(keyRef), context),
  },
  starts_with: {
    signature: [{ types: ["string"] }, { types: ["string"] }],
    call: ([subject, prefix]) => str(subject).startsWith(str(prefix)),
  },
  sum: {
    signature: [{ types: ["array-number"] }],
    call: ([items]) => arr(items).map(num).reduce((total, n) => total + n, 0),
  },
  to_array: {
    signature: [{ types: ["any"] }],
    call: ([value]) => (Array.isArray(value) ? value : [value]),
  },
  to_number: {
    signature: [{ types: ["any"] }],
    call: ([value]) => {
      if (typeof value === "number") return value;
      if (typeof value === "string" && NUMBER_STRING_RE.test(value.trim())) return Number(value);
      return null;
    },
  },
  to_string: {
    signature: [{ types: ["any"] }],
    call: ([value]) => (typeof value === "string" ? value : JSON.stringify(value)),
  },
  type: {
    signature: [{ types: ["any"] }],
    call: ([value]) => typeOf(value),
  },
  values: {
    signature: [{ types: ["object"] }],
    call: ([value]) => Object.values(obj(value)),
  },
};
