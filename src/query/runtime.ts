import type { AstNode } from "./ast.js";
import { QueryError } from "./errors.js";

export class ExpressionRef {
  constructor(readonly node: AstNode) {}
}

export type ArgType =
  | "any"
  | "null"
  | "boolean"
  | "number"
  | "string"
  | "array"
  | "object"
  | "expref"
  | "array-number"
  | "array-string";

export interface ArgSpec {
  types: ArgType[];
  variadic?: boolean;
  optional?: boolean;
}

export interface FunctionContext {
  evaluate(ref: ExpressionRef, value: unknown): unknown;
}

export interface QueryFunction {
  signature: ArgSpec[];
  call(args: unknown[], context: FunctionContext): unknown;
}

/** Function name to implementation, handed to the engine at construction. */
export type FunctionTable = Record<string, QueryFunction>;

export type ValueType = "null" | "boolean" | "number" | "string" | "array" | "object" | "expref";

export function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value) && !(value instanceof ExpressionRef);
}

export function typeOf(value: unknown): ValueType {
  if (value === null || value === undefined) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof ExpressionRef) return "expref";
  switch (typeof value) {
    case "boolean":
      return "boolean";
    case "number":
      return "number";
    case "string":
      return "string";
    default:
      return "object";
  }
}

// JMESPath falsiness: null, false, "", [] and {} are false; 0 is true.
export function isFalse(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === "") return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isObject(value)) return Object.keys(value).length === 0;
  return false;
}

export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => deepEqual(item, b[i]));
  }
  if (isObject(a) && isObject(b)) {
    const keys = Object.keys(a);
    return (
      keys.length === Object.keys(b).length && keys.every((key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]))
    );
  }
  return false;
}

function matchesType(type: ArgType, value: unknown): boolean {
  const actual = typeOf(value);
  switch (type) {
    case "any":
      return actual !== "expref";
    case "array-number":
      return Array.isArray(value) && value.every((item) => typeof item === "number");
    case "array-string":
      return Array.isArray(value) && value.every((item) => typeof item === "string");
    default:
      return actual === type;
  }
}

function describeTypes(types: ArgType[]): string {
  const names = types.map((t) => t.replace("-", "["));
  const labels = names.map((n) => (n.includes("[") ? `${n}]` : n));
  return labels.length > 1 ? `${labels.slice(0, -1).join(", ")} or ${labels[labels.length - 1]}` : labels[0];
}

export function checkArguments(name: string, signature: ArgSpec[], args: unknown[]): void {
  const last = signature[signature.length - 1];
  const variadic = last?.variadic === true;
  const required = signature.filter((spec) => !spec.optional).length;

  if (variadic ? args.length < required : args.length < required || args.length > signature.length) {
    const expected = variadic ? `at least ${required}` : `${required}`;
    const noun = !variadic && required === 1 ? "argument" : "arguments";
    throw new QueryError("ArgumentError", `${name}() takes ${expected} ${noun} but received ${args.length}`);
  }

  args.forEach((arg, i) => {
    const spec = signature[Math.min(i, signature.length - 1)];
    if (!spec.types.some((type) => matchesType(type, arg))) {
      throw new QueryError(
        "TypeError",
        `${name}() expected argument ${i + 1} to be ${describeTypes(spec.types)} but received ${typeOf(arg)}`,
      );
    }
  });
}
