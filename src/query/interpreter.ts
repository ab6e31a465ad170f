import type { AstNode, ComparatorOp } from "./ast.js";
import { QueryError } from "./errors.js";
import { ExpressionRef, checkArguments, deepEqual, isFalse, isObject } from "./runtime.js";
import type { FunctionContext, FunctionTable } from "./runtime.js";

function capSliceBound(length: number, value: number, step: number): number {
  if (value < 0) {
    const shifted = value + length;
    return shifted < 0 ? (step < 0 ? -1 : 0) : shifted;
  }
  if (value >= length) return step < 0 ? length - 1 : length;
  return value;
}

function slice(items: unknown[], start: number | null, stop: number | null, step: number | null): unknown[] {
  const by = step ?? 1;
  if (by === 0) throw new QueryError("RuntimeError", "Slice step cannot be 0");

  const length = items.length;
  const from = start === null ? (by < 0 ? length - 1 : 0) : capSliceBound(length, start, by);
  const to = stop === null ? (by < 0 ? -1 : length) : capSliceBound(length, stop, by);

  const result: unknown[] = [];
  if (by > 0) {
    for (let i = from; i < to; i += by) result.push(items[i]);
  } else {
    for (let i = from; i > to; i += by) result.push(items[i]);
  }
  return result;
}

function compare(op: ComparatorOp, left: unknown, right: unknown): boolean | null {
  if (op === "Eq") return deepEqual(left, right);
  if (op === "Ne") return !deepEqual(left, right);
  if (typeof left !== "number" || typeof right !== "number") return null;
  switch (op) {
    case "Lt":
      return left < right;
    case "Lte":
      return left <= right;
    case "Gt":
      return left > right;
    case "Gte":
      return left >= right;
  }
}

function collect(items: unknown[], project: (item: unknown) => unknown): unknown[] {
  const result: unknown[] = [];
  for (const item of items) {
    const projected = project(item);
    if (projected !== null && projected !== undefined) result.push(projected);
  }
  return result;
}

export class Interpreter implements FunctionContext {
  constructor(private readonly functions: FunctionTable) {}

  evaluate(ref: ExpressionRef, value: unknown): unknown {
    return this.visit(ref.node, value);
  }

  visit(node: AstNode, value: unknown): unknown {
    switch (node.type) {
      case "Identity":
      case "Current":
        return value;
      case "Field":
        return isObject(value) && Object.hasOwn(value, node.name) ? value[node.name] ?? null : null;
      case "Literal":
        return node.value;
      case "Subexpression": {
        const left = this.visit(node.left, value);
        return left === null ? null : this.visit(node.right, left);
      }
      case "IndexExpression":
        return this.visit(node.right, this.visit(node.left, value));
      case "Index": {
        if (!Array.isArray(value)) return null;
        const index = node.value < 0 ? value.length + node.value : node.value;
        return value[index] ?? null;
      }
      case "Slice":
        return Array.isArray(value) ? slice(value, node.start, node.stop, node.step) : null;
      case "Projection": {
        const base = this.visit(node.left, value);
        return Array.isArray(base) ? collect(base, (item) => this.visit(node.right, item)) : null;
      }
      case "ValueProjection": {
        const base = this.visit(node.left, value);
        return isObject(base) ? collect(Object.values(base), (item) => this.visit(node.right, item)) : null;
      }
      case "FilterProjection": {
        const base = this.visit(node.left, value);
        if (!Array.isArray(base)) return null;
        const kept = base.filter((item) => !isFalse(this.visit(node.condition, item)));
        return collect(kept, (item) => this.visit(node.right, item));
      }
      case "Flatten": {
        const base = this.visit(node.child, value);
        if (!Array.isArray(base)) return null;
        return base.flatMap((item) => (Array.isArray(item) ? item : [item]));
      }
      case "MultiSelectList":
        if (value === null) return null;
        return node.children.map((child) => this.visit(child, value));
      case "MultiSelectHash": {
        if (value === null) return null;
        const result: Record<string, unknown> = {};
        for (const pair of node.pairs) result[pair.key] = this.visit(pair.value, value);
        return result;
      }
      case "Comparator":
        return compare(node.op, this.visit(node.left, value), this.visit(node.right, value));
      case "Or": {
        const left = this.visit(node.left, value);
        return isFalse(left) ? this.visit(node.right, value) : left;
      }
      case "And": {
        const left = this.visit(node.left, value);
        return isFalse(left) ? left : this.visit(node.right, value);
      }
      case "Not":
        return isFalse(this.visit(node.child, value));
      case "Pipe":
        return this.visit(node.right, this.visit(node.left, value));
      case "Function": {
        const fn = this.functions[node.name];
        if (!fn || !Object.hasOwn(this.functions, node.name)) {
          throw new QueryError("UnknownFunctionError", `Unknown function: ${node.name}()`);
        }
        const args = node.args.map((arg) =>
          arg.type === "ExpressionReference" ? new ExpressionRef(arg.child) : this.visit(arg, value),
        );
        checkArguments(node.name, fn.signature, args);
        return fn.call(args, this);
      }
      case "ExpressionReference":
        throw new QueryError("RuntimeError", "Expression references are only valid as function arguments");
    }
  }
}
