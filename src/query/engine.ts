import type { AstNode } from "./ast.js";
import { builtinFunctions } from "./functions.js";
import { snapshotFunctions } from "./extensions.js";
import { Interpreter } from "./interpreter.js";
import { compile } from "./parser.js";
import type { FunctionTable } from "./runtime.js";

const COMPILED_CACHE_LIMIT = 128;

export interface QueryOutcome {
  result: unknown;
  error?: string;
}

export interface QueryEngineOptions {
  // Merged over the built-ins; an entry with a built-in's name replaces it.
  functions?: FunctionTable;
}

export interface QueryEngine {
  /** Evaluate `expression` against `data`. Throws QueryError on bad input. */
  search(data: unknown, expression: string): unknown;
  /** Like `search`, but never throws: failures become `{ result: [], error }`. */
  run(data: unknown, expression: string): QueryOutcome;
}

export function createQueryEngine(options: QueryEngineOptions = {}): QueryEngine {
  const interpreter = new Interpreter({ ...builtinFunctions, ...options.functions });
  const compiled = new Map<string, AstNode>();

  function parse(expression: string): AstNode {
    const hit = compiled.get(expression);
    if (hit) return hit;
    const ast = compile(expression);
    if (compiled.size >= COMPILED_CACHE_LIMIT) compiled.clear();
    compiled.set(expression, ast);
    return ast;
  }

  function search(data: unknown, expression: string): unknown {
    return interpreter.visit(parse(expression), data);
  }

  function run(data: unknown, expression: string): QueryOutcome {
    try {
      return { result: search(data, expression) };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { result: [], error: `Invalid JMESPath query: ${message}` };
    }
  }

  return { search, run };
}

/** Engine with the built-ins plus nvl, int, str and regex_replace. */
export function createSnapshotQueryEngine(): QueryEngine {
  return createQueryEngine({ functions: snapshotFunctions });
}
