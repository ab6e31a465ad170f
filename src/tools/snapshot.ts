import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorSnapshotResponse, processBulk, processSnapshot } from "../state/snapshot.js";
import type { SnapshotContext } from "../state/snapshot.js";
import type { BulkRequest, BulkResponse, BulkStep, ErrorDetail, SnapshotRequest, SnapshotResponse } from "../types.js";

const outputFormat = z.enum(["json", "yaml"]).describe('Output format, "yaml" (default) or "json"');

const stepShape = {
  jmespath_query: z
    .string()
    .optional()
    .describe("JMESPath expression. Extra functions: nvl(v, default), int(v), str(v), regex_replace(pattern, repl, v)"),
  flatten: z.boolean().optional().describe("Flatten the tree depth-first first, adding _depth, _parent_role, _index"),
  offset: z.number().int().min(0).optional().describe("Index of the first item to return (default 0)"),
  limit: z.number().int().min(1).optional().describe("Maximum items to return"),
  output_format: outputFormat.optional(),
};

const sourceShape = {
  snapshot: z.string().optional().describe("Raw aria snapshot text, optionally with a preamble or code fence"),
  source_url: z.string().optional().describe("URL the snapshot was taken from"),
  cache_key: z.string().optional().describe("Key from an earlier call; reuses the cached snapshot"),
};

const stepSchema = z.object(stepShape);
type StepArgs = z.infer<typeof stepSchema>;

const queryArgsSchema = z.object({
  ...sourceShape,
  ...stepShape,
  silent_mode: z.boolean().optional().describe("Cache and count only; return no snapshot text"),
  ttl_seconds: z.number().int().positive().optional().describe("Cache lifetime after last access"),
});
export type SnapshotQueryArgs = z.infer<typeof queryArgsSchema>;

const bulkArgsSchema = z.object({
  ...sourceShape,
  queries: z.array(stepSchema).min(1).describe("Query steps, run in order against the same snapshot"),
  stop_on_error: z.boolean().optional().describe("Stop at the first failed step (default true)"),
});
export type SnapshotBulkArgs = z.infer<typeof bulkArgsSchema>;

function toStep(args: StepArgs): BulkStep {
  return {
    query: args.jmespath_query,
    flatten: args.flatten,
    offset: args.offset,
    limit: args.limit,
    outputFormat: args.output_format,
  };
}

export function toSnapshotRequest(args: SnapshotQueryArgs): SnapshotRequest {
  return {
    ...toStep(args),
    snapshot: args.snapshot,
    sourceUrl: args.source_url,
    cacheKey: args.cache_key,
    silent: args.silent_mode,
    ttlSeconds: args.ttl_seconds,
  };
}

export function toBulkRequest(args: SnapshotBulkArgs): BulkRequest {
  return {
    snapshot: args.snapshot,
    sourceUrl: args.source_url,
    cacheKey: args.cache_key,
    steps: args.queries.map(toStep),
    stopOnError: args.stop_on_error,
  };
}

function describeErrors(errors: ErrorDetail[]): string {
  return errors.map((e) => `${e.code} ${e.message}`).join("; ");
}

function unexpectedError(tool: string, err: unknown): ErrorDetail[] {
  console.error(`[aria-lens] ${tool} crashed:`, err);
  return [{ code: "INTERNAL_ERROR", message: err instanceof Error ? err.message : String(err) }];
}

function textResult(payload: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload) }],
  };
}

export function registerSnapshotTools(server: McpServer, context: SnapshotContext): void {
  server.tool(
    "snapshot_query",
    "Parse an aria snapshot (or reuse a cached one by cache_key), optionally flatten and filter it with JMESPath, and return one page of the result.",
    queryArgsSchema.shape,
    async (args) => {
      const start = Date.now();
      let response: SnapshotResponse;
      try {
        response = processSnapshot(context, toSnapshotRequest(args));
      } catch (err) {
        response = errorSnapshotResponse(unexpectedError("snapshot_query", err), start);
      }
      if (!response.ok) {
        console.error(`[aria-lens] snapshot_query failed: ${describeErrors(response.errors)}`);
      }
      return textResult(response);
    },
  );

  server.tool(
    "snapshot_query_bulk",
    "Run several JMESPath query/page steps against one snapshot. Steps run in order; by default the first failure stops the run.",
    bulkArgsSchema.shape,
    async (args) => {
      const start = Date.now();
      let response: BulkResponse;
      try {
        response = processBulk(context, toBulkRequest(args));
      } catch (err) {
        const failed = errorSnapshotResponse(unexpectedError("snapshot_query_bulk", err), start);
        response = {
          version: 1,
          ok: false,
          cacheKey: "",
          executedCount: 0,
          totalCount: args.queries.length,
          results: [failed],
          stoppedAt: 0,
          timingMs: Date.now() - start,
        };
      }
      if (!response.ok) {
        const failed = response.results.filter((r) => !r.ok).flatMap((r) => r.errors);
        console.error(`[aria-lens] snapshot_query_bulk failed: ${describeErrors(failed)}`);
      }
      return textResult(response);
    },
  );

  server.tool(
    "snapshot_release",
    "Drop a cached snapshot before its TTL runs out.",
    { cache_key: z.string().describe("Key returned by snapshot_query") },
    async ({ cache_key }) => {
      return textResult({ version: 1, ok: true, released: context.cache.delete(cache_key) });
    },
  );
}
