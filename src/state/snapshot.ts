import { parseAriaSnapshot } from "../aria/parser.js";
import { serializeTree } from "../aria/serializer.js";
import { formatOutput } from "../output/format.js";
import { paginate } from "../output/paginate.js";
import type { QueryEngine } from "../query/engine.js";
import { flattenSnapshot } from "../query/flatten.js";
import type {
  BulkRequest,
  BulkResponse,
  BulkStep,
  ErrorDetail,
  OutputFormat,
  ParseError,
  SerializedTree,
  SnapshotRequest,
  SnapshotResponse,
} from "../types.js";
import type { SnapshotCache } from "./snapshot-cache.js";

export interface SnapshotContext {
  cache: SnapshotCache;
  engine: QueryEngine;
  defaultLimit: number;
  maxLimit: number;
}

interface LoadedSnapshot {
  cacheKey: string;
  url: string;
  data: SerializedTree;
}

interface StepSettings {
  query?: string;
  flatten: boolean;
  offset: number;
  limit: number;
  outputFormat: OutputFormat;
  silent: boolean;
}

function formatParseError(error: ParseError): string {
  return error.line !== undefined ? `Line ${error.line}: ${error.message}` : error.message;
}

/**
 * Resolve the snapshot a request refers to: a cached entry when a key is
 * given (refreshing its TTL), otherwise freshly parsed text, which is then
 * cached under a new key.
 */
function loadSnapshot(
  context: SnapshotContext,
  request: Pick<SnapshotRequest, "snapshot" | "sourceUrl" | "cacheKey" | "ttlSeconds">,
): LoadedSnapshot | ErrorDetail[] {
  if (request.cacheKey) {
    const entry = context.cache.get(request.cacheKey);
    if (!entry) {
      return [{ code: "CACHE_MISS", message: `Cache key ${request.cacheKey} not found or expired` }];
    }
    return { cacheKey: entry.key, url: entry.sourceUrl, data: entry.snapshot };
  }

  if (request.snapshot !== undefined) {
    const { tree, errors } = parseAriaSnapshot(request.snapshot);
    if (errors.length > 0) {
      return errors.map((error): ErrorDetail => ({ code: "PARSE_FAILED", message: formatParseError(error) }));
    }
    const url = request.sourceUrl ?? "";
    const data = serializeTree(tree ?? []);
    return { cacheKey: context.cache.create(url, data, request.ttlSeconds), url, data };
  }

  return [{ code: "INVALID_ARGUMENT", message: "Either snapshot or cacheKey is required" }];
}

function resolveStep(context: SnapshotContext, step: BulkStep, silent = false): StepSettings | ErrorDetail[] {
  const offset = step.offset ?? 0;
  const limit = Math.min(step.limit ?? context.defaultLimit, context.maxLimit);
  const errors: ErrorDetail[] = [];
  if (!Number.isInteger(offset) || offset < 0) {
    errors.push({ code: "INVALID_ARGUMENT", message: `offset must be a non-negative integer, got ${offset}` });
  }
  if (!Number.isInteger(limit) || limit < 1) {
    errors.push({ code: "INVALID_ARGUMENT", message: `limit must be a positive integer, got ${limit}` });
  }
  if (errors.length > 0) return errors;
  return {
    query: step.query || undefined,
    flatten: step.flatten ?? false,
    offset,
    limit,
    outputFormat: step.outputFormat ?? "yaml",
    silent,
  };
}

export function errorSnapshotResponse(
  errors: ErrorDetail[],
  start: number,
  fields: Partial<Pick<SnapshotResponse, "url" | "cacheKey" | "offset" | "limit" | "outputFormat" | "queryApplied">> = {},
): SnapshotResponse {
  return {
    version: 1,
    ok: false,
    url: fields.url ?? "",
    cacheKey: fields.cacheKey ?? "",
    totalItems: 0,
    offset: fields.offset ?? 0,
    limit: fields.limit ?? 0,
    hasMore: false,
    snapshot: null,
    queryApplied: fields.queryApplied ?? null,
    outputFormat: fields.outputFormat ?? "yaml",
    errors,
    timingMs: Date.now() - start,
  };
}

function runStep(context: SnapshotContext, loaded: LoadedSnapshot, settings: StepSettings, start: number): SnapshotResponse {
  const errors: ErrorDetail[] = [];
  let result: unknown = settings.flatten ? flattenSnapshot(loaded.data) : loaded.data;

  if (settings.query) {
    const outcome = context.engine.run(result, settings.query);
    result = outcome.result;
    if (outcome.error) errors.push({ code: "QUERY_FAILED", message: outcome.error });
  }

  const page = paginate(result, settings.offset, settings.limit);
  return {
    version: 1,
    ok: errors.length === 0,
    url: loaded.url,
    cacheKey: loaded.cacheKey,
    totalItems: page.total,
    offset: page.offset,
    limit: page.limit,
    hasMore: page.hasMore,
    snapshot: settings.silent ? null : formatOutput(page.items, settings.outputFormat),
    queryApplied: settings.query ?? null,
    outputFormat: settings.outputFormat,
    errors,
    timingMs: Date.now() - start,
  };
}

/**
 * Parse (or fetch from cache), optionally flatten and query, then return one
 * formatted page of the result. Failures are reported in `errors`; this never
 * throws for bad input.
 */
export function processSnapshot(context: SnapshotContext, request: SnapshotRequest): SnapshotResponse {
  const start = Date.now();

  const settings = resolveStep(context, request, request.silent);
  if (Array.isArray(settings)) return errorSnapshotResponse(settings, start);

  const loaded = loadSnapshot(context, request);
  if (Array.isArray(loaded)) {
    return errorSnapshotResponse(loaded, start, {
      offset: settings.offset,
      limit: settings.limit,
      outputFormat: settings.outputFormat,
      queryApplied: settings.query ?? null,
    });
  }

  return runStep(context, loaded, settings, start);
}

/**
 * Run several query/page steps against one snapshot, in order. With
 * `stopOnError` (the default) the first failed step ends the run.
 */
export function processBulk(context: SnapshotContext, request: BulkRequest): BulkResponse {
  const start = Date.now();
  const stopOnError = request.stopOnError ?? true;
  const totalCount = request.steps.length;

  const loaded = loadSnapshot(context, request);
  if (Array.isArray(loaded)) {
    return {
      version: 1,
      ok: false,
      cacheKey: "",
      executedCount: 0,
      totalCount,
      results: [errorSnapshotResponse(loaded, start)],
      stoppedAt: 0,
      timingMs: Date.now() - start,
    };
  }

  const results: SnapshotResponse[] = [];
  let stoppedAt: number | null = null;
  for (let i = 0; i < totalCount; i++) {
    const stepStart = Date.now();
    const settings = resolveStep(context, request.steps[i]);
    const result = Array.isArray(settings)
      ? errorSnapshotResponse(settings, stepStart, { url: loaded.url, cacheKey: loaded.cacheKey })
      : runStep(context, loaded, settings, stepStart);
    results.push(result);
    if (!result.ok && stopOnError) {
      stoppedAt = i;
      break;
    }
  }

  return {
    version: 1,
    ok: results.every((result) => result.ok),
    cacheKey: loaded.cacheKey,
    executedCount: results.length,
    totalCount,
    results,
    stoppedAt,
    timingMs: Date.now() - start,
  };
}
