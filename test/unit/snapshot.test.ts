import { describe, it, expect, beforeEach } from "vitest";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import { createSnapshotQueryEngine } from "../../src/query/engine.js";
import { SnapshotCache } from "../../src/state/snapshot-cache.js";
import { processBulk, processSnapshot } from "../../src/state/snapshot.js";
import type { SnapshotContext } from "../../src/state/snapshot.js";

const exampleDomain = readFileSync(resolve(import.meta.dirname, "../fixtures/example-domain.txt"), "utf-8");

let context: SnapshotContext;
let keys: number;

beforeEach(() => {
  keys = 0;
  context = {
    cache: new SnapshotCache({ generateKey: () => `snap_${++keys}` }),
    engine: createSnapshotQueryEngine(),
    defaultLimit: 2,
    maxLimit: 3,
  };
});

describe("processSnapshot", () => {
  it("parses, caches and returns the first page", () => {
    const response = processSnapshot(context, {
      snapshot: exampleDomain,
      sourceUrl: "https://example.com",
      flatten: true,
      query: "[?ref].ref",
      outputFormat: "json",
    });

    expect(response).toMatchObject({
      version: 1,
      ok: true,
      url: "https://example.com",
      cacheKey: "snap_1",
      totalItems: 5,
      offset: 0,
      limit: 2,
      hasMore: true,
      snapshot: '["e2","e3"]',
      queryApplied: "[?ref].ref",
      outputFormat: "json",
      errors: [],
    });
    expect(context.cache.size).toBe(1);
  });

  it("pages through a cached snapshot by key", () => {
    processSnapshot(context, { snapshot: exampleDomain, silent: true });
    const response = processSnapshot(context, {
      cacheKey: "snap_1",
      flatten: true,
      query: "[?ref].ref",
      offset: 4,
    });

    expect(response).toMatchObject({ ok: true, cacheKey: "snap_1", totalItems: 5, hasMore: false, snapshot: "- e6\n" });
  });

  it("caps the limit at the configured maximum", () => {
    const response = processSnapshot(context, { snapshot: exampleDomain, flatten: true, limit: 50, silent: true });
    expect(response).toMatchObject({ ok: true, limit: 3, totalItems: 5, hasMore: true, snapshot: null });
  });

  it("reports parse errors without caching", () => {
    const response = processSnapshot(context, { snapshot: '- button "Go" [ref=e1' });
    expect(response.ok).toBe(false);
    expect(response.cacheKey).toBe("");
    expect(response.errors).toEqual([{ code: "PARSE_FAILED", message: "Line 1: Unterminated attribute list" }]);
    expect(context.cache.size).toBe(0);
  });

  it("caches an empty snapshot for blank input", () => {
    const response = processSnapshot(context, { snapshot: "" });
    expect(response).toMatchObject({ ok: true, cacheKey: "snap_1", totalItems: 0, snapshot: "[]\n" });
  });

  it("reports query failures with an empty result", () => {
    const response = processSnapshot(context, { snapshot: exampleDomain, query: "[?", outputFormat: "json" });
    expect(response.ok).toBe(false);
    expect(response.cacheKey).toBe("snap_1");
    expect(response.totalItems).toBe(0);
    expect(response.snapshot).toBe("[]");
    expect(response.errors).toHaveLength(1);
    expect(response.errors[0].code).toBe("QUERY_FAILED");
  });

  it("reports a missing cache entry", () => {
    expect(processSnapshot(context, { cacheKey: "snap_gone" }).errors).toEqual([
      { code: "CACHE_MISS", message: "Cache key snap_gone not found or expired" },
    ]);
  });

  it("needs a snapshot or a key", () => {
    expect(processSnapshot(context, {}).errors).toEqual([
      { code: "INVALID_ARGUMENT", message: "Either snapshot or cacheKey is required" },
    ]);
  });

  it("rejects a negative offset", () => {
    expect(processSnapshot(context, { snapshot: exampleDomain, offset: -1 }).errors).toEqual([
      { code: "INVALID_ARGUMENT", message: "offset must be a non-negative integer, got -1" },
    ]);
  });
});

describe("processBulk", () => {
  it("runs every step against one cached snapshot", () => {
    const response = processBulk(context, {
      snapshot: exampleDomain,
      steps: [
        { flatten: true, query: "[?role == 'heading'].name.value", outputFormat: "json" },
        { flatten: true, query: "length(@)", outputFormat: "json" },
      ],
    });

    expect(response).toMatchObject({ ok: true, cacheKey: "snap_1", executedCount: 2, totalCount: 2, stoppedAt: null });
    expect(response.results.map((r) => r.snapshot)).toEqual(['["Example Domain"]', "[5]"]);
    expect(context.cache.size).toBe(1);
  });

  it("stops at the first failed step by default", () => {
    const response = processBulk(context, {
      snapshot: exampleDomain,
      steps: [{ query: "length(@)" }, { query: "nope(@)" }, { query: "length(@)" }],
    });
    expect(response).toMatchObject({ ok: false, executedCount: 2, totalCount: 3, stoppedAt: 1 });
    expect(response.results[1].errors[0]).toEqual({
      code: "QUERY_FAILED",
      message: "Invalid JMESPath query: UnknownFunctionError: Unknown function: nope()",
    });
  });

  it("keeps going when asked to", () => {
    const response = processBulk(context, {
      snapshot: exampleDomain,
      steps: [{ query: "nope(@)" }, { query: "length(@)" }],
      stopOnError: false,
    });
    expect(response).toMatchObject({ ok: false, executedCount: 2, stoppedAt: null });
    expect(response.results.map((r) => r.ok)).toEqual([false, true]);
  });

  it("fails before any step when the snapshot cannot be loaded", () => {
    const response = processBulk(context, { cacheKey: "snap_gone", steps: [{}, {}] });
    expect(response).toMatchObject({ ok: false, cacheKey: "", executedCount: 0, totalCount: 2, stoppedAt: 0 });
    expect(response.results[0].errors[0].code).toBe("CACHE_MISS");
  });
});
