import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";

import { createSnapshotQueryEngine } from "../../src/query/engine.js";
import { SnapshotCache } from "../../src/state/snapshot-cache.js";
import { registerSnapshotTools, toBulkRequest, toSnapshotRequest } from "../../src/tools/snapshot.js";

const page = '- navigation "Main":\n  - link "Home" [ref=e1]\n  - link "About" [ref=e2]\n- button "Sign in" [ref=e3]';

let server: McpServer;
let client: Client;
let keys = 0;
const cache = new SnapshotCache({ generateKey: () => `snap_${++keys}` });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function call(name: string, args: Record<string, unknown>): Promise<Record<string, unknown>> {
  const result = await client.callTool({ name, arguments: args });
  const content: unknown = result.content;
  if (!Array.isArray(content) || content.length !== 1) throw new Error("Expected one content item");
  const [item]: unknown[] = content;
  if (!isRecord(item) || item.type !== "text" || typeof item.text !== "string") {
    throw new Error("Expected a text content item");
  }
  const payload: unknown = JSON.parse(item.text);
  if (!isRecord(payload)) throw new Error("Expected a JSON object");
  return payload;
}

beforeAll(async () => {
  server = new McpServer({ name: "aria-lens-test", version: "0.0.0" });
  registerSnapshotTools(server, { cache, engine: createSnapshotQueryEngine(), defaultLimit: 100, maxLimit: 100 });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: "test-client", version: "0.0.0" });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
});

afterAll(async () => {
  await client.close();
  await server.close();
});

describe("argument mapping", () => {
  it("maps snake_case tool arguments onto a request", () => {
    expect(
      toSnapshotRequest({
        snapshot: page,
        source_url: "https://example.com",
        jmespath_query: "[*].role",
        output_format: "json",
        silent_mode: true,
        ttl_seconds: 30,
      }),
    ).toEqual({
      snapshot: page,
      sourceUrl: "https://example.com",
      cacheKey: undefined,
      query: "[*].role",
      flatten: undefined,
      offset: undefined,
      limit: undefined,
      outputFormat: "json",
      silent: true,
      ttlSeconds: 30,
    });
  });

  it("maps bulk queries onto steps", () => {
    const request = toBulkRequest({ cache_key: "snap_x", queries: [{ jmespath_query: "length(@)", limit: 5 }] });
    expect(request.cacheKey).toBe("snap_x");
    expect(request.steps).toEqual([
      { query: "length(@)", flatten: undefined, offset: undefined, limit: 5, outputFormat: undefined },
    ]);
  });
});

describe("snapshot tools", () => {
  it("lists the three tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual(["snapshot_query", "snapshot_query_bulk", "snapshot_release"]);
  });

  it("snapshot_query filters a flattened snapshot", async () => {
    const response = await call("snapshot_query", {
      snapshot: page,
      flatten: true,
      jmespath_query: "[?role == 'link'].name.value",
      output_format: "json",
    });
    expect(response).toMatchObject({ ok: true, cacheKey: "snap_1", totalItems: 2, snapshot: '["Home","About"]' });
  });

  it("snapshot_query_bulk reuses a cached snapshot", async () => {
    const response = await call("snapshot_query_bulk", {
      cache_key: "snap_1",
      queries: [
        { flatten: true, jmespath_query: "length(@)", output_format: "json" },
        { flatten: true, jmespath_query: "[?ref].ref", offset: 2, output_format: "json" },
      ],
    });
    expect(response).toMatchObject({ ok: true, cacheKey: "snap_1", executedCount: 2, stoppedAt: null });
    const results = response.results;
    expect(Array.isArray(results) ? results.map((r: unknown) => (isRecord(r) ? r.snapshot : null)) : []).toEqual([
      "[4]",
      '["e3"]',
    ]);
  });

  it("snapshot_release drops a cache entry once", async () => {
    expect(await call("snapshot_release", { cache_key: "snap_1" })).toEqual({ version: 1, ok: true, released: true });
    expect(await call("snapshot_release", { cache_key: "snap_1" })).toEqual({ version: 1, ok: true, released: false });

    const response = await call("snapshot_query", { cache_key: "snap_1" });
    expect(response.ok).toBe(false);
    expect(response.errors).toEqual([{ code: "CACHE_MISS", message: "Cache key snap_1 not found or expired" }]);
  });
});
