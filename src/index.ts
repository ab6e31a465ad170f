#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { parseArgs } from "./config.js";
import { createSnapshotQueryEngine } from "./query/engine.js";
import { SnapshotCache } from "./state/snapshot-cache.js";
import { registerSnapshotTools } from "./tools/snapshot.js";

async function main(): Promise<void> {
  const config = parseArgs(process.argv.slice(2));

  const server = new McpServer({
    name: "aria-lens",
    version: "0.1.0",
  });

  const cache = new SnapshotCache({ defaultTtlSeconds: config.cacheTtlSeconds });
  registerSnapshotTools(server, {
    cache,
    engine: createSnapshotQueryEngine(),
    defaultLimit: config.defaultLimit,
    maxLimit: config.maxLimit,
  });

  console.error(
    `[aria-lens] Cache TTL ${config.cacheTtlSeconds}s, default limit ${config.defaultLimit}, max limit ${config.maxLimit}`,
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[aria-lens] MCP server ready on stdio");

  const shutdown = async () => {
    console.error("[aria-lens] Shutting down...");
    cache.clear();
    await server.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error("[aria-lens] Shutdown failed:", err);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  console.error("[aria-lens] Fatal:", err);
  process.exit(1);
});
