#!/usr/bin/env node
/**
 * @module index
 * @fileoverview vk-graph-crawler entry point.
 *
 * Crawls the friendship and group-subscription graph around one user into
 * Neo4j, then prints summary queries over the collected graph.
 *
 * ## Architecture
 * ```
 * index.ts (this file)
 *   |
 *   +-- cli/run.ts --> cli/args.ts, cli/prompts.ts
 *         |
 *         +-- commands/crawl.ts --> crawler/crawl-orchestrator.ts
 *         |                           +-- services/vk-api.ts --> services/api-client.ts
 *         |                           +-- crawler/subscription-collector.ts
 *         |                           +-- store/graph-store.ts
 *         +-- commands/query.ts --> store/analytics.ts
 * ```
 *
 * ## Environment Variables
 * See {@link config} for the settings read at startup; `VK_ACCESS_TOKEN`,
 * `VK_SERVICE_TOKEN`, `VK_ROOT_USER` and `NEO4J_PASSWORD` pre-fill prompts.
 */

import { hideBin } from "yargs/helpers";
import { config } from "./config.js";
import { createTerminalAsk } from "./cli/prompts.js";
import { run } from "./cli/run.js";
import { Neo4jGraphStore, type GraphStore } from "./store/graph-store.js";
import { createNeo4jExecutor } from "./store/neo4j-executor.js";

// ---------------------------------------------------------------------------
// Startup
// ---------------------------------------------------------------------------

let openStore: GraphStore | undefined;

/** SIGINT: close the graph store, then exit with 130. */
async function interrupt(): Promise<void> {
  console.error("[vk-graph-crawler] Interrupted, closing graph store");
  try {
    await openStore?.close();
  } catch (error) {
    console.error("[vk-graph-crawler] Failed to close graph store:", error);
  }
  process.exit(130);
}

async function main(): Promise<number> {
  const terminal = createTerminalAsk();
  process.once("SIGINT", () => {
    terminal.close();
    void interrupt();
  });

  try {
    return await run(hideBin(process.argv), {
      config,
      env: process.env,
      ask: (question) => terminal.ask(question),
      openStore: async (uri, user, password, logger) =>
        new Neo4jGraphStore(await createNeo4jExecutor(uri, user, password), logger),
      print: (line) => console.log(line),
      onStoreOpened: (store) => {
        openStore = store;
        terminal.close();
      },
    });
  } finally {
    terminal.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[vk-graph-crawler] Fatal error:", error);
    process.exit(1);
  });
