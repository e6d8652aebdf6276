/**
 * @module cli/run
 * @fileoverview The command-line flow, independent of the real process.
 *
 * ```
 * parse flags ─> prompt inputs ─> connect ─> ensure constraints ─> wipe?
 *      │
 *      ├── --query <name> ──> run that query
 *      └── otherwise ──────> crawl, then run all five queries
 *      │
 *      └─> close store (always)
 * ```
 *
 * ## Exit Codes
 * | Code | Meaning                                   |
 * |------|-------------------------------------------|
 * | 0    | success                                   |
 * | 1    | any other failure (store unreachable, ...) |
 * | 2    | usage error                               |
 * | 3    | crawl aborted (root profile unavailable)  |
 */

import type { AppConfig } from "../config.js";
import { runCrawl } from "../commands/crawl.js";
import { runQueries } from "../commands/query.js";
import type { FetchLike } from "../services/api-client.js";
import type { GraphStore } from "../store/graph-store.js";
import { CliUsageError, CrawlAbortedError, formatError } from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { parseArgs } from "./args.js";
import { collectInputs, parseUserRef, type Ask } from "./prompts.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_CRAWL_ABORTED = 3;

export interface RunDependencies {
  config: AppConfig;
  env: Record<string, string | undefined>;
  ask: Ask;
  /** Opens the graph store for the given connection settings. */
  openStore: (uri: string, user: string, password: string, logger: Logger) => Promise<GraphStore>;
  /** Receives result lines (stdout). */
  print: (line: string) => void;
  /** Receives log lines (stderr). */
  writeLog?: (line: string) => void;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  /** Called with the opened store so a signal handler can close it. */
  onStoreOpened?: (store: GraphStore) => void;
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof CliUsageError) {
    return EXIT_USAGE;
  }
  if (error instanceof CrawlAbortedError) {
    return EXIT_CRAWL_ABORTED;
  }
  return EXIT_FAILURE;
}

/** Run the CLI; resolves to the process exit code and never rejects. */
export async function run(argv: readonly string[], deps: RunDependencies): Promise<number> {
  const { config } = deps;
  let logger = createLogger({ level: config.logLevel, format: config.logFormat, write: deps.writeLog });
  let store: GraphStore | undefined;

  try {
    const options = parseArgs(argv, config);
    logger = createLogger({ level: options.logLevel, format: config.logFormat, write: deps.writeLog });

    const inputs = await collectInputs(deps.ask, deps.env, options.query === undefined, config.neo4jUser);

    store = await deps.openStore(options.uri, inputs.neo4jUser, inputs.neo4jPassword, logger.child("store"));
    deps.onStoreOpened?.(store);
    logger.info("Connected to graph store", { uri: options.uri });

    await store.ensureConstraints();
    if (options.wipe) {
      await store.wipe();
    }

    if (options.query !== undefined) {
      await runQueries(store, deps.print, [options.query]);
      return EXIT_OK;
    }

    await runCrawl(parseUserRef(inputs.rootUser), {
      config,
      credentials: { accessToken: inputs.accessToken, serviceToken: inputs.serviceToken },
      limits: {
        depthLimit: options.depthLimit,
        friendsLimit: options.friendsLimit,
        subscriptionsLimit: options.subscriptionsLimit,
      },
      store,
      logger,
      fetch: deps.fetch,
      sleep: deps.sleep,
    });
    await runQueries(store, deps.print);
    return EXIT_OK;
  } catch (error) {
    logger.error(formatError(error));
    return exitCodeFor(error);
  } finally {
    if (store) {
      await closeQuietly(store, logger);
    }
  }
}

async function closeQuietly(store: GraphStore, logger: Logger): Promise<void> {
  try {
    await store.close();
  } catch (error) {
    logger.warn("Failed to close graph store", { error: formatError(error) });
  }
}
