/**
 * @module cli/args
 * @fileoverview Command-line flags, parsed with yargs and validated with zod.
 *
 * ```
 * vk-graph-crawler [--query <name>] [--depth-limit N] [--friends-limit N]
 *                  [--subscriptions-limit N] [--uri URI] [--no-wipe]
 *                  [--log-level L]
 * ```
 *
 * Defaults come from the loaded {@link AppConfig}, so environment variables
 * set the baseline and flags override it.
 */

import yargs from "yargs";
import { z } from "zod";
import type { AppConfig } from "../config.js";
import { QUERY_NAMES } from "../store/analytics.js";
import { CliUsageError } from "../utils/errors.js";
import { LOG_LEVELS } from "../utils/logger.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Schema
 * ──────────────────────────────────────────────────────────────────────────── */

export const CliOptionsSchema = z.object({
  query: z.enum(QUERY_NAMES).optional(),
  depthLimit: z.number().int().positive(),
  friendsLimit: z.number().int().positive(),
  subscriptionsLimit: z.number().int().nonnegative(),
  uri: z.string().min(1),
  wipe: z.boolean(),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/* ────────────────────────────────────────────────────────────────────────────
 * Parser
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Parse `argv` (without the node and script entries).
 *
 * @throws {CliUsageError} On unknown flags or invalid values.
 *
 * @example
 * ```ts
 * parseArgs(["--query", "top_users", "--no-wipe"], loadConfig());
 * // => { query: "top_users", wipe: false, depthLimit: 3, ... }
 * ```
 */
export function parseArgs(argv: readonly string[], defaults: AppConfig): CliOptions {
  const parsed = yargs([...argv])
    .scriptName("vk-graph-crawler")
    .usage("$0 [options]")
    .option("query", {
      type: "string",
      describe: `Run a single analytic query (${QUERY_NAMES.join(", ")}) instead of crawling`,
    })
    .option("depth-limit", {
      type: "number",
      default: defaults.depthLimit,
      describe: "Maximum crawl depth, the root user is depth 1",
    })
    .option("friends-limit", {
      type: "number",
      default: defaults.friendsLimit,
      describe: "Friends requested per user",
    })
    .option("subscriptions-limit", {
      type: "number",
      default: defaults.subscriptionsLimit,
      describe: "Open groups collected per user",
    })
    .option("uri", {
      type: "string",
      default: defaults.neo4jUri,
      describe: "Neo4j connection URI",
    })
    .option("wipe", {
      type: "boolean",
      default: true,
      describe: "Delete the existing graph before running (--no-wipe keeps it)",
    })
    .option("log-level", {
      type: "string",
      choices: LOG_LEVELS,
      default: defaults.logLevel,
    })
    .strict()
    .help()
    .fail((message, error) => {
      throw new CliUsageError(message || (error ? error.message : "invalid arguments"));
    })
    .parseSync();

  const result = CliOptionsSchema.safeParse({
    query: parsed.query,
    depthLimit: parsed.depthLimit,
    friendsLimit: parsed.friendsLimit,
    subscriptionsLimit: parsed.subscriptionsLimit,
    uri: parsed.uri,
    wipe: parsed.wipe,
    logLevel: parsed.logLevel,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const flag = issue?.path.join(".") ?? "arguments";
    throw new CliUsageError(`Invalid --${toKebab(flag)}: ${issue?.message ?? "invalid value"}`);
  }
  return result.data;
}

function toKebab(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}
