/**
 * @module config
 * @fileoverview Application configuration loaded from environment variables.
 *
 * Every setting has a default so the crawler starts with no configuration at
 * all; the CLI flags (`src/cli/args.ts`) override the crawl limits and the
 * store URI on top of this.
 *
 * ## Architecture Position
 * This module sits at the bottom of the dependency graph: the entry point
 * reads it and passes the values down. Library modules (API client, store,
 * crawler) take plain option objects and never import `config` themselves.
 *
 * ```
 *  +-----------+   +-----------+   +-----------+
 *  |  commands |   |  crawler  |   |  services |
 *  +-----+-----+   +-----+-----+   +-----+-----+
 *        |        options|               |options
 *        +-------+-------+-------+-------+
 *                |
 *          +-----v-----+
 *          |  index.ts  |  <-- loadConfig()
 *          +-----------+
 * ```
 *
 * ## Environment Variable Naming Convention
 * - All uppercase with underscores (SCREAMING_SNAKE_CASE).
 * - Numeric values are parsed with `parseInt(..., 10)`; an unparsable value
 *   falls back to the default.
 *
 * @example
 * ```ts
 * import { loadConfig } from "./config.js";
 * const cfg = loadConfig({ API_RETRY_COUNT: "5" });
 * cfg.retryCount; // 5
 * cfg.retryDelayMs; // 2000
 * ```
 */

import { isLogLevel, type LogFormat, type LogLevel } from "./utils/logger.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

export interface AppConfig {
  /**
   * Base URL the API method name is appended to.
   *
   * @default "https://api.vk.com/method/"
   */
  apiBaseUrl: string;

  /**
   * Protocol version sent as `v` with every request.
   *
   * @default "5.131"
   */
  apiVersion: string;

  /**
   * Attempts per API call before it fails with `FatalApiError`.
   *
   * @default 3
   */
  retryCount: number;

  /**
   * Pause between two attempts of the same call, in milliseconds.
   *
   * @default 2000
   */
  retryDelayMs: number;

  /**
   * Timeout of a single HTTP request, in milliseconds.
   *
   * @default 10000
   */
  fetchTimeoutMs: number;

  /**
   * Lifetime of resolved group metadata in the in-process cache, in seconds.
   * `0` disables the cache.
   *
   * @default 3600
   */
  groupCacheTtlSeconds: number;

  /** @default 3 */
  depthLimit: number;

  /** @default 100 */
  friendsLimit: number;

  /** @default 300 */
  subscriptionsLimit: number;

  /** @default "bolt://localhost:7687" */
  neo4jUri: string;

  /** @default "neo4j" */
  neo4jUser: string;

  /** @default "info" */
  logLevel: LogLevel;

  /** @default "text" */
  logFormat: LogFormat;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  return raw === undefined || raw.trim() === "" ? fallback : raw.trim();
}

/**
 * Build a complete {@link AppConfig} from an environment map.
 *
 * Pure: reads only `env` (defaults to `process.env`) at call time.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = readString(env, "LOG_LEVEL", "info").toLowerCase();
  const logFormat = readString(env, "LOG_FORMAT", "text").toLowerCase();

  return {
    apiBaseUrl: readString(env, "VK_API_BASE_URL", "https://api.vk.com/method/"),
    apiVersion: readString(env, "VK_API_VERSION", "5.131"),
    retryCount: readInt(env, "API_RETRY_COUNT", 3),
    retryDelayMs: readInt(env, "API_RETRY_DELAY_MS", 2000),
    fetchTimeoutMs: readInt(env, "FETCH_TIMEOUT", 10000),
    groupCacheTtlSeconds: readInt(env, "GROUP_CACHE_TTL", 3600),

    depthLimit: readInt(env, "DEPTH_LIMIT", 3),
    friendsLimit: readInt(env, "FRIENDS_LIMIT", 100),
    subscriptionsLimit: readInt(env, "SUBSCRIPTIONS_LIMIT", 300),

    neo4jUri: readString(env, "NEO4J_URI", "bolt://localhost:7687"),
    neo4jUser: readString(env, "NEO4J_USER", "neo4j"),

    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    logFormat: logFormat === "json" ? "json" : "text",
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Singleton Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Configuration snapshot taken once at module load. Tests call
 * {@link loadConfig} directly instead.
 */
export const config: AppConfig = loadConfig();
