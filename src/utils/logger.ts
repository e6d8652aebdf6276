/**
 * @module utils/logger
 * @fileoverview Structured logger injected into every component.
 *
 * The entry point creates one root logger from the configuration and hands
 * scoped children to the API client, the store and the crawler. Nothing in
 * the library reads a global logger.
 *
 * All output goes to stderr through `console.error`: stdout carries only the
 * query results printed by the CLI.
 *
 * Text format:
 * ```
 * 2026-10-18T09:12:44.120Z WARN  [api] Profile is private {"method":"friends.get","user_id":42}
 * ```
 *
 * JSON format (one object per line):
 * ```
 * {"ts":"2026-10-18T09:12:44.120Z","level":"warn","scope":"api","message":"Profile is private","method":"friends.get","user_id":42}
 * ```
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "text" | "json";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Returns a logger whose lines carry `scope` (nested scopes join with `:`). */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  scope?: string;
  /** Line sink; defaults to `console.error`. */
  write?: (line: string) => void;
  /** Clock used for timestamps. */
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function formatText(
  ts: string,
  level: LogLevel,
  scope: string | undefined,
  message: string,
  context: LogContext | undefined,
): string {
  const label = level.toUpperCase().padEnd(5);
  const scopePart = scope ? ` [${scope}]` : "";
  const contextPart =
    context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
  return `${ts} ${label}${scopePart} ${message}${contextPart}`;
}

function formatJson(
  ts: string,
  level: LogLevel,
  scope: string | undefined,
  message: string,
  context: LogContext | undefined,
): string {
  return JSON.stringify({
    ts,
    level,
    ...(scope ? { scope } : {}),
    message,
    ...(context ?? {}),
  });
}

/**
 * Create a logger. Messages below `level` are dropped.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * const apiLogger = logger.child("api");
 * apiLogger.warn("Retrying request", { method: "friends.get", attempt: 2 });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const format = options.format ?? "text";
  const write = options.write ?? ((line: string) => console.error(line));
  const now = options.now ?? (() => new Date());
  const scope = options.scope;

  const emit = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const ts = now().toISOString();
    const line =
      format === "json"
        ? formatJson(ts, level, scope, message, context)
        : formatText(ts, level, scope, message, context);
    write(line);
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
    child: (childScope) =>
      createLogger({
        ...options,
        scope: scope ? `${scope}:${childScope}` : childScope,
      }),
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = createLogger({ write: () => undefined });
