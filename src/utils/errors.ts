/**
 * @module utils/errors
 * @fileoverview Error class hierarchy for vk-graph-crawler.
 *
 * Every error raised by the crawler extends {@link CrawlerError}, which
 * carries a machine-readable `code` next to the human-readable `message`.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── CrawlerError (base)  ─── code: string
 *         ├── TransientRequestError ─── "TRANSIENT_REQUEST" + statusCode / apiErrorCode
 *         ├── FatalApiError         ─── "API_FATAL"         + method, attempts
 *         ├── UnexpectedShapeError  ─── "UNEXPECTED_SHAPE"  + method
 *         ├── StoreWriteError       ─── "STORE_WRITE_FAILED" + operation
 *         ├── CrawlAbortedError     ─── "CRAWL_ABORTED"
 *         └── CliUsageError         ─── "USAGE"
 * ```
 *
 * A private profile is NOT an error: the API client reports it as the
 * `{ kind: "private" }` outcome (see `services/api-client.ts`).
 *
 * @example
 * ```ts
 * import { FatalApiError, formatError } from "./utils/errors.js";
 *
 * try {
 *   await client.call("friends.get", { user_id: 1 }, "primary");
 * } catch (err) {
 *   logger.error(formatError(err));
 *   // => "[API_FATAL] friends.get failed after 3 attempts: HTTP 502 Bad Gateway"
 * }
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base error class for all vk-graph-crawler errors.
 *
 * Subclasses pass a stable SCREAMING_SNAKE_CASE code; `name` mirrors the
 * concrete class so stack traces read "FatalApiError:" rather than "Error:".
 */
export class CrawlerError extends Error {
  /**
   * Machine-readable error code. Stable across versions.
   *
   * @example "API_FATAL", "UNEXPECTED_SHAPE"
   */
  public readonly code: string;

  /**
   * @param message - Human-readable description of what went wrong.
   * @param code    - Stable machine-readable error code.
   * @param options - Standard `ErrorOptions`; `cause` keeps the wrapped error.
   */
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * API Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * One failed attempt of an API call: network error, timeout, non-2xx status,
 * a body that is not a valid response envelope, or an API error whose code is
 * not the private-profile code.
 *
 * The API client retries these; callers only ever see them wrapped as the
 * `cause` of a {@link FatalApiError}.
 */
export class TransientRequestError extends CrawlerError {
  /** HTTP status, when the server answered with a non-2xx response. */
  public readonly statusCode?: number;

  /** `error.error_code` from the API envelope, when the API reported an error. */
  public readonly apiErrorCode?: number;

  constructor(
    message: string,
    details: { statusCode?: number; apiErrorCode?: number } = {},
    options?: ErrorOptions,
  ) {
    super(message, "TRANSIENT_REQUEST", options);
    this.statusCode = details.statusCode;
    this.apiErrorCode = details.apiErrorCode;
  }
}

/**
 * Thrown when an API call still fails after the whole retry budget.
 *
 * @example
 * ```ts
 * throw new FatalApiError("groups.getById", 3, lastError);
 * // message: "groups.getById failed after 3 attempts: HTTP 503 Service Unavailable"
 * ```
 */
export class FatalApiError extends CrawlerError {
  /** API method name, e.g. `"friends.get"`. */
  public readonly method: string;

  /** Number of attempts made before giving up. */
  public readonly attempts: number;

  constructor(method: string, attempts: number, lastError: unknown) {
    super(
      `${method} failed after ${attempts} attempts: ${describeCause(lastError)}`,
      "API_FATAL",
      { cause: lastError },
    );
    this.method = method;
    this.attempts = attempts;
  }
}

/**
 * A successful response whose payload does not have the structure the
 * endpoint promises (for example an object where a list was expected).
 *
 * Callers log it as a warning and continue with an empty result.
 */
export class UnexpectedShapeError extends CrawlerError {
  /** API method whose payload failed validation. */
  public readonly method: string;

  constructor(method: string, detail: string) {
    super(`Unexpected response structure for ${method}: ${detail}`, "UNEXPECTED_SHAPE");
    this.method = method;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Store and Crawl Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * A failed graph-store write. Writes are best-effort: the store logs this
 * error and returns it through a `Result`, it is never thrown to the crawler.
 */
export class StoreWriteError extends CrawlerError {
  /** Store operation name, e.g. `"upsertFriendEdge"`. */
  public readonly operation: string;

  constructor(operation: string, detail: string, cause?: unknown) {
    super(`${operation} failed for ${detail}: ${describeCause(cause)}`, "STORE_WRITE_FAILED", {
      cause,
    });
    this.operation = operation;
  }
}

/**
 * The crawl could not start: the root user's profile was unavailable.
 * This is the only crawl-time failure that aborts the whole run.
 */
export class CrawlAbortedError extends CrawlerError {
  constructor(message: string, cause?: unknown) {
    super(message, "CRAWL_ABORTED", { cause });
  }
}

/** Invalid command-line arguments or missing interactive input. */
export class CliUsageError extends CrawlerError {
  constructor(message: string) {
    super(message, "USAGE");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? "unknown error" : String(cause);
}

/**
 * Convert any caught value to a single-line description for logs.
 *
 * - {@link CrawlerError} subclasses: `"[CODE] message"`.
 * - Other `Error` instances: the message.
 * - Anything else: `String(value)`.
 *
 * @example
 * ```ts
 * formatError(new UnexpectedShapeError("friends.get", "expected object"));
 * // => "[UNEXPECTED_SHAPE] Unexpected response structure for friends.get: expected object"
 *
 * formatError(new TypeError("x is undefined"));
 * // => "x is undefined"
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof CrawlerError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
