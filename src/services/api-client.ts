/**
 * @fileoverview Authenticated, retrying client for the VK HTTP API.
 *
 * ## Request Flow
 *
 * ```
 *   call(method, params, mode)
 *     |
 *     +--> RequestGate.run(...)            one call in flight at a time
 *           |
 *           +--> attempt 1 ──ok──> { kind: "ok", payload }
 *           |       |      ──error 30──> { kind: "private" }
 *           |    failure
 *           |       v
 *           |    sleep(retryDelayMs)
 *           +--> attempt 2 ...
 *           |
 *           +--> attempt N failed ──> throw FatalApiError
 * ```
 *
 * ## Credentials
 * `"primary"` sends the user's access token, `"service"` the application's
 * service token. The service token is used for lookups that do not depend on
 * the requesting user's permissions (`groups.getById`).
 *
 * ## What counts as a failed attempt
 * - network error or timeout (`AbortSignal.timeout`)
 * - non-2xx HTTP status
 * - a body that is not JSON or not a response envelope
 * - an API error whose `error_code` is not 30
 *
 * `error_code == 30` (private profile) is a data outcome: it is returned as
 * `{ kind: "private" }` on the first occurrence and never retried.
 *
 * @module services/api-client
 */

import { FatalApiError, TransientRequestError, formatError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { EnvelopeSchema } from "./schemas.js";
import { RequestGate } from "./queue.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CredentialMode = "primary" | "service";

/** Method parameters; `undefined` values are left out of the query string. */
export type ApiParams = Record<string, string | number | undefined>;

export type ApiOutcome = { kind: "ok"; payload: unknown } | { kind: "private" };

export interface ApiCredentials {
  /** The crawling user's access token. */
  accessToken: string;
  /** The application's service token. */
  serviceToken: string;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ApiClientOptions {
  credentials: ApiCredentials;
  /** Method names are appended to it; a missing trailing `/` is added. @default "https://api.vk.com/method/" */
  baseUrl?: string;
  /** @default "5.131" */
  version?: string;
  /** Attempts per call. @default 3 */
  retryCount?: number;
  /** Pause between attempts. @default 2000 */
  retryDelayMs?: number;
  /** Per-request timeout. @default 10000 */
  timeoutMs?: number;
  logger?: Logger;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  gate?: RequestGate;
}

/** API error code reported for profiles the token may not read. */
export const PRIVATE_PROFILE_ERROR_CODE = 30;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

// ---------------------------------------------------------------------------
// ApiClient
// ---------------------------------------------------------------------------

export class ApiClient {
  private readonly credentials: ApiCredentials;
  private readonly baseUrl: string;
  private readonly version: string;
  private readonly retryCount: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly gate: RequestGate;

  constructor(options: ApiClientOptions) {
    this.credentials = options.credentials;
    const baseUrl = options.baseUrl ?? "https://api.vk.com/method/";
    this.baseUrl = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
    this.version = options.version ?? "5.131";
    this.retryCount = Math.max(1, options.retryCount ?? 3);
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? 2000);
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.logger = options.logger ?? silentLogger;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.gate = options.gate ?? new RequestGate();
  }

  /**
   * Call an API method.
   *
   * @returns `{ kind: "ok", payload }` with the envelope's `response`, or
   *   `{ kind: "private" }` for error code 30.
   * @throws {FatalApiError} When every attempt failed.
   *
   * @example
   * ```ts
   * const outcome = await client.call("friends.get", { user_id: 1, count: 100 }, "primary");
   * if (outcome.kind === "private") return [];
   * ```
   */
  async call(method: string, params: ApiParams, mode: CredentialMode = "primary"): Promise<ApiOutcome> {
    return this.gate.run(() => this.callWithRetry(method, params, mode));
  }

  /** Waits until no call is queued or running. */
  async drain(): Promise<void> {
    await this.gate.drain();
  }

  private async callWithRetry(
    method: string,
    params: ApiParams,
    mode: CredentialMode,
  ): Promise<ApiOutcome> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.retryCount; attempt++) {
      try {
        return await this.attempt(method, params, mode);
      } catch (error) {
        lastError = error;
        this.logger.error("API request failed", {
          method,
          attempt,
          error: formatError(error),
        });

        if (attempt < this.retryCount) {
          this.logger.info(`Retrying in ${this.retryDelayMs}ms`, { method, nextAttempt: attempt + 1 });
          await this.sleep(this.retryDelayMs);
        }
      }
    }

    throw new FatalApiError(method, this.retryCount, lastError);
  }

  private buildUrl(method: string, params: ApiParams, mode: CredentialMode): string {
    const url = new URL(method, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    url.searchParams.set(
      "access_token",
      mode === "service" ? this.credentials.serviceToken : this.credentials.accessToken,
    );
    url.searchParams.set("v", this.version);
    return url.toString();
  }

  private async attempt(method: string, params: ApiParams, mode: CredentialMode): Promise<ApiOutcome> {
    const url = this.buildUrl(method, params, mode);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: { Accept: "application/json" },
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new TransientRequestError(`${method} timed out after ${this.timeoutMs}ms`);
      }
      throw new TransientRequestError(
        `Network error calling ${method}: ${error instanceof Error ? error.message : String(error)}`,
        {},
        { cause: error },
      );
    }

    if (!response.ok) {
      throw new TransientRequestError(`HTTP ${response.status} ${response.statusText}`.trim(), {
        statusCode: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TransientRequestError(`Malformed response body from ${method}`, {}, { cause: error });
    }

    const envelope = EnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new TransientRequestError(`Malformed response envelope from ${method}`);
    }

    if ("error" in envelope.data) {
      const { error_code: code, error_msg: message } = envelope.data.error;
      if (code === PRIVATE_PROFILE_ERROR_CODE) {
        this.logger.warn("Profile is private", {
          method,
          user_id: params.user_id ?? params.user_ids,
        });
        return { kind: "private" };
      }
      throw new TransientRequestError(`API error ${code}: ${message}`, { apiErrorCode: code });
    }

    return { kind: "ok", payload: envelope.data.response };
  }
}
