/**
 * @module crawler/subscription-collector
 * @fileoverview Collects the open groups a user subscribes to, resolved to
 * full group records.
 *
 * ## Steps
 * ```
 *   users.getSubscriptions (pages of 200, offset 0, 200, 400, ...)
 *      |  keep items with is_closed == 0
 *      |  stop on a short page or once `limit` ids are collected
 *      v
 *   ids[0..limit)
 *      |  drop ids already in the GroupCache
 *      |  chunks of 500
 *      v
 *   groups.getById (service credential)  ──bad chunk──> warn, skip
 *      |
 *      v
 *   Group[] in subscription order
 * ```
 *
 * A malformed page or chunk only degrades the result. A request that failed
 * every retry fails the whole collection: the caller then records no groups
 * and a count of 0 for that user.
 */

import type { GroupCache } from "../services/group-cache.js";
import type { RawGroup } from "../services/schemas.js";
import type { VkGraphApi } from "../services/vk-api.js";
import { formatError, type FatalApiError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { err, ok, type Result } from "../utils/result.js";
import type { Group } from "./types.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/** Items requested per `users.getSubscriptions` page. */
export const PAGE_SIZE = 200;

/** Group ids per `groups.getById` request. */
export const CHUNK_SIZE = 500;

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

export interface SubscriptionResult {
  /** Resolved groups, in subscription order. */
  groups: Group[];
  /** Total subscriptions reported by the listing (`count`), 0 when unknown. */
  totalCount: number;
  /** `groups.getById` chunks that were skipped. */
  failedChunks: number;
}

export type SubscriptionOutcome = Result<SubscriptionResult, FatalApiError>;

export interface SubscriptionCollectorOptions {
  cache?: GroupCache;
  logger?: Logger;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

function toGroup(raw: RawGroup): Group {
  return {
    id: raw.id,
    name: raw.name ?? "",
    members_count: raw.members_count ?? 0,
  };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/* ────────────────────────────────────────────────────────────────────────────
 * SubscriptionCollector
 * ──────────────────────────────────────────────────────────────────────────── */

export class SubscriptionCollector {
  private readonly cache: GroupCache | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly api: VkGraphApi,
    options: SubscriptionCollectorOptions = {},
  ) {
    this.cache = options.cache;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Collect up to `limit` open groups of `userId`.
   *
   * Malformed pages and chunks are logged as warnings and skipped; a
   * {@link FatalApiError} from any request is returned as the error.
   */
  async collect(userId: number, limit: number): Promise<SubscriptionOutcome> {
    if (limit <= 0) {
      return ok({ groups: [], totalCount: 0, failedChunks: 0 });
    }

    const listing = await this.listOpenGroupIds(userId, limit);
    if (!listing.ok) {
      return listing;
    }
    const resolved = await this.resolve(listing.value.ids);
    if (!resolved.ok) {
      return resolved;
    }
    return ok({ ...resolved.value, totalCount: listing.value.totalCount });
  }

  private async listOpenGroupIds(
    userId: number,
    limit: number,
  ): Promise<Result<{ ids: number[]; totalCount: number }, FatalApiError>> {
    const ids: number[] = [];
    let totalCount = 0;
    let offset = 0;

    while (ids.length < limit) {
      const page = await this.api.getSubscriptionsPage(userId, offset, PAGE_SIZE);
      if (page.kind === "private") {
        return ok({ ids: [], totalCount: 0 });
      }
      if (page.kind === "failed") {
        return err(page.error);
      }
      if (page.kind === "unexpected") {
        this.logger.warn("Subscription listing stopped", {
          user_id: userId,
          offset,
          error: formatError(page.error),
        });
        break;
      }

      totalCount = page.value.count;
      for (const item of page.value.items) {
        if ((item.is_closed ?? 0) === 0) {
          ids.push(item.id);
        }
      }

      if (page.value.items.length < PAGE_SIZE) {
        break;
      }
      offset += PAGE_SIZE;
    }

    return ok({ ids: ids.slice(0, limit), totalCount });
  }

  private async resolve(
    ids: readonly number[],
  ): Promise<Result<{ groups: Group[]; failedChunks: number }, FatalApiError>> {
    const resolved = new Map<number, Group>();
    const missing: number[] = [];

    for (const id of ids) {
      const cached = this.cache?.get(id);
      if (cached) {
        resolved.set(id, cached);
      } else {
        missing.push(id);
      }
    }

    let failedChunks = 0;
    for (const batch of chunk(missing, CHUNK_SIZE)) {
      const result = await this.api.getGroupsById(batch);
      if (result.kind === "failed") {
        return err(result.error);
      }
      if (result.kind !== "ok") {
        failedChunks++;
        this.logger.warn("Skipping group chunk", {
          first_id: batch[0],
          size: batch.length,
          error: result.kind === "private" ? "private" : formatError(result.error),
        });
        continue;
      }

      for (const raw of result.value) {
        const group = toGroup(raw);
        resolved.set(group.id, group);
        this.cache?.set(group);
      }
    }

    const groups: Group[] = [];
    for (const id of ids) {
      const group = resolved.get(id);
      if (group) {
        groups.push(group);
      }
    }
    return ok({ groups, failedChunks });
  }
}
