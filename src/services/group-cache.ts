/**
 * @fileoverview In-process TTL cache for resolved group metadata.
 *
 * Users crawled in one run share many of their groups. Once a group's name
 * and member count have been resolved through `groups.getById`, later users
 * that subscribe to the same group are served from this cache and the id is
 * left out of their batched lookups.
 *
 * Wraps `node-cache`; a TTL of `0` disables caching entirely (every lookup
 * misses and nothing is stored).
 *
 * @module services/group-cache
 */

import NodeCache from "node-cache";
import type { Group } from "../crawler/types.js";

export interface GroupCacheStats {
  hits: number;
  misses: number;
  entries: number;
}

export class GroupCache {
  private readonly cache: NodeCache | null;
  private hitCount = 0;
  private missCount = 0;

  /**
   * @param ttlSeconds - Lifetime of an entry; `0` disables the cache.
   * @param maxKeys - Upper bound on stored groups; further inserts are dropped.
   */
  constructor(ttlSeconds: number, maxKeys = 50000) {
    this.cache =
      ttlSeconds > 0
        ? new NodeCache({
            stdTTL: ttlSeconds,
            checkperiod: Math.max(60, Math.floor(ttlSeconds * 0.2)),
            maxKeys,
            useClones: false,
          })
        : null;
  }

  get(groupId: number): Group | undefined {
    const group = this.cache?.get<Group>(String(groupId));
    if (group !== undefined) {
      this.hitCount++;
    } else {
      this.missCount++;
    }
    return group;
  }

  /** @returns `false` when the cache is disabled or full. */
  set(group: Group): boolean {
    if (!this.cache) {
      return false;
    }
    try {
      return this.cache.set<Group>(String(group.id), group);
    } catch {
      // node-cache throws ECACHEFULL once maxKeys is reached
      return false;
    }
  }

  getStats(): GroupCacheStats {
    return {
      hits: this.hitCount,
      misses: this.missCount,
      entries: this.cache?.keys().length ?? 0,
    };
  }

  /** Removes every entry and stops node-cache's expiry timer. */
  close(): void {
    this.cache?.flushAll();
    this.cache?.close();
  }
}
