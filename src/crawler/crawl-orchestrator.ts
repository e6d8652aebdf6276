/**
 * @module crawler/crawl-orchestrator
 * @fileoverview Depth-limited depth-first crawl of the friendship graph.
 *
 * ## Algorithm
 *
 * ```
 *   root profile ──fail──> throw CrawlAbortedError
 *      |
 *      v
 *   [Stack: (root, 1)]
 *      |
 *      +--pop (id, depth)
 *      |    visited? ──yes──> skip
 *      |    mark visited, fetch profile ──fail──> log, count, skip
 *      |    upsert user (counts kept)
 *      |    friends.get ──> upsert open friends + FRIEND edges
 *      |    subscriptions ──> upsert groups + SUBSCRIBED_TO edges (none on failure)
 *      |    upsert user again with its counts
 *      |    depth < limit ──> push open friends (reversed) at depth + 1
 *      |
 *      +-- (empty) --> summary
 * ```
 *
 * Children are pushed in reverse so they pop in the order the API returned
 * them, which gives the same visiting order as a recursive preorder walk.
 * Ids are marked visited when popped; an id reachable along several paths is
 * expanded once, at whichever depth is popped first.
 *
 * ## Failure Handling
 * Only the root profile aborts the crawl. A failing friends fetch or
 * subscription collection degrades that user to zero friends or groups.
 * Store writes never throw; their failures are counted.
 */

import type { RawProfile } from "../services/schemas.js";
import type { Fetched, VkGraphApi } from "../services/vk-api.js";
import { CrawlAbortedError, formatError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type { WriteResult, GraphStore } from "../store/graph-store.js";
import { normalizeProfile } from "./profile-normalizer.js";
import type { SubscriptionCollector } from "./subscription-collector.js";
import type { Group, User } from "./types.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

export interface CrawlLimits {
  /** Maximum depth, root is depth 1. */
  depthLimit: number;
  /** `count` sent with `friends.get`. */
  friendsLimit: number;
  /** Maximum open groups collected per user. */
  subscriptionsLimit: number;
}

export interface CrawlCounters {
  usersCrawled: number;
  usersFailed: number;
  friendEdges: number;
  subscriptionEdges: number;
  groupsResolved: number;
  storeFailures: number;
  maxDepthReached: number;
}

export interface CrawlSummary extends CrawlCounters {
  rootId: number;
  visited: number;
  durationMs: number;
}

export interface CrawlOrchestratorOptions {
  api: VkGraphApi;
  store: GraphStore;
  subscriptions: SubscriptionCollector;
  limits: CrawlLimits;
  logger?: Logger;
  now?: () => number;
}

/** @internal */
interface Task {
  userId: number;
  depth: number;
}

/** @internal */
interface CrawlState {
  visited: Set<number>;
  stack: Task[];
  counters: CrawlCounters;
}

function describeFailure(result: Exclude<Fetched<unknown>, { kind: "ok" }>): string {
  return result.kind === "private" ? "profile is private" : formatError(result.error);
}

/* ────────────────────────────────────────────────────────────────────────────
 * CrawlOrchestrator
 * ──────────────────────────────────────────────────────────────────────────── */

export class CrawlOrchestrator {
  private readonly api: VkGraphApi;
  private readonly store: GraphStore;
  private readonly subscriptions: SubscriptionCollector;
  private readonly limits: CrawlLimits;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: CrawlOrchestratorOptions) {
    this.api = options.api;
    this.store = options.store;
    this.subscriptions = options.subscriptions;
    this.limits = options.limits;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Crawl from `rootRef` (numeric id or screen name).
   *
   * @throws {CrawlAbortedError} When the root profile cannot be fetched.
   */
  async crawl(rootRef: string | number): Promise<CrawlSummary> {
    const startedAt = this.now();

    const rootResult = await this.api.getProfile(rootRef);
    if (rootResult.kind !== "ok") {
      throw new CrawlAbortedError(
        `Root user ${rootRef} unavailable: ${describeFailure(rootResult)}`,
        rootResult.kind === "private" ? undefined : rootResult.error,
      );
    }
    const root = rootResult.value;

    const state: CrawlState = {
      visited: new Set(),
      stack: [{ userId: root.id, depth: 1 }],
      counters: {
        usersCrawled: 0,
        usersFailed: 0,
        friendEdges: 0,
        subscriptionEdges: 0,
        groupsResolved: 0,
        storeFailures: 0,
        maxDepthReached: 0,
      },
    };

    this.logger.info("Crawl started", { root_id: root.id, depth_limit: this.limits.depthLimit });

    let task = state.stack.pop();
    while (task) {
      if (!state.visited.has(task.userId) && task.depth <= this.limits.depthLimit) {
        state.visited.add(task.userId);
        const profile = task.userId === root.id ? root : await this.fetchProfile(task.userId, state);
        if (profile) {
          await this.expand(profile, task.depth, state);
        }
      }
      task = state.stack.pop();
    }

    const summary: CrawlSummary = {
      rootId: root.id,
      ...state.counters,
      visited: state.visited.size,
      durationMs: this.now() - startedAt,
    };
    this.logger.info("Crawl finished", { ...summary });
    return summary;
  }

  private async fetchProfile(userId: number, state: CrawlState): Promise<RawProfile | undefined> {
    const result = await this.api.getProfile(userId);
    if (result.kind === "ok") {
      return result.value;
    }
    state.counters.usersFailed++;
    this.logger.warn("Skipping user", { user_id: userId, reason: describeFailure(result) });
    return undefined;
  }

  private async expand(profile: RawProfile, depth: number, state: CrawlState): Promise<void> {
    const user = normalizeProfile(profile);
    const { counters } = state;
    counters.usersCrawled++;
    counters.maxDepthReached = Math.max(counters.maxDepthReached, depth);
    this.logger.debug("Expanding user", { user_id: user.id, depth });

    // Edges MATCH both endpoints, so the node must exist before any edge.
    this.track(state, await this.store.upsertUser(user));

    const friends = await this.collectFriends(user.id);
    for (const friend of friends.open) {
      this.track(state, await this.store.upsertUser(friend));
      if (this.track(state, await this.store.upsertFriendEdge(user.id, friend.id))) {
        counters.friendEdges++;
      }
    }

    const { groups, totalCount } = await this.collectSubscriptions(user.id);
    counters.groupsResolved += groups.length;
    for (const group of groups) {
      this.track(state, await this.store.upsertGroup(group));
      if (this.track(state, await this.store.upsertSubscriptionEdge(user.id, group.id))) {
        counters.subscriptionEdges++;
      }
    }

    this.track(
      state,
      await this.store.upsertUser(user, {
        friends_count: friends.total,
        subscriptions_count: totalCount,
      }),
    );

    if (depth < this.limits.depthLimit) {
      for (let i = friends.open.length - 1; i >= 0; i--) {
        const friend = friends.open[i];
        if (friend && !state.visited.has(friend.id)) {
          state.stack.push({ userId: friend.id, depth: depth + 1 });
        }
      }
    }
  }

  /** Open friends of `userId` and the number of friend items returned. */
  private async collectFriends(userId: number): Promise<{ open: User[]; total: number }> {
    const result = await this.api.getFriends(userId, this.limits.friendsLimit);
    if (result.kind !== "ok") {
      if (result.kind !== "private") {
        this.logger.warn("Friends unavailable", {
          user_id: userId,
          reason: describeFailure(result),
        });
      }
      return { open: [], total: 0 };
    }

    const friends = result.value.items.map(normalizeProfile);
    return {
      open: friends.filter((friend) => !friend.is_private),
      total: friends.length,
    };
  }

  /** Groups of `userId`; a failed collection counts as none. */
  private async collectSubscriptions(userId: number): Promise<{ groups: Group[]; totalCount: number }> {
    const outcome = await this.subscriptions.collect(userId, this.limits.subscriptionsLimit);
    if (!outcome.ok) {
      this.logger.warn("Subscriptions unavailable", {
        user_id: userId,
        reason: formatError(outcome.error),
      });
      return { groups: [], totalCount: 0 };
    }
    return outcome.value;
  }

  private track(state: CrawlState, result: WriteResult): boolean {
    if (!result.ok) {
      state.counters.storeFailures++;
    }
    return result.ok;
  }
}
