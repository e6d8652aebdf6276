/**
 * @module store/graph-store
 * @fileoverview Persistence of users, groups and their relationships.
 *
 * ## Graph Model
 * ```
 *   (:User {id})──[:FRIEND]──>(:User {id})
 *        │
 *        └──[:SUBSCRIBED_TO]──>(:Group {id})
 * ```
 *
 * Every write is a MERGE on the node's `id` followed by SET of its mutable
 * properties, so repeating a write leaves the graph unchanged. Edges are
 * MERGEd between existing nodes: a missing endpoint makes the write a no-op.
 *
 * ## Failure Policy
 * Writes are best-effort. A failing write is logged with the ids involved
 * and reported as `{ ok: false, error: StoreWriteError }`; it never throws
 * into the crawler. {@link GraphStore.wipe} is the exception and propagates.
 */

import neo4j from "neo4j-driver";
import { StoreWriteError, formatError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { err, ok, type Result } from "../utils/result.js";
import type { Group, User, UserCounts } from "../crawler/types.js";
import type { CypherExecutor, QueryParams, QueryRecord } from "./neo4j-executor.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Interface
 * ──────────────────────────────────────────────────────────────────────────── */

export type WriteResult = Result<void, StoreWriteError>;

export interface GraphStore {
  /**
   * Create or update a user node. Without `counts` the stored counts are
   * kept (0 for a new node).
   */
  upsertUser(user: User, counts?: UserCounts): Promise<WriteResult>;
  upsertGroup(group: Group): Promise<WriteResult>;
  upsertFriendEdge(fromId: number, toId: number): Promise<WriteResult>;
  upsertSubscriptionEdge(userId: number, groupId: number): Promise<WriteResult>;
  /** Read query; failures are logged and yield `[]`. */
  runQuery(query: string, params?: QueryParams): Promise<QueryRecord[]>;
  /** Deletes every node and relationship. Throws on failure. */
  wipe(): Promise<void>;
  ensureConstraints(): Promise<void>;
  close(): Promise<void>;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Cypher
 * ──────────────────────────────────────────────────────────────────────────── */

export const UPSERT_USER = `
MERGE (u:User {id: $id})
SET u.screen_name = $screen_name,
    u.name = $name,
    u.sex = $sex,
    u.home_town = $home_town,
    u.friends_count = coalesce($friends_count, u.friends_count, 0),
    u.subscriptions_count = coalesce($subscriptions_count, u.subscriptions_count, 0)
`;

export const UPSERT_GROUP = `
MERGE (g:Group {id: $id})
SET g.name = $name,
    g.members_count = $members_count
`;

export const UPSERT_FRIEND_EDGE = `
MATCH (a:User {id: $from}), (b:User {id: $to})
MERGE (a)-[:FRIEND]->(b)
`;

export const UPSERT_SUBSCRIPTION_EDGE = `
MATCH (u:User {id: $user}), (g:Group {id: $group})
MERGE (u)-[:SUBSCRIBED_TO]->(g)
`;

export const WIPE = "MATCH (n) DETACH DELETE n";

export const CONSTRAINTS = [
  "CREATE CONSTRAINT user_id IF NOT EXISTS FOR (u:User) REQUIRE u.id IS UNIQUE",
  "CREATE CONSTRAINT group_id IF NOT EXISTS FOR (g:Group) REQUIRE g.id IS UNIQUE",
] as const;

/* ────────────────────────────────────────────────────────────────────────────
 * Neo4jGraphStore
 * ──────────────────────────────────────────────────────────────────────────── */

export class Neo4jGraphStore implements GraphStore {
  private readonly logger: Logger;

  constructor(
    private readonly executor: CypherExecutor,
    logger: Logger = silentLogger,
  ) {
    this.logger = logger;
  }

  async upsertUser(user: User, counts?: UserCounts): Promise<WriteResult> {
    return this.write("upsertUser", `user ${user.id}`, UPSERT_USER, {
      id: neo4j.int(user.id),
      screen_name: user.screen_name,
      name: user.name,
      sex: neo4j.int(user.sex),
      home_town: user.home_town,
      friends_count: counts ? neo4j.int(counts.friends_count) : null,
      subscriptions_count: counts ? neo4j.int(counts.subscriptions_count) : null,
    });
  }

  async upsertGroup(group: Group): Promise<WriteResult> {
    return this.write("upsertGroup", `group ${group.id}`, UPSERT_GROUP, {
      id: neo4j.int(group.id),
      name: group.name,
      members_count: neo4j.int(group.members_count),
    });
  }

  async upsertFriendEdge(fromId: number, toId: number): Promise<WriteResult> {
    return this.write("upsertFriendEdge", `${fromId} -> ${toId}`, UPSERT_FRIEND_EDGE, {
      from: neo4j.int(fromId),
      to: neo4j.int(toId),
    });
  }

  async upsertSubscriptionEdge(userId: number, groupId: number): Promise<WriteResult> {
    return this.write(
      "upsertSubscriptionEdge",
      `user ${userId} -> group ${groupId}`,
      UPSERT_SUBSCRIPTION_EDGE,
      { user: neo4j.int(userId), group: neo4j.int(groupId) },
    );
  }

  async runQuery(query: string, params: QueryParams = {}): Promise<QueryRecord[]> {
    try {
      return await this.executor.read(query, params);
    } catch (error) {
      this.logger.error("Query failed", { error: formatError(error) });
      return [];
    }
  }

  async wipe(): Promise<void> {
    await this.executor.write(WIPE);
    this.logger.info("Graph wiped");
  }

  async ensureConstraints(): Promise<void> {
    for (const statement of CONSTRAINTS) {
      await this.executor.write(statement);
    }
  }

  async close(): Promise<void> {
    await this.executor.close();
  }

  private async write(
    operation: string,
    detail: string,
    query: string,
    params: QueryParams,
  ): Promise<WriteResult> {
    try {
      await this.executor.write(query, params);
      return ok(undefined);
    } catch (error) {
      const failure = new StoreWriteError(operation, detail, error);
      this.logger.error(failure.message, { operation });
      return err(failure);
    }
  }
}
