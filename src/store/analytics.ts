/**
 * @module store/analytics
 * @fileoverview The fixed set of summary queries run after a crawl.
 *
 * Each query is a read against the {@link GraphStore}; rows are mapped to
 * typed records. A failed query yields an empty result (see
 * {@link GraphStore.runQuery}).
 */

import type { QueryRecord } from "./neo4j-executor.js";
import type { GraphStore } from "./graph-store.js";

export const QUERY_NAMES = [
  "total_users",
  "total_groups",
  "top_users",
  "top_groups",
  "mutual_friends",
] as const;

export type QueryName = (typeof QUERY_NAMES)[number];

export interface TopUser {
  user_id: number;
  name: string;
  friends_count: number;
}

export interface TopGroup {
  group_id: number;
  name: string;
  members_count: number;
}

export interface MutualPair {
  user1_id: number;
  user1_name: string;
  user2_id: number;
  user2_name: string;
}

export type QueryResult =
  | { name: "total_users"; total: number }
  | { name: "total_groups"; total: number }
  | { name: "top_users"; rows: TopUser[] }
  | { name: "top_groups"; rows: TopGroup[] }
  | { name: "mutual_friends"; rows: MutualPair[] };

/* ────────────────────────────────────────────────────────────────────────────
 * Cypher
 * ──────────────────────────────────────────────────────────────────────────── */

export const ANALYTIC_QUERIES: Record<QueryName, string> = {
  total_users: "MATCH (u:User) RETURN count(u) AS total_users",
  total_groups: "MATCH (g:Group) RETURN count(DISTINCT g) AS total_groups",
  top_users: `
MATCH (u:User)-[:FRIEND]->(f:User)
RETURN u.id AS user_id, u.name AS name, count(f) AS friends_count
ORDER BY friends_count DESC
LIMIT 5`,
  top_groups: `
MATCH (g:Group)
WHERE g.members_count IS NOT NULL
RETURN g.id AS group_id, g.name AS name, g.members_count AS members_count
ORDER BY g.members_count DESC
LIMIT 5`,
  mutual_friends: `
MATCH (u1:User)-[:FRIEND]->(u2:User)
WHERE (u2)-[:FRIEND]->(u1) AND u1.id < u2.id
RETURN u1.id AS user1_id, u1.name AS user1_name, u2.id AS user2_id, u2.name AS user2_name`,
};

/* ────────────────────────────────────────────────────────────────────────────
 * Row Mapping
 * ──────────────────────────────────────────────────────────────────────────── */

function num(row: QueryRecord, key: string): number {
  const value = row[key];
  return typeof value === "number" ? value : 0;
}

function str(row: QueryRecord, key: string): string {
  const value = row[key];
  return typeof value === "string" ? value : "";
}

/** Run one analytic query and map its rows. */
export async function runAnalyticQuery(store: GraphStore, name: QueryName): Promise<QueryResult> {
  const rows = await store.runQuery(ANALYTIC_QUERIES[name]);

  switch (name) {
    case "total_users":
    case "total_groups": {
      const [first] = rows;
      return { name, total: first ? num(first, name) : 0 };
    }
    case "top_users":
      return {
        name,
        rows: rows.map((row) => ({
          user_id: num(row, "user_id"),
          name: str(row, "name"),
          friends_count: num(row, "friends_count"),
        })),
      };
    case "top_groups":
      return {
        name,
        rows: rows.map((row) => ({
          group_id: num(row, "group_id"),
          name: str(row, "name"),
          members_count: num(row, "members_count"),
        })),
      };
    case "mutual_friends":
      return {
        name,
        rows: rows.map((row) => ({
          user1_id: num(row, "user1_id"),
          user1_name: str(row, "user1_name"),
          user2_id: num(row, "user2_id"),
          user2_name: str(row, "user2_name"),
        })),
      };
  }
}

/** Render a result as the lines printed to stdout. */
export function formatQueryResult(result: QueryResult): string[] {
  switch (result.name) {
    case "total_users":
      return [`Total users: ${result.total}`];
    case "total_groups":
      return [`Total groups: ${result.total}`];
    case "top_users":
      return [
        "Top 5 users by friend count:",
        ...result.rows.map((row) => `  ID: ${row.user_id}, Name: ${row.name}, Friends: ${row.friends_count}`),
      ];
    case "top_groups":
      return [
        "Top 5 groups by member count:",
        ...result.rows.map((row) => `  ID: ${row.group_id}, Name: ${row.name}, Members: ${row.members_count}`),
      ];
    case "mutual_friends":
      return [
        "Mutual friend pairs:",
        ...result.rows.map(
          (row) => `  ${row.user1_name} (ID: ${row.user1_id}) and ${row.user2_name} (ID: ${row.user2_id})`,
        ),
      ];
  }
}
