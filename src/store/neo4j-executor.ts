/**
 * @module store/neo4j-executor
 * @fileoverview Thin transaction runner over `neo4j-driver`.
 *
 * The graph store talks to the database only through {@link CypherExecutor},
 * which keeps the Cypher templates testable against a recording fake.
 * Every call opens its own session and runs one managed transaction.
 */

import neo4j from "neo4j-driver";
import type { Driver } from "neo4j-driver";

/** One result row, keyed by the query's `RETURN` aliases. */
export type QueryRecord = Record<string, unknown>;

export type QueryParams = Record<string, unknown>;

export interface CypherExecutor {
  /** Run `query` in a write transaction. */
  write(query: string, params?: QueryParams): Promise<void>;
  /** Run `query` in a read transaction; integers come back as numbers. */
  read(query: string, params?: QueryParams): Promise<QueryRecord[]>;
  close(): Promise<void>;
}

/**
 * Convert driver values to plain JS: `Integer` becomes `number`, nested
 * lists and maps are converted element-wise. Other values pass through.
 */
export function toPlainValue(value: unknown): unknown {
  if (neo4j.isInt(value)) {
    return value.toNumber();
  }
  if (Array.isArray(value)) {
    return value.map(toPlainValue);
  }
  if (value !== null && typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, toPlainValue(entry)]),
    );
  }
  return value;
}

export class Neo4jExecutor implements CypherExecutor {
  constructor(private readonly driver: Driver) {}

  async write(query: string, params: QueryParams = {}): Promise<void> {
    const session = this.driver.session({ defaultAccessMode: neo4j.session.WRITE });
    try {
      await session.executeWrite((tx) => tx.run(query, params));
    } finally {
      await session.close();
    }
  }

  async read(query: string, params: QueryParams = {}): Promise<QueryRecord[]> {
    const session = this.driver.session({ defaultAccessMode: neo4j.session.READ });
    try {
      const result = await session.executeRead((tx) => tx.run(query, params));
      return result.records.map((record) => {
        const row: QueryRecord = {};
        for (const key of record.keys) {
          row[String(key)] = toPlainValue(record.get(key));
        }
        return row;
      });
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}

/**
 * Connect to a Neo4j server and verify that it is reachable.
 *
 * @throws When the server cannot be reached or rejects the credentials.
 */
export async function createNeo4jExecutor(
  uri: string,
  user: string,
  password: string,
): Promise<Neo4jExecutor> {
  const driver = neo4j.driver(uri, neo4j.auth.basic(user, password));
  try {
    await driver.verifyConnectivity();
  } catch (error) {
    await driver.close();
    throw error;
  }
  return new Neo4jExecutor(driver);
}
