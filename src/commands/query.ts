/**
 * @module commands/query
 * @fileoverview Runs analytic queries and prints their results.
 */

import {
  QUERY_NAMES,
  formatQueryResult,
  runAnalyticQuery,
  type QueryName,
  type QueryResult,
} from "../store/analytics.js";
import type { GraphStore } from "../store/graph-store.js";

/**
 * Run `names` in order (all five by default) and write each result as text
 * lines through `print`.
 */
export async function runQueries(
  store: GraphStore,
  print: (line: string) => void,
  names: readonly QueryName[] = QUERY_NAMES,
): Promise<QueryResult[]> {
  const results: QueryResult[] = [];
  for (const name of names) {
    const result = await runAnalyticQuery(store, name);
    for (const line of formatQueryResult(result)) {
      print(line);
    }
    results.push(result);
  }
  return results;
}
