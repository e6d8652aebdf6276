/**
 * @module cli/prompts
 * @fileoverview Interactive input of credentials and the root user.
 *
 * Each value is taken from its environment variable when set; otherwise the
 * user is asked. Prompts are written to stderr so stdout carries only query
 * results.
 */

import { createInterface } from "node:readline/promises";
import { CliUsageError } from "../utils/errors.js";

export interface RunInputs {
  accessToken: string;
  serviceToken: string;
  /** Numeric id or screen name; empty when only a query is run. */
  rootUser: string;
  neo4jUser: string;
  neo4jPassword: string;
}

export type Ask = (question: string) => Promise<string>;

type Env = Record<string, string | undefined>;

/** Readline-backed {@link Ask}; call `close` once all questions are answered. */
export function createTerminalAsk(): { ask: Ask; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  // readline swallows Ctrl+C while a question is open
  rl.once("SIGINT", () => process.kill(process.pid, "SIGINT"));
  let closed = false;
  return {
    ask: (question) => rl.question(question),
    close: () => {
      if (!closed) {
        closed = true;
        rl.close();
      }
    },
  };
}

async function valueOf(env: Env, key: string, ask: Ask, question: string): Promise<string> {
  const preset = env[key]?.trim();
  if (preset) {
    return preset;
  }
  return (await ask(question)).trim();
}

/**
 * Gather the run inputs.
 *
 * @param needsCrawl - When `false` (single query mode) the API tokens and the
 *   root user are not requested.
 * @throws {CliUsageError} When a crawl is requested without a token, service
 *   token or root user.
 */
export async function collectInputs(
  ask: Ask,
  env: Env,
  needsCrawl: boolean,
  defaultNeo4jUser: string,
): Promise<RunInputs> {
  let accessToken = "";
  let serviceToken = "";
  let rootUser = "";

  if (needsCrawl) {
    accessToken = await valueOf(env, "VK_ACCESS_TOKEN", ask, "Access token: ");
    serviceToken = await valueOf(env, "VK_SERVICE_TOKEN", ask, "Service token: ");
    rootUser = await valueOf(env, "VK_ROOT_USER", ask, "Root user id or screen name: ");

    if (!accessToken || !serviceToken || !rootUser) {
      throw new CliUsageError("An access token, a service token and a root user are required to crawl");
    }
  }

  const neo4jUser =
    (await valueOf(env, "NEO4J_USER", ask, `Neo4j user [${defaultNeo4jUser}]: `)) || defaultNeo4jUser;
  const neo4jPassword = await valueOf(env, "NEO4J_PASSWORD", ask, "Neo4j password: ");

  return { accessToken, serviceToken, rootUser, neo4jUser, neo4jPassword };
}

/** `"123"` becomes `123`; anything else is a screen name. */
export function parseUserRef(value: string): string | number {
  return /^\d+$/.test(value) ? Number(value) : value;
}
