/**
 * @module commands/crawl
 * @fileoverview Wires the API client, group cache, subscription collector and
 * orchestrator for one crawl run.
 */

import type { AppConfig } from "../config.js";
import { CrawlOrchestrator, type CrawlLimits, type CrawlSummary } from "../crawler/crawl-orchestrator.js";
import { SubscriptionCollector } from "../crawler/subscription-collector.js";
import { ApiClient, type ApiCredentials, type FetchLike } from "../services/api-client.js";
import { GroupCache } from "../services/group-cache.js";
import { VkApi } from "../services/vk-api.js";
import type { GraphStore } from "../store/graph-store.js";
import type { Logger } from "../utils/logger.js";

export interface CrawlCommandOptions {
  config: AppConfig;
  credentials: ApiCredentials;
  limits: CrawlLimits;
  store: GraphStore;
  logger: Logger;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Crawl from `rootRef` into `store`.
 *
 * @throws {CrawlAbortedError} When the root profile cannot be fetched.
 */
export async function runCrawl(rootRef: string | number, options: CrawlCommandOptions): Promise<CrawlSummary> {
  const { config, logger } = options;

  const client = new ApiClient({
    credentials: options.credentials,
    baseUrl: config.apiBaseUrl,
    version: config.apiVersion,
    retryCount: config.retryCount,
    retryDelayMs: config.retryDelayMs,
    timeoutMs: config.fetchTimeoutMs,
    logger: logger.child("api"),
    fetch: options.fetch,
    sleep: options.sleep,
  });
  const api = new VkApi(client);
  const cache = new GroupCache(config.groupCacheTtlSeconds);

  const orchestrator = new CrawlOrchestrator({
    api,
    store: options.store,
    subscriptions: new SubscriptionCollector(api, { cache, logger: logger.child("subscriptions") }),
    limits: options.limits,
    logger: logger.child("crawler"),
  });

  try {
    return await orchestrator.crawl(rootRef);
  } finally {
    await client.drain();
    const stats = cache.getStats();
    logger.debug("Group cache", { ...stats });
    cache.close();
  }
}
