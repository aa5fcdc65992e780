import PQueue from "p-queue";

import type { AppLogger } from "@ballotwire/logger";
import type { AppConfig } from "@ballotwire/config";
import type { FeedSource } from "./lib/articles.js";
import type { Clock } from "./lib/budget.js";
import { AppwriteHistoryStore } from "./lib/history/appwrite-store.js";
import type { HistoryStore } from "./lib/history/history-store.js";
import { BotApiClient } from "./lib/platforms/bot-api.js";
import { BotApiChannel, type DeliveryChannel } from "./lib/platforms/channel.js";
import type { ImageCollector } from "./lib/publisher.js";
import { SlidingWindowRateLimiter } from "./lib/rate-limiter.js";
import { getDefaultRuleset, type Ruleset } from "./lib/scoring/ruleset.js";
import { loadSources } from "./lib/sources.js";

export type WorkerContext = {
  config: AppConfig;
  logger: AppLogger;
  sources: readonly FeedSource[];
  ruleset: Ruleset;
  feedQueue: PQueue;
  historyStore: HistoryStore;
  channels: readonly DeliveryChannel[];
  rateLimiter: SlidingWindowRateLimiter;
  clock?: Clock;
  now?: () => Date;
  collectImages?: ImageCollector;
};

function createChannels(config: AppConfig, logger: AppLogger): DeliveryChannel[] {
  const { publishing } = config;

  const telegram = new BotApiChannel({
    name: "telegram",
    client: new BotApiClient({
      apiBase: config.telegram.apiBase,
      token: config.telegram.botToken,
      chatId: config.telegram.channelId,
      timeoutMs: config.telegram.timeoutMs
    }),
    timeoutMs: config.telegram.timeoutMs,
    maxAttempts: publishing.postMaxAttempts,
    maxImages: publishing.maxImages,
    logger
  });

  const baleConfig = config.bale;
  const bale = new BotApiChannel({
    name: "bale",
    client:
      baleConfig.botToken && baleConfig.channelId
        ? new BotApiClient({
            apiBase: baleConfig.apiBase,
            token: baleConfig.botToken,
            chatId: baleConfig.channelId,
            timeoutMs: baleConfig.timeoutMs
          })
        : null,
    timeoutMs: baleConfig.timeoutMs,
    maxAttempts: publishing.postMaxAttempts,
    maxImages: publishing.maxImages,
    logger
  });

  return [telegram, bale];
}

/**
 * Wires the long-lived collaborators for a worker process. The rate limiter
 * and queue outlive individual runs.
 */
export function createWorkerContext(
  config: AppConfig,
  logger: AppLogger
): WorkerContext {
  const sources = loadSources();
  const feedQueue = new PQueue({
    concurrency: config.pipeline.feedConcurrency ?? Math.max(1, sources.length)
  });

  const historyStore = new AppwriteHistoryStore(
    {
      endpoint: config.history.endpoint,
      projectId: config.history.projectId,
      apiKey: config.history.apiKey,
      databaseId: config.history.databaseId,
      collectionId: config.history.collectionId
    },
    logger.child({ component: "history" })
  );

  return {
    config,
    logger,
    sources,
    ruleset: getDefaultRuleset(),
    feedQueue,
    historyStore,
    channels: createChannels(config, logger),
    rateLimiter: new SlidingWindowRateLimiter(config.publishing.rateLimitPerMinute)
  };
}
