import type { WorkerContext } from "../context.js";
import { sortNewestFirst } from "../lib/articles.js";
import {
  DeadlineBudget,
  delay,
  runWithTimeout,
  systemClock
} from "../lib/budget.js";
import { DedupIndex, type HistoryEntry } from "../lib/dedup/dedup-index.js";
import { ArticlePublisher, type PublishOutcome } from "../lib/publisher.js";
import { RelevanceScorer } from "../lib/scoring/scorer.js";
import { trustBonusLookup } from "../lib/sources.js";
import { triageArticles } from "../lib/triage.js";
import { RunMetrics, type RunMetricsSnapshot } from "../metrics/run-metrics.js";
import { workerMetrics } from "../metrics/registry.js";
import { fetchAllFeeds } from "./ingest-feeds.js";

/** Milliseconds each phase leaves for the phases after it. */
export const PHASE_RESERVES = {
  fetch: 16_000,
  fetchMinimum: 3_000,
  historyLoad: 12_000,
  historyLoadMinimum: 2_000,
  publishStop: 8_000,
  interPostMinimum: 4_000
} as const;

export type RunSummary = {
  status: "success" | "error";
  error?: string;
  feedsOk: number;
  feedsFailed: number;
  feedsRetried: number;
  entriesTotal: number;
  skipped: { timeWindow: number; lowRelevance: number; duplicate: number };
  queued: { high: number; medium: number; low: number };
  posted: number;
  postedByPlatform: Record<string, number>;
  postRetries: number;
  postFallbacks: number;
  errors: number;
  overflow: number;
  released: number;
  historyDegraded: boolean;
  dryRun: boolean;
  elapsedMs: number;
  metrics: RunMetricsSnapshot;
};

export type RunOptions = {
  dryRun?: boolean;
  signal?: AbortSignal;
};

export function emptySummary(dryRun = false): RunSummary {
  return {
    status: "success",
    feedsOk: 0,
    feedsFailed: 0,
    feedsRetried: 0,
    entriesTotal: 0,
    skipped: { timeWindow: 0, lowRelevance: 0, duplicate: 0 },
    queued: { high: 0, medium: 0, low: 0 },
    posted: 0,
    postedByPlatform: {},
    postRetries: 0,
    postFallbacks: 0,
    errors: 0,
    overflow: 0,
    released: 0,
    historyDegraded: false,
    dryRun,
    elapsedMs: 0,
    metrics: { fuzzyMatchCount: 0, hashCollisions: 0, feedLatenciesMs: {} }
  };
}

/**
 * One pass of the pipeline: fetch, load history, score and dedup, publish.
 * Every phase is sized from the run's deadline budget; a phase that cannot
 * start in time is skipped and the pass still returns a summary.
 */
export async function runPipeline(
  context: WorkerContext,
  options: RunOptions = {}
): Promise<RunSummary> {
  const { config } = context;
  const clock = context.clock ?? systemClock;
  const now = context.now ?? (() => new Date());
  const logger = context.logger.child({ job: "pipeline" });
  const budget = new DeadlineBudget(config.pipeline.deadlineMs, clock);
  const metrics = new RunMetrics();
  const summary = emptySummary(options.dryRun ?? false);
  const durationTimer = workerMetrics.pipelineDuration.startTimer();

  const finish = () => {
    summary.elapsedMs = Math.round(budget.elapsed());
    summary.metrics = metrics.snapshot();
    durationTimer();
    workerMetrics.pipelineRuns.inc({ status: summary.status });
    logger.info(summary, "Pipeline run complete");
    return summary;
  };

  // Fetch
  const fetchBudget = budget.allot(
    config.pipeline.feedsTotalTimeoutMs,
    PHASE_RESERVES.fetch
  );
  if (fetchBudget < PHASE_RESERVES.fetchMinimum) {
    logger.warn({ fetchBudget }, "No time left to fetch feeds");
    return finish();
  }

  const fetched = await fetchAllFeeds(context.sources, {
    queue: context.feedQueue,
    timeoutMs: fetchBudget,
    attemptTimeoutMs: config.pipeline.feedFetchTimeoutMs,
    maxAttempts: config.pipeline.feedMaxAttempts,
    retryBaseMs: config.pipeline.feedRetryBaseMs,
    maxDescriptionChars: config.pipeline.maxDescriptionChars,
    logger,
    metrics,
    clock,
    signal: options.signal
  });
  summary.feedsOk = fetched.stats.ok;
  summary.feedsFailed = fetched.stats.failed;
  summary.feedsRetried = fetched.stats.retried;
  summary.entriesTotal = fetched.articles.length;

  // History
  let history: HistoryEntry[] = [];
  const historyBudget = budget.allot(
    config.history.timeoutMs,
    PHASE_RESERVES.historyLoad
  );
  if (historyBudget > PHASE_RESERVES.historyLoadMinimum) {
    try {
      history = await runWithTimeout(
        (signal) => context.historyStore.loadRecent(config.history.loadLimit, signal),
        historyBudget,
        "history load",
        options.signal
      );
      logger.info({ records: history.length }, "History loaded");
    } catch (error) {
      summary.historyDegraded = true;
      logger.warn({ error }, "History load failed, deduplicating locally only");
    }
  } else {
    summary.historyDegraded = true;
    logger.warn({ historyBudget }, "No time left to load history");
  }

  // Triage
  const index = DedupIndex.fromHistory(history, {
    stopwords: context.ruleset.stopwords,
    thresholds: {
      overlap: config.scoring.fuzzyOverlapThreshold,
      jaccard: config.scoring.fuzzyJaccardThreshold
    },
    metrics
  });
  const scorer = new RelevanceScorer(
    context.ruleset,
    {
      high: config.scoring.highThreshold,
      medium: config.scoring.mediumThreshold
    },
    { bonusPromotesTier: config.scoring.trustBonusPromotesTier }
  );
  const notBefore = new Date(
    now().getTime() - config.pipeline.freshnessWindowHours * 3_600_000
  );

  const { queue, counts } = triageArticles(sortNewestFirst(fetched.articles), {
    scorer,
    index,
    stopwords: context.ruleset.stopwords,
    notBefore,
    trustBonusFor: trustBonusLookup(context.sources),
    onDecision: (decision) => {
      workerMetrics.triageOutcomes.inc({ outcome: decision.outcome });
      if (decision.outcome === "queued") {
        logger.debug(
          {
            source: decision.article.source,
            title: decision.article.title,
            score: decision.article.score,
            tier: decision.article.tier,
            entities: decision.article.entities,
            topics: decision.article.topics
          },
          "Queued article"
        );
      }
    }
  });
  summary.skipped = {
    timeWindow: counts.timeWindow,
    lowRelevance: counts.lowRelevance,
    duplicate: counts.duplicate
  };
  summary.queued = { ...counts.queued };
  logger.info(
    { queue: queue.size, duplicates: counts.duplicateByReason },
    "Triage complete"
  );

  if (summary.dryRun) {
    for (const article of queue.toArray()) {
      logger.info(
        { source: article.source, title: article.title, score: article.score, tier: article.tier },
        "Dry run: would publish"
      );
    }
    return finish();
  }

  // Publish
  const publisher = new ArticlePublisher({
    store: context.historyStore,
    channels: context.channels,
    ruleset: context.ruleset,
    caption: {
      maxChars: config.publishing.captionMaxChars,
      channelHandle: config.publishing.channelHandle,
      footer: config.publishing.captionFooter
    },
    images: {
      maxImages: config.publishing.maxImages,
      pageTimeoutMs: config.publishing.imageScrapeTimeoutMs
    },
    historyTimeoutMs: config.history.timeoutMs,
    releaseOnDeliveryFailure: config.history.releaseOnDeliveryFailure,
    logger,
    collectImages: context.collectImages,
    now
  });

  let batchPosted = 0;
  while (queue.size > 0) {
    if (budget.remaining() < PHASE_RESERVES.publishStop) {
      logger.info({ remainingMs: Math.round(budget.remaining()) }, "Time low, stopping");
      break;
    }
    if (batchPosted >= config.publishing.batchSize) {
      logger.info({ batchSize: config.publishing.batchSize }, "Batch limit reached");
      break;
    }
    if (!context.rateLimiter.canPost()) {
      logger.warn("Rate limit reached");
      break;
    }

    const article = queue.peek();
    if (!article) break;

    let outcome: PublishOutcome;
    try {
      outcome = await publisher.publish(article, budget, options.signal);
    } catch (error) {
      queue.next();
      summary.errors++;
      logger.error({ error, link: article.link }, "Publish failed unexpectedly");
      continue;
    }

    if (outcome.status === "no_budget") {
      break;
    }
    queue.next();

    for (const [platform, result] of Object.entries(outcome.platforms)) {
      summary.postRetries += result.retries;
      summary.postFallbacks += result.fallbacks;
      if (result.ok && result.form) {
        summary.postedByPlatform[platform] =
          (summary.postedByPlatform[platform] ?? 0) + 1;
      }
    }
    if (outcome.released) {
      summary.released++;
    }

    if (outcome.status === "conflict") {
      continue;
    }
    if (outcome.status !== "posted") {
      summary.errors++;
      continue;
    }

    batchPosted++;
    summary.posted++;
    context.rateLimiter.recordPost();

    if (
      budget.remaining() > PHASE_RESERVES.interPostMinimum &&
      batchPosted < config.publishing.batchSize &&
      queue.size > 0
    ) {
      try {
        await delay(config.publishing.interPostDelayMs, options.signal);
      } catch (error) {
        logger.warn({ error }, "Run cancelled between posts");
        break;
      }
    }
  }

  summary.overflow = queue.drainOverflow();
  return finish();
}
