import type PQueue from "p-queue";
import type { AppLogger } from "@ballotwire/logger";

import type { Article, FeedSource } from "../lib/articles.js";
import { delay, systemClock, type Clock } from "../lib/budget.js";
import { FeedFetchError, fetchFeed, type FeedItem } from "../lib/rss-parser.js";
import { normaliseWhitespace, stripHtml, truncateText } from "../lib/text/format.js";
import type { RunMetrics } from "../metrics/run-metrics.js";
import { workerMetrics } from "../metrics/registry.js";

export type FeedFetchStats = {
  ok: number;
  failed: number;
  retried: number;
};

export type FetchAllFeedsOptions = {
  queue: PQueue;
  /** Outer deadline for the whole phase; completed sources are kept. */
  timeoutMs: number;
  attemptTimeoutMs: number;
  maxAttempts: number;
  retryBaseMs: number;
  maxDescriptionChars: number;
  logger: AppLogger;
  metrics: RunMetrics;
  clock?: Clock;
  signal?: AbortSignal;
};

export type FetchAllFeedsResult = {
  articles: Article[];
  stats: FeedFetchStats;
  timedOut: boolean;
};

function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function mapFeedItemToArticle(
  item: FeedItem,
  source: FeedSource,
  maxDescriptionChars: number
): Article | null {
  const title = normaliseWhitespace(item.title ?? "");
  const link = item.link?.trim();
  if (!title || !link) {
    return null;
  }

  const snippet = item.contentSnippet
    ? normaliseWhitespace(item.contentSnippet)
    : stripHtml(item.summary ?? item.content);

  return Object.freeze({
    title,
    link,
    description: truncateText(snippet, maxDescriptionChars),
    publishedAt: parseDate(item.isoDate),
    source: source.name,
    feedUrl: source.url,
    raw: item
  });
}

/**
 * Fetches one source, retrying transient failures with exponential backoff.
 * Returns null when the source failed, an empty list when it is definitively
 * empty (404 or unparseable).
 */
async function fetchSource(
  source: FeedSource,
  options: FetchAllFeedsOptions,
  stats: FeedFetchStats,
  signal: AbortSignal
): Promise<Article[] | null> {
  const clock = options.clock ?? systemClock;
  const log = options.logger.child({ source: source.name });

  for (let attempt = 0; attempt < options.maxAttempts; attempt++) {
    const startedAt = clock.now();
    const observe = (status: string) => {
      const latencyMs = clock.now() - startedAt;
      options.metrics.recordFeedLatency(source.name, latencyMs);
      workerMetrics.feedFetchDuration.observe(
        { source: source.name, status },
        latencyMs / 1_000
      );
      workerMetrics.feedFetchAttempts.inc({ source: source.name, status });
    };

    try {
      const feed = await fetchFeed(source.url, {
        timeoutMs: options.attemptTimeoutMs,
        signal
      });
      observe("ok");

      return feed.items
        .map((item) => mapFeedItemToArticle(item, source, options.maxDescriptionChars))
        .filter((article): article is Article => article !== null);
    } catch (error) {
      if (!(error instanceof FeedFetchError)) {
        observe("error");
        log.error({ error }, "Unexpected feed failure");
        return null;
      }

      observe(error.kind);

      if (error.kind === "not_found" || error.kind === "malformed") {
        log.warn({ kind: error.kind }, "Feed yielded no entries");
        return [];
      }
      if (!error.transient) {
        return null;
      }
      if (attempt === options.maxAttempts - 1) {
        log.warn({ kind: error.kind, attempts: attempt + 1 }, error.message);
        return null;
      }

      stats.retried++;
      const backoffMs = options.retryBaseMs * 2 ** attempt;
      log.debug({ attempt: attempt + 1, backoffMs, kind: error.kind }, "Retrying feed");
      try {
        await delay(backoffMs, signal);
      } catch {
        return null;
      }
    }
  }

  return null;
}

/**
 * Fetches every source through `queue`, each isolated from the others. When
 * the outer timeout fires, pending work is dropped, in-flight requests are
 * aborted and sources that had not finished count as failed.
 */
export async function fetchAllFeeds(
  sources: readonly FeedSource[],
  options: FetchAllFeedsOptions
): Promise<FetchAllFeedsResult> {
  const stats: FeedFetchStats = { ok: 0, failed: 0, retried: 0 };
  const perSource: Array<Article[] | undefined> = new Array(sources.length);
  const settled = new Set<number>();
  let closed = false;
  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener("abort", onParentAbort, { once: true });
  }

  const tasks = sources.map((source, index) =>
    options.queue.add(async () => {
      const articles = await fetchSource(source, options, stats, controller.signal);
      if (closed) {
        return;
      }
      settled.add(index);
      if (articles === null) {
        stats.failed++;
      } else {
        stats.ok++;
        perSource[index] = articles;
      }
    })
  );

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), Math.max(0, options.timeoutMs));
  });

  const outcome = await Promise.race([
    Promise.all(tasks).then(() => "done" as const),
    deadline
  ]);
  clearTimeout(timer);
  closed = true;
  options.signal?.removeEventListener("abort", onParentAbort);

  const timedOut = outcome === "timeout";
  if (timedOut) {
    options.queue.clear();
    controller.abort();
    const abandoned = sources.length - settled.size;
    stats.failed += abandoned;
    options.logger.warn(
      { abandoned, completed: settled.size },
      "Feed phase deadline reached, using partial results"
    );
  }

  const articles = perSource.flatMap((entries) => entries ?? []);
  options.logger.info(
    { ...stats, entries: articles.length },
    "Feed fetch complete"
  );

  return { articles, stats, timedOut };
}
