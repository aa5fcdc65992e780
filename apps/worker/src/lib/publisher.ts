import type { AppLogger } from "@ballotwire/logger";

import type { ScoredArticle } from "./articles.js";
import { runWithTimeout, type DeadlineBudget } from "./budget.js";
import { buildCaption, type CaptionOptions } from "./caption.js";
import type { HistoryStore, SaveOutcome } from "./history/history-store.js";
import {
  collectImages as defaultCollectImages,
  type ImageCollectorOptions
} from "./media/images.js";
import type { FeedItem } from "./rss-parser.js";
import type { DeliveryChannel, DeliveryResult } from "./platforms/channel.js";
import type { Ruleset } from "./scoring/ruleset.js";
import { workerMetrics } from "../metrics/registry.js";

/** Milliseconds each step leaves untouched for the steps after it. */
export const PUBLISH_RESERVES = {
  persist: 6_000,
  persistMinimum: 1_000,
  media: 5_000,
  mediaMinimum: 1_000,
  delivery: 2_000
} as const;

export type PublishStatus =
  | "posted"
  | "undelivered"
  | "conflict"
  | "persist_failed"
  | "no_budget";

export type PublishOutcome = {
  status: PublishStatus;
  platforms: Record<string, DeliveryResult>;
  released: boolean;
};

export type ImageCollector = (
  item: FeedItem | null,
  link: string,
  options: ImageCollectorOptions & { signal?: AbortSignal; logger?: AppLogger }
) => Promise<string[]>;

export type ArticlePublisherOptions = {
  store: HistoryStore;
  channels: readonly DeliveryChannel[];
  ruleset: Ruleset;
  caption: CaptionOptions;
  images: ImageCollectorOptions;
  historyTimeoutMs: number;
  releaseOnDeliveryFailure: boolean;
  logger: AppLogger;
  collectImages?: ImageCollector;
  now?: () => Date;
};

export class ArticlePublisher {
  private readonly logger: AppLogger;
  private readonly collectImages: ImageCollector;
  private readonly now: () => Date;

  constructor(private readonly options: ArticlePublisherOptions) {
    this.logger = options.logger.child({ component: "publisher" });
    this.collectImages = options.collectImages ?? defaultCollectImages;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Claims the article in the history store, then delivers it to every
   * enabled channel concurrently. Nothing is delivered unless the claim
   * succeeded. When every enabled channel fails the claim is released so a
   * later run can pick the story up again.
   */
  async publish(
    article: ScoredArticle,
    budget: DeadlineBudget,
    signal?: AbortSignal
  ): Promise<PublishOutcome> {
    const outcome: PublishOutcome = {
      status: "no_budget",
      platforms: {},
      released: false
    };
    const log = this.logger.child({ source: article.source, title: article.title.slice(0, 60) });

    const persistBudget = budget.allot(
      this.options.historyTimeoutMs,
      PUBLISH_RESERVES.persist
    );
    if (persistBudget < PUBLISH_RESERVES.persistMinimum) {
      log.warn({ persistBudget }, "No time left to persist");
      return outcome;
    }

    const saved = await this.persist(article, persistBudget, signal);
    if (saved !== "created") {
      outcome.status = saved === "conflict" ? "conflict" : "persist_failed";
      log.info({ outcome: saved }, "History rejected article, skipping delivery");
      return outcome;
    }

    let images: string[] = [];
    const mediaBudget = budget.allot(
      this.options.images.pageTimeoutMs,
      PUBLISH_RESERVES.media
    );
    if (mediaBudget > PUBLISH_RESERVES.mediaMinimum) {
      try {
        images = await runWithTimeout(
          (mediaSignal) =>
            this.collectImages(article.raw, article.link, {
              ...this.options.images,
              pageTimeoutMs: mediaBudget,
              signal: mediaSignal,
              logger: log
            }),
          mediaBudget,
          "image collection",
          signal
        );
      } catch (error) {
        log.debug({ error }, "Image collection abandoned");
      }
    }

    const caption = buildCaption(
      this.options.ruleset,
      {
        title: article.title,
        description: article.description,
        source: article.source,
        topics: article.topics,
        entities: article.entities
      },
      this.options.caption
    );

    const enabled = this.options.channels.filter((channel) => channel.enabled);
    const results = await Promise.all(
      this.options.channels.map(async (channel) => {
        const result = await this.deliver(channel, images, caption, budget, signal);
        outcome.platforms[channel.name] = result;
        if (channel.enabled) {
          workerMetrics.publishAttempts.inc({
            platform: channel.name,
            status: result.ok ? "success" : "failure"
          });
        }
        return { channel, result };
      })
    );

    const delivered = results.some(
      ({ channel, result }) => channel.enabled && result.ok
    );
    if (delivered || enabled.length === 0) {
      outcome.status = "posted";
      log.info(
        { tier: article.tier, score: article.score, images: images.length },
        "Article posted"
      );
      return outcome;
    }

    outcome.status = "undelivered";
    log.warn("Every platform failed to deliver");

    if (this.options.releaseOnDeliveryFailure) {
      outcome.released = await this.release(article, budget, signal);
    }
    return outcome;
  }

  private async persist(
    article: ScoredArticle,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<SaveOutcome> {
    const createdAt = this.now();
    try {
      return await runWithTimeout(
        (saveSignal) =>
          this.options.store.save(
            {
              link: article.link,
              title: article.title,
              contentHash: article.fingerprint,
              site: article.source,
              feedUrl: article.feedUrl,
              publishedAt: (article.publishedAt ?? createdAt).toISOString(),
              createdAt: createdAt.toISOString()
            },
            saveSignal
          ),
        timeoutMs,
        "history save",
        signal
      );
    } catch (error) {
      this.logger.warn({ error }, "History save did not complete");
      return "error";
    }
  }

  private async deliver(
    channel: DeliveryChannel,
    images: readonly string[],
    caption: string,
    budget: DeadlineBudget,
    signal?: AbortSignal
  ): Promise<DeliveryResult> {
    if (!channel.enabled) {
      return { ok: true, retries: 0, fallbacks: 0 };
    }

    const budgetMs = budget.allot(channel.timeoutMs, PUBLISH_RESERVES.delivery);
    if (budgetMs <= 0) {
      return { ok: false, retries: 0, fallbacks: 0 };
    }

    try {
      return await runWithTimeout(
        (deliverySignal) =>
          channel.post(images, caption, { budgetMs, signal: deliverySignal }),
        budgetMs,
        `${channel.name} delivery`,
        signal
      );
    } catch (error) {
      this.logger.warn({ platform: channel.name, error }, "Delivery did not complete");
      return { ok: false, retries: 0, fallbacks: 0 };
    }
  }

  private async release(
    article: ScoredArticle,
    budget: DeadlineBudget,
    signal?: AbortSignal
  ): Promise<boolean> {
    const timeoutMs = budget.allot(this.options.historyTimeoutMs);
    if (timeoutMs <= 0) {
      return false;
    }

    try {
      const released = await runWithTimeout(
        (releaseSignal) => this.options.store.release(article.fingerprint, releaseSignal),
        timeoutMs,
        "history release",
        signal
      );
      if (released) {
        this.logger.info({ link: article.link }, "Released history record after failed delivery");
      }
      return released;
    } catch (error) {
      this.logger.warn({ error }, "History release did not complete");
      return false;
    }
  }
}
