import type { AppLogger } from "@ballotwire/logger";

import {
  DeadlineBudget,
  TimeoutError,
  delay,
  runWithTimeout,
  systemClock,
  type Clock
} from "../budget.js";
import { BotApiError, type BotApiClient } from "./bot-api.js";

const MAX_RATE_LIMIT_WAIT_MS = 2_000;
const RATE_LIMIT_MARGIN_MS = 2_000;

export type DeliveryForm = "album" | "photo" | "text";

export type DeliveryResult = {
  ok: boolean;
  /** Absent when nothing was sent or the channel is disabled. */
  form?: DeliveryForm;
  retries: number;
  fallbacks: number;
};

export type PostOptions = {
  budgetMs: number;
  signal?: AbortSignal;
};

/**
 * A destination the publisher can deliver to. A disabled channel reports
 * success without sending anything.
 */
export interface DeliveryChannel {
  readonly name: string;
  readonly enabled: boolean;
  /** Upper bound on one delivery, before the run's own budget applies. */
  readonly timeoutMs: number;
  post(
    images: readonly string[],
    caption: string,
    options: PostOptions
  ): Promise<DeliveryResult>;
}

export type BotApiChannelOptions = {
  name: string;
  client: BotApiClient | null;
  timeoutMs: number;
  maxAttempts: number;
  maxImages: number;
  logger: AppLogger;
  clock?: Clock;
};

export class BotApiChannel implements DeliveryChannel {
  readonly name: string;
  readonly timeoutMs: number;
  private readonly client: BotApiClient | null;
  private readonly logger: AppLogger;
  private readonly clock: Clock;

  constructor(private readonly options: BotApiChannelOptions) {
    this.name = options.name;
    this.timeoutMs = options.timeoutMs;
    this.client = options.client;
    this.logger = options.logger.child({ platform: options.name });
    this.clock = options.clock ?? systemClock;
  }

  get enabled(): boolean {
    return this.client !== null;
  }

  /**
   * Album, then single photo, then text. Retries of the whole chain start
   * from a single image. A rate-limit reply is waited out only when the
   * budget leaves room for it.
   */
  async post(
    images: readonly string[],
    caption: string,
    options: PostOptions
  ): Promise<DeliveryResult> {
    const { client } = this;
    if (!client) {
      return { ok: true, retries: 0, fallbacks: 0 };
    }

    const budget = new DeadlineBudget(options.budgetMs, this.clock);
    const result: DeliveryResult = { ok: false, retries: 0, fallbacks: 0 };

    for (let attempt = 0; attempt < this.options.maxAttempts; attempt++) {
      const remaining = budget.remaining();
      if (remaining <= 0 || options.signal?.aborted) break;

      const attemptImages =
        attempt === 0
          ? images.slice(0, this.options.maxImages)
          : images.slice(0, 1);

      try {
        result.form = await runWithTimeout(
          (signal) => this.sendChain(client, attemptImages, caption, result, signal),
          remaining,
          `${this.name} delivery`,
          options.signal
        );
        result.ok = true;
        return result;
      } catch (error) {
        result.retries++;

        if (error instanceof BotApiError && error.rateLimited) {
          const waitMs = Math.min(
            (error.retryAfterSeconds ?? 0) * 1_000,
            MAX_RATE_LIMIT_WAIT_MS
          );
          this.logger.warn(
            { retryAfterSeconds: error.retryAfterSeconds, attempt },
            "Rate limited by platform"
          );
          if (budget.remaining() > waitMs + RATE_LIMIT_MARGIN_MS) {
            await delay(waitMs, options.signal);
            continue;
          }
          break;
        }

        if (error instanceof TimeoutError) {
          this.logger.warn({ attempt }, error.message);
        } else {
          this.logger.warn({ attempt, error }, "Delivery attempt failed");
        }
      }
    }

    return result;
  }

  private async sendChain(
    client: BotApiClient,
    images: readonly string[],
    caption: string,
    stats: DeliveryResult,
    signal: AbortSignal
  ): Promise<DeliveryForm> {
    let remainingImages = images;

    if (remainingImages.length >= 2) {
      try {
        await client.sendMediaGroup(remainingImages, caption, signal);
        return "album";
      } catch (error) {
        if (!isDegradable(error, signal)) throw error;
        this.logger.warn({ error }, "Album failed, trying single photo");
        stats.fallbacks++;
        remainingImages = remainingImages.slice(0, 1);
      }
    }

    if (remainingImages.length === 1) {
      try {
        await client.sendPhoto(remainingImages[0], caption, signal);
        return "photo";
      } catch (error) {
        if (!isDegradable(error, signal)) throw error;
        this.logger.warn({ error }, "Photo failed, sending text");
        stats.fallbacks++;
      }
    }

    await client.sendMessage(caption, signal);
    return "text";
  }
}

function isDegradable(error: unknown, signal: AbortSignal): boolean {
  return error instanceof BotApiError && !error.rateLimited && !signal.aborted;
}
