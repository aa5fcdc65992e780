import { config as loadDotenv } from "dotenv";
import type { ZodIssue } from "zod";

import { configSchema, type AppConfig } from "./schema.js";

let cachedConfig: AppConfig | null = null;

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join(", ")}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

function coerceBoolean(value: string | undefined) {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (["false", "0", "no", "off"].includes(normalized)) {
    return false;
  }
  if (["true", "1", "yes", "on"].includes(normalized)) {
    return true;
  }
  return undefined;
}

/**
 * Parses the environment into an {@link AppConfig}.
 *
 * Loads from `process.env` (after `.env`) are cached for the life of the
 * process; an explicit `env` is parsed fresh every time.
 *
 * @throws ConfigValidationError when a required value is missing or invalid
 */
export function loadConfig(options: { env?: NodeJS.ProcessEnv } = {}): AppConfig {
  if (!options.env && cachedConfig) {
    return cachedConfig;
  }

  if (!options.env) {
    loadDotenv();
  }

  const env = options.env ?? process.env;

  const result = configSchema.safeParse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      channelId: env.TELEGRAM_CHANNEL_ID,
      apiBase: env.TELEGRAM_API_BASE,
      timeoutMs: env.TELEGRAM_TIMEOUT_MS
    },
    bale: {
      botToken: env.BALE_BOT_TOKEN,
      channelId: env.BALE_CHANNEL_ID,
      apiBase: env.BALE_API_BASE,
      timeoutMs: env.BALE_TIMEOUT_MS
    },
    history: {
      endpoint: env.APPWRITE_ENDPOINT,
      projectId: env.APPWRITE_PROJECT_ID,
      apiKey: env.APPWRITE_API_KEY,
      databaseId: env.APPWRITE_DATABASE_ID,
      collectionId: env.APPWRITE_COLLECTION_ID,
      timeoutMs: env.HISTORY_TIMEOUT_MS,
      loadLimit: env.HISTORY_LOAD_LIMIT,
      releaseOnDeliveryFailure: coerceBoolean(env.HISTORY_RELEASE_ON_FAILURE)
    },
    pipeline: {
      deadlineMs: env.PIPELINE_DEADLINE_MS,
      feedFetchTimeoutMs: env.FEED_FETCH_TIMEOUT_MS,
      feedsTotalTimeoutMs: env.FEEDS_TOTAL_TIMEOUT_MS,
      feedMaxAttempts: env.FEED_MAX_ATTEMPTS,
      feedRetryBaseMs: env.FEED_RETRY_BASE_MS,
      feedConcurrency: env.FEED_CONCURRENCY,
      freshnessWindowHours: env.FRESHNESS_WINDOW_HOURS,
      maxDescriptionChars: env.MAX_DESCRIPTION_CHARS
    },
    publishing: {
      batchSize: env.PUBLISH_BATCH_SIZE,
      rateLimitPerMinute: env.RATE_LIMIT_PER_MINUTE,
      interPostDelayMs: env.INTER_POST_DELAY_MS,
      postMaxAttempts: env.POST_MAX_ATTEMPTS,
      maxImages: env.MAX_IMAGES,
      imageScrapeTimeoutMs: env.IMAGE_SCRAPE_TIMEOUT_MS,
      captionMaxChars: env.CAPTION_MAX_CHARS,
      channelHandle: env.CHANNEL_HANDLE,
      captionFooter: env.CAPTION_FOOTER
    },
    scoring: {
      highThreshold: env.SCORE_HIGH,
      mediumThreshold: env.SCORE_MEDIUM,
      fuzzyOverlapThreshold: env.FUZZY_OVERLAP_THRESHOLD,
      fuzzyJaccardThreshold: env.FUZZY_JACCARD_THRESHOLD,
      trustBonusPromotesTier: coerceBoolean(env.TRUST_BONUS_PROMOTES_TIER)
    },
    scheduler: {
      intervalMs: env.SCHEDULER_INTERVAL_MS
    },
    monitoring: {
      enabled: coerceBoolean(env.MONITORING_ENABLED),
      metricsPort: env.MONITORING_METRICS_PORT,
      metricsHost: env.MONITORING_METRICS_HOST
    }
  });

  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map(
        (issue: ZodIssue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }

  if (!options.env) {
    cachedConfig = result.data;
  }
  return result.data;
}
