import { z } from "zod";

const requiredString = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const telegramSchema = z.object({
  botToken: requiredString("TELEGRAM_BOT_TOKEN"),
  channelId: requiredString("TELEGRAM_CHANNEL_ID"),
  apiBase: z.string().url().default("https://api.telegram.org"),
  timeoutMs: z.coerce.number().int().positive().default(5_000)
});

const baleSchema = z.object({
  botToken: optionalString,
  channelId: optionalString,
  apiBase: z.string().url().default("https://tapi.bale.ai"),
  timeoutMs: z.coerce.number().int().positive().default(5_000)
});

const historySchema = z.object({
  endpoint: z.string().url().default("https://cloud.appwrite.io/v1"),
  projectId: requiredString("APPWRITE_PROJECT_ID"),
  apiKey: requiredString("APPWRITE_API_KEY"),
  databaseId: requiredString("APPWRITE_DATABASE_ID"),
  collectionId: z.string().min(1).default("history"),
  timeoutMs: z.coerce.number().int().positive().default(5_000),
  loadLimit: z.coerce.number().int().positive().max(5_000).default(500),
  releaseOnDeliveryFailure: z.boolean().default(true)
});

const pipelineSchema = z.object({
  deadlineMs: z.coerce.number().int().min(5_000).default(27_000),
  feedFetchTimeoutMs: z.coerce.number().int().positive().default(4_000),
  feedsTotalTimeoutMs: z.coerce.number().int().positive().default(10_000),
  feedMaxAttempts: z.coerce.number().int().min(1).max(10).default(3),
  feedRetryBaseMs: z.coerce.number().int().min(0).default(300),
  feedConcurrency: z.coerce.number().int().positive().optional(),
  freshnessWindowHours: z.coerce.number().positive().default(24),
  maxDescriptionChars: z.coerce.number().int().positive().default(500)
});

const publishingSchema = z.object({
  batchSize: z.coerce.number().int().positive().default(4),
  rateLimitPerMinute: z.coerce.number().int().positive().default(8),
  interPostDelayMs: z.coerce.number().int().min(0).default(1_000),
  postMaxAttempts: z.coerce.number().int().min(1).max(5).default(2),
  maxImages: z.coerce.number().int().min(1).max(10).default(5),
  imageScrapeTimeoutMs: z.coerce.number().int().positive().default(3_000),
  captionMaxChars: z.coerce.number().int().min(200).default(1_024),
  channelHandle: optionalString,
  // Literal "\n" sequences in the env value become line breaks.
  captionFooter: optionalString.transform((value) =>
    value?.replace(/\\n/g, "\n")
  )
});

const scoringSchema = z
  .object({
    highThreshold: z.coerce.number().int().default(6),
    mediumThreshold: z.coerce.number().int().default(3),
    fuzzyOverlapThreshold: z.coerce.number().min(0).max(1).default(0.75),
    fuzzyJaccardThreshold: z.coerce.number().min(0).max(1).default(0.55),
    trustBonusPromotesTier: z.boolean().default(false)
  })
  .refine((value) => value.highThreshold >= value.mediumThreshold, {
    message: "SCORE_HIGH must be greater than or equal to SCORE_MEDIUM",
    path: ["highThreshold"]
  });

const schedulerSchema = z.object({
  intervalMs: z
    .coerce.number()
    .int()
    .min(30_000, "Scheduler interval must be at least 30 seconds")
    .default(5 * 60 * 1000)
});

const monitoringSchema = z.object({
  enabled: z.boolean().default(true),
  metricsPort: z.coerce.number().int().min(1).max(65535).default(9300),
  metricsHost: z.string().default("0.0.0.0")
});

export const configSchema = z.object({
  nodeEnv: z
    .enum(["development", "test", "production"])
    .default("development"),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  telegram: telegramSchema,
  bale: baleSchema,
  history: historySchema,
  pipeline: pipelineSchema,
  publishing: publishingSchema,
  scoring: scoringSchema,
  scheduler: schedulerSchema,
  monitoring: monitoringSchema
});

export type AppConfig = z.infer<typeof configSchema>;
