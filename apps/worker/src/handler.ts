import { z } from "zod";

import { ConfigValidationError, loadConfig, type AppConfig } from "@ballotwire/config";
import { createLogger, type LogSink } from "@ballotwire/logger";

import { createWorkerContext } from "./context.js";
import { emptySummary, runPipeline, type RunSummary } from "./jobs/run-pipeline.js";

export type { RunSummary } from "./jobs/run-pipeline.js";

const eventSchema = z
  .object({ dryRun: z.boolean().optional() })
  .passthrough()
  .catch({});

const executionContextSchema = z.object({
  log: z.function().args(z.string()).returns(z.unknown()),
  error: z.function().args(z.string()).returns(z.unknown())
});

function sinkFrom(executionContext: unknown): LogSink | undefined {
  const parsed = executionContextSchema.safeParse(executionContext);
  if (!parsed.success) {
    return undefined;
  }
  const { log, error } = parsed.data;
  return {
    log: (message) => {
      log(message);
    },
    error: (message) => {
      error(message);
    }
  };
}

/**
 * Serverless entry point. `event` may carry `{ dryRun: true }`;
 * `executionContext` may provide `log`/`error` functions that receive every
 * log line. Always resolves with a summary.
 */
export async function main(
  event?: unknown,
  executionContext?: unknown,
  options: { env?: NodeJS.ProcessEnv } = {}
): Promise<RunSummary> {
  const { dryRun = false } = eventSchema.parse(event ?? {});
  const logger = createLogger({ name: "pipeline", sink: sinkFrom(executionContext) });

  let config: AppConfig;
  try {
    config = loadConfig({ env: options.env });
  } catch (error) {
    if (!(error instanceof ConfigValidationError)) {
      throw error;
    }
    logger.error({ issues: error.issues }, "Invalid configuration, aborting run");
    return {
      ...emptySummary(dryRun),
      status: "error",
      error: "invalid_configuration"
    };
  }

  logger.level = config.logLevel;
  const context = createWorkerContext(config, logger);
  return runPipeline(context, { dryRun });
}

export default main;
