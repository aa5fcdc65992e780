import Fastify from "fastify";

import { loadConfig } from "@ballotwire/config";
import { createLogger } from "@ballotwire/logger";

import { createWorkerContext, type WorkerContext } from "./context.js";
import { runPipeline } from "./jobs/run-pipeline.js";
import { workerMetrics } from "./metrics/registry.js";

function startPipelineScheduler(context: WorkerContext, signal: AbortSignal) {
  let isRunning = false;

  const execute = async () => {
    if (isRunning) {
      context.logger.warn("Pipeline already running, skipping tick");
      return;
    }

    isRunning = true;
    try {
      await runPipeline(context, { signal });
    } catch (error) {
      context.logger.error({ error }, "Pipeline tick failed");
    } finally {
      isRunning = false;
    }
  };

  void execute();

  const timer = setInterval(() => {
    void execute();
  }, context.config.scheduler.intervalMs);

  return {
    stop: () => {
      clearInterval(timer);
    }
  };
}

async function startMetricsServer(context: WorkerContext) {
  if (!context.config.monitoring.enabled) {
    context.logger.info("Metrics server disabled via configuration");
    return null;
  }

  const server = Fastify({ logger: false });

  server.get("/metrics", async (_request, reply) => {
    reply.header("Content-Type", workerMetrics.registry.contentType);
    return workerMetrics.registry.metrics();
  });

  await server.listen({
    port: context.config.monitoring.metricsPort,
    host: context.config.monitoring.metricsHost
  });

  context.logger.info(
    {
      port: context.config.monitoring.metricsPort,
      host: context.config.monitoring.metricsHost
    },
    "Metrics endpoint listening"
  );

  return server;
}

async function main() {
  const config = loadConfig();
  const logger = createLogger({ name: "worker", level: config.logLevel });
  const context = createWorkerContext(config, logger);

  if (process.argv.includes("--once")) {
    const summary = await runPipeline(context);
    process.exitCode = summary.status === "success" ? 0 : 1;
    return;
  }

  context.logger.info(
    {
      sources: context.sources.length,
      intervalMs: config.scheduler.intervalMs,
      platforms: context.channels
        .filter((channel) => channel.enabled)
        .map((channel) => channel.name)
    },
    "Worker service bootstrap complete"
  );

  const controller = new AbortController();
  const scheduler = startPipelineScheduler(context, controller.signal);
  const metricsServer = await startMetricsServer(context);

  const shutdown = async (signal?: string) => {
    context.logger.info({ signal }, "Shutting down worker");
    scheduler.stop();
    controller.abort();

    if (metricsServer) {
      await metricsServer.close();
    }

    await context.feedQueue.onIdle();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });

  process.on("unhandledRejection", (reason) => {
    context.logger.error({ reason }, "Unhandled rejection");
  });

  process.on("uncaughtException", (error) => {
    context.logger.error({ error }, "Uncaught exception");
  });
}

void main();
