import {
  Counter,
  Histogram,
  Registry,
  collectDefaultMetrics
} from "prom-client";

const registry = new Registry();

collectDefaultMetrics({
  prefix: "ballotwire_",
  register: registry
});

const feedFetchDuration = new Histogram({
  name: "ballotwire_feed_fetch_duration_seconds",
  help: "Duration of individual feed fetch attempts in seconds",
  registers: [registry],
  labelNames: ["source", "status"],
  buckets: [0.1, 0.25, 0.5, 1, 2, 4, 8]
});

const feedFetchAttempts = new Counter({
  name: "ballotwire_feed_fetch_attempts_total",
  help: "Number of feed fetch attempts grouped by outcome",
  registers: [registry],
  labelNames: ["source", "status"]
});

const triageOutcomes = new Counter({
  name: "ballotwire_triage_outcomes_total",
  help: "Number of articles per triage outcome",
  registers: [registry],
  labelNames: ["outcome"]
});

const publishAttempts = new Counter({
  name: "ballotwire_publish_attempts_total",
  help: "Number of delivery attempts grouped by platform and outcome",
  registers: [registry],
  labelNames: ["platform", "status"]
});

const pipelineRuns = new Counter({
  name: "ballotwire_pipeline_runs_total",
  help: "Number of pipeline runs grouped by status",
  registers: [registry],
  labelNames: ["status"]
});

const pipelineDuration = new Histogram({
  name: "ballotwire_pipeline_duration_seconds",
  help: "Wall-clock duration of pipeline runs in seconds",
  registers: [registry],
  buckets: [1, 5, 10, 15, 20, 25, 30, 60]
});

export const workerMetrics = {
  registry,
  feedFetchDuration,
  feedFetchAttempts,
  triageOutcomes,
  publishAttempts,
  pipelineRuns,
  pipelineDuration
};
