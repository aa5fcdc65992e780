export type RunMetricsSnapshot = {
  fuzzyMatchCount: number;
  hashCollisions: number;
  feedLatenciesMs: Record<string, number>;
};

/**
 * Per-run counters returned with the run summary. One instance per run;
 * the process-wide Prometheus registry is separate.
 */
export class RunMetrics {
  private fuzzyMatchCount = 0;
  private hashCollisions = 0;
  private readonly feedLatencies = new Map<string, number>();

  recordFuzzyMatch(): void {
    this.fuzzyMatchCount++;
  }

  recordHashCollision(): void {
    this.hashCollisions++;
  }

  /** Keeps the latest attempt's latency per source. */
  recordFeedLatency(source: string, latencyMs: number): void {
    this.feedLatencies.set(source, Math.round(latencyMs * 10) / 10);
  }

  snapshot(): RunMetricsSnapshot {
    return {
      fuzzyMatchCount: this.fuzzyMatchCount,
      hashCollisions: this.hashCollisions,
      feedLatenciesMs: Object.fromEntries(this.feedLatencies)
    };
  }
}
