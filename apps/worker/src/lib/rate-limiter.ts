import { systemClock, type Clock } from "./budget.js";

const WINDOW_MS = 60_000;

/**
 * Sliding-window cap on publish actions. Query `canPost()` right before each
 * attempt and call `recordPost()` right after each success.
 */
export class SlidingWindowRateLimiter {
  private timestamps: number[] = [];

  constructor(
    private readonly maxPerWindow: number,
    private readonly clock: Clock = systemClock,
    private readonly windowMs = WINDOW_MS
  ) {}

  canPost(): boolean {
    this.prune();
    return this.timestamps.length < this.maxPerWindow;
  }

  recordPost(): void {
    this.timestamps.push(this.clock.now());
  }

  get remaining(): number {
    this.prune();
    return Math.max(0, this.maxPerWindow - this.timestamps.length);
  }

  private prune(): void {
    const now = this.clock.now();
    this.timestamps = this.timestamps.filter(
      (timestamp) => now - timestamp < this.windowMs
    );
  }
}
