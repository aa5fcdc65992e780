import { describe, expect, it } from "vitest";

import { SlidingWindowRateLimiter } from "./rate-limiter.js";

function manualClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    set: (value: number) => {
      current = value;
    }
  };
}

describe("SlidingWindowRateLimiter", () => {
  it("blocks once the window is full and frees slots as they age out", () => {
    const clock = manualClock();
    const limiter = new SlidingWindowRateLimiter(2, clock);

    expect(limiter.canPost()).toBe(true);
    limiter.recordPost();
    limiter.recordPost();
    expect(limiter.canPost()).toBe(false);
    expect(limiter.remaining).toBe(0);

    clock.set(59_999);
    expect(limiter.canPost()).toBe(false);

    clock.set(60_000);
    expect(limiter.canPost()).toBe(true);
    expect(limiter.remaining).toBe(2);
  });

  it("only frees the slots that have aged out", () => {
    const clock = manualClock();
    const limiter = new SlidingWindowRateLimiter(2, clock);

    limiter.recordPost();
    clock.set(30_000);
    limiter.recordPost();

    clock.set(60_000);
    expect(limiter.remaining).toBe(1);
    expect(limiter.canPost()).toBe(true);
  });
});
