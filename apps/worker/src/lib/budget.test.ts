import { describe, expect, it } from "vitest";

import { DeadlineBudget, TimeoutError, delay, runWithTimeout } from "./budget.js";

function manualClock() {
  let current = 0;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    }
  };
}

describe("DeadlineBudget", () => {
  it("caps each allotment and leaves the reserve for later phases", () => {
    const clock = manualClock();
    const budget = new DeadlineBudget(30_000, clock);

    expect(budget.allot(10_000, 16_000)).toBe(10_000);

    clock.advance(8_000);
    expect(budget.remaining()).toBe(22_000);
    expect(budget.allot(10_000, 16_000)).toBe(6_000);

    clock.advance(20_000);
    expect(budget.allot(10_000, 16_000)).toBe(-14_000);
  });

  it("never slices more than what is left", () => {
    const clock = manualClock();
    const budget = new DeadlineBudget(10_000, clock);
    clock.advance(7_000);

    expect(budget.slice(5_000).ceiling).toBe(3_000);
    expect(budget.slice(5_000, 4_000).ceiling).toBe(0);
  });
});

describe("runWithTimeout", () => {
  it("returns the task result when it finishes in time", async () => {
    await expect(runWithTimeout(async () => "done", 1_000, "quick")).resolves.toBe(
      "done"
    );
  });

  it("rejects with a TimeoutError and aborts the task signal", async () => {
    let seen: AbortSignal | undefined;
    const pending = runWithTimeout(
      (signal) => {
        seen = signal;
        return new Promise<never>(() => undefined);
      },
      10,
      "slow feed"
    );

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow("slow feed timed out after 10ms");
    expect(seen?.aborted).toBe(true);
  });

  it("aborts the task when the parent signal aborts", async () => {
    const parent = new AbortController();
    const pending = runWithTimeout(
      (signal) =>
        new Promise<never>((_, reject) => {
          signal.addEventListener("abort", () => reject(new Error("cancelled")));
        }),
      10_000,
      "publish",
      parent.signal
    );

    parent.abort();
    await expect(pending).rejects.toThrow("cancelled");
  });
});

describe("delay", () => {
  it("resolves after the wait", async () => {
    await expect(delay(5)).resolves.toBeUndefined();
  });

  it("rejects when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = delay(10_000, controller.signal);

    controller.abort(new Error("shutting down"));
    await expect(pending).rejects.toThrow("shutting down");
  });

  it("rejects immediately for an already aborted signal", async () => {
    await expect(delay(10, AbortSignal.abort(new Error("gone")))).rejects.toThrow("gone");
  });
});
