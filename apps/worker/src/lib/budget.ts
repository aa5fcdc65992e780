export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => performance.now()
};

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${Math.round(timeoutMs)}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Wall-clock budget measured from construction against a fixed ceiling.
 * Phases ask for `allot(cap, reserve)` so later phases keep their share.
 */
export class DeadlineBudget {
  private readonly startedAt: number;

  constructor(
    private readonly ceilingMs: number,
    private readonly clock: Clock = systemClock
  ) {
    this.startedAt = clock.now();
  }

  get ceiling(): number {
    return this.ceilingMs;
  }

  elapsed(): number {
    return this.clock.now() - this.startedAt;
  }

  remaining(): number {
    return this.ceilingMs - this.elapsed();
  }

  /** `min(capMs, remaining - reserveMs)`; may be zero or negative. */
  allot(capMs: number, reserveMs = 0): number {
    return Math.min(capMs, this.remaining() - reserveMs);
  }

  /** A child budget for one operation, never longer than what is left here. */
  slice(capMs: number, reserveMs = 0): DeadlineBudget {
    return new DeadlineBudget(Math.max(0, this.allot(capMs, reserveMs)), this.clock);
  }
}

/**
 * Runs `task` with an abort signal that fires after `timeoutMs`, rejecting
 * with {@link TimeoutError} at that point even if the task ignores the signal.
 */
export async function runWithTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parentSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const onParentAbort = () => controller.abort();

  if (parentSignal?.aborted) {
    controller.abort();
  } else {
    parentSignal?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, Math.max(0, timeoutMs));
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener("abort", onParentAbort);
  }
}

/**
 * Resolves after `ms`; rejects early when `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason instanceof Error ? signal.reason : new Error("Aborted"));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason instanceof Error ? signal.reason : new Error("Aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
