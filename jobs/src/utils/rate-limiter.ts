export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface RateLimiterOptions {
  callsPerMinute: number;
  /** Length of the rolling window; one minute unless overridden */
  windowMs?: number;
  clock?: Clock;
}

export interface RateLimiter {
  /** Resolves once a call may go out. Never rejects for being over budget. */
  waitForSlot(): Promise<void>;
  schedule<T>(fn: () => Promise<T>): Promise<T>;
}

/**
 * Sliding-window log limiter. Admissions are chained so that concurrent
 * callers take slots one at a time from a single budget.
 */
export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
  const { callsPerMinute } = options;
  const windowMs = options.windowMs ?? 60_000;
  const clock = options.clock ?? systemClock;

  if (!Number.isInteger(callsPerMinute) || callsPerMinute < 1) {
    throw new RangeError(`callsPerMinute must be a positive integer, got ${callsPerMinute}`);
  }

  const admitted: number[] = [];
  let chain: Promise<void> = Promise.resolve();

  function prune(now: number) {
    while (admitted.length > 0 && now - admitted[0] >= windowMs) {
      admitted.shift();
    }
  }

  async function acquire(): Promise<void> {
    for (;;) {
      const now = clock.now();
      prune(now);
      if (admitted.length < callsPerMinute) {
        admitted.push(now);
        return;
      }
      await clock.sleep(admitted[0] + windowMs - now);
    }
  }

  function waitForSlot(): Promise<void> {
    const slot = chain.then(acquire);
    // keep the chain alive even if a sleep rejects
    chain = slot.catch(() => undefined);
    return slot;
  }

  return {
    waitForSlot,
    async schedule(fn) {
      await waitForSlot();
      return fn();
    },
  };
}
