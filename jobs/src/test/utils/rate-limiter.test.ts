import { describe, it, expect } from "vitest";
import { createRateLimiter, type Clock } from "../../utils/rate-limiter";

function fakeClock() {
  let now = 0;
  const sleeps: number[] = [];
  const clock: Clock = {
    now: () => now,
    sleep: async (ms) => {
      sleeps.push(ms);
      now += ms;
    },
  };
  return {
    clock,
    sleeps,
    advance: (ms: number) => {
      now += ms;
    },
    time: () => now,
  };
}

describe("createRateLimiter", () => {
  it("admits up to the limit without waiting", async () => {
    const { clock, sleeps, time } = fakeClock();
    const limiter = createRateLimiter({ callsPerMinute: 3, clock });

    await limiter.waitForSlot();
    await limiter.waitForSlot();
    await limiter.waitForSlot();

    expect(sleeps).toEqual([]);
    expect(time()).toBe(0);
  });

  it("waits for the oldest admission to leave the window", async () => {
    const { clock, sleeps, time } = fakeClock();
    const limiter = createRateLimiter({ callsPerMinute: 3, clock });

    for (let i = 0; i < 4; i++) await limiter.waitForSlot();

    expect(sleeps).toEqual([60_000]);
    expect(time()).toBe(60_000);
  });

  it("slides the window instead of resetting it", async () => {
    const { clock, sleeps, advance } = fakeClock();
    const limiter = createRateLimiter({ callsPerMinute: 3, clock });

    await limiter.waitForSlot();
    advance(20_000);
    await limiter.waitForSlot();
    advance(20_000);
    await limiter.waitForSlot();
    await limiter.waitForSlot();

    expect(sleeps).toEqual([20_000]);
  });

  it("shares one budget between concurrent callers, in call order", async () => {
    const { clock, sleeps, time } = fakeClock();
    const limiter = createRateLimiter({ callsPerMinute: 2, clock });
    const order: number[] = [];

    await Promise.all(
      [0, 1, 2, 3, 4].map((i) => limiter.waitForSlot().then(() => order.push(i)))
    );

    expect(order).toEqual([0, 1, 2, 3, 4]);
    expect(sleeps).toEqual([60_000, 60_000]);
    expect(time()).toBe(120_000);
  });

  it("honours a custom window", async () => {
    const { clock, sleeps } = fakeClock();
    const limiter = createRateLimiter({ callsPerMinute: 1, windowMs: 1000, clock });

    await limiter.waitForSlot();
    await limiter.waitForSlot();

    expect(sleeps).toEqual([1000]);
  });

  it("schedule runs the function after a slot frees up", async () => {
    const { clock } = fakeClock();
    const limiter = createRateLimiter({ callsPerMinute: 1, clock });

    await expect(limiter.schedule(async () => "done")).resolves.toBe("done");
  });

  it("rejects a non-positive budget", () => {
    expect(() => createRateLimiter({ callsPerMinute: 0 })).toThrow(RangeError);
  });
});
