import { describe, it } from "mocha";
import { expect } from "chai";

import { MinIntervalRateLimiter } from "../../src/infra/rateLimiter.js";

function fakeClock(): { now: () => number; sleep: (ms: number) => Promise<void>; sleeps: number[]; advance(ms: number): void } {
  let current = 0;
  const sleeps: number[] = [];
  return {
    now: () => current,
    sleeps,
    advance(ms: number) {
      current += ms;
    },
    async sleep(ms: number) {
      sleeps.push(ms);
      current += ms;
    },
  };
}

describe("infra/rateLimiter", () => {
  it("spaces concurrent acquisitions by the minimum interval", async () => {
    const clock = fakeClock();
    const limiter = new MinIntervalRateLimiter({ minIntervalMs: 1_000, now: clock.now, sleep: clock.sleep });

    const granted = await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(granted).to.deep.equal([0, 1_000, 2_000]);
    expect(clock.sleeps).to.deep.equal([1_000, 1_000]);
  });

  it("grants immediately once the interval already elapsed", async () => {
    const clock = fakeClock();
    const limiter = new MinIntervalRateLimiter({ minIntervalMs: 1_000, now: clock.now, sleep: clock.sleep });

    expect(await limiter.acquire()).to.equal(0);
    clock.advance(5_000);
    expect(await limiter.acquire()).to.equal(5_000);
    expect(clock.sleeps).to.deep.equal([]);
  });

  it("keeps serving callers after a failed wait", async () => {
    const clock = fakeClock();
    let failNext = true;
    const limiter = new MinIntervalRateLimiter({
      minIntervalMs: 1_000,
      now: clock.now,
      sleep: async (ms) => {
        if (failNext) {
          failNext = false;
          throw new Error("timer cancelled");
        }
        await clock.sleep(ms);
      },
    });

    expect(await limiter.acquire()).to.equal(0);
    const failed = limiter.acquire();
    const next = limiter.acquire();

    let failure: unknown = null;
    try {
      await failed;
    } catch (error) {
      failure = error;
    }
    expect(failure).to.be.instanceOf(Error).with.property("message", "timer cancelled");
    expect(await next).to.equal(1_000);
  });

  it("rejects a negative interval", () => {
    expect(() => new MinIntervalRateLimiter({ minIntervalMs: -1 })).to.throw(TypeError);
  });
});
