import { describe, expect, it } from "vitest";
import type { Clock } from "./clock.js";
import { FetchError } from "./errors.js";
import { RateLimitedCache, RateLimiter } from "./rate-limit.js";

class ManualClock implements Clock {
  public current = 0;
  public readonly sleeps: number[] = [];

  public now(): number {
    return this.current;
  }

  public async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

function setup(intervalMs = 1000): { clock: ManualClock; cache: RateLimitedCache<number> } {
  const clock = new ManualClock();
  const cache = new RateLimitedCache<number>({ limiter: new RateLimiter(intervalMs, clock), clock });
  return { clock, cache };
}

describe("RateLimiter", () => {
  it("spaces concurrent callers by the channel interval", async () => {
    const clock = new ManualClock();
    const limiter = new RateLimiter(1000, clock);

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it("keeps channels independent", async () => {
    const clock = new ManualClock();
    const price = new RateLimiter(1000, clock);
    const social = new RateLimiter(1000, clock);

    await price.acquire();
    await social.acquire();

    expect(clock.sleeps).toEqual([]);
  });

  it("does not wait once the interval has elapsed", async () => {
    const clock = new ManualClock();
    const limiter = new RateLimiter(1000, clock);

    await limiter.acquire();
    clock.current = 1500;
    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
  });
});

describe("RateLimitedCache", () => {
  it("issues exactly one external call for two reads within the TTL", async () => {
    const { clock, cache } = setup();
    let calls = 0;
    const fetchFn = async () => {
      calls += 1;
      return 42;
    };

    const first = await cache.getOrFetch("price:SOL", 60_000, fetchFn);
    const second = await cache.getOrFetch("price:SOL", 60_000, fetchFn);

    expect(first).toBe(42);
    expect(second).toBe(42);
    expect(calls).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("refetches once the entry is stale", async () => {
    const { clock, cache } = setup();
    let calls = 0;
    const fetchFn = async () => {
      calls += 1;
      return calls * 10;
    };

    await cache.getOrFetch("k", 60_000, fetchFn);
    clock.current = 60_000;
    const value = await cache.getOrFetch("k", 60_000, fetchFn);

    expect(value).toBe(20);
    expect(calls).toBe(2);
  });

  it("wraps fetch failures and leaves no poisoned entry", async () => {
    const { clock, cache } = setup();
    let calls = 0;
    const fetchFn = async () => {
      calls += 1;
      if (calls === 1) {
        throw new Error("connection reset");
      }
      return 7;
    };

    await expect(cache.getOrFetch("k", 60_000, fetchFn)).rejects.toBeInstanceOf(FetchError);
    expect(cache.size).toBe(0);

    const value = await cache.getOrFetch("k", 60_000, fetchFn);
    expect(value).toBe(7);
    expect(calls).toBe(2);
    expect(clock.sleeps).toEqual([1000]);
  });

  it("shares one fetch between concurrent misses on the same key", async () => {
    const { cache } = setup();
    let calls = 0;
    let resolveFetch: (value: number) => void = () => undefined;
    const gate = new Promise<number>((resolve) => {
      resolveFetch = resolve;
    });
    const fetchFn = () => {
      calls += 1;
      return gate;
    };

    const a = cache.getOrFetch("k", 60_000, fetchFn);
    const b = cache.getOrFetch("k", 60_000, fetchFn);
    resolveFetch(5);

    expect(await a).toBe(5);
    expect(await b).toBe(5);
    expect(calls).toBe(1);
  });

  it("refresh bypasses the TTL", async () => {
    const { cache } = setup(0);
    let calls = 0;
    const fetchFn = async () => {
      calls += 1;
      return calls;
    };

    await cache.getOrFetch("k", 60_000, fetchFn);
    const refreshed = await cache.refresh("k", fetchFn);

    expect(refreshed).toBe(2);
    expect(cache.peek("k")).toBe(2);
  });
});
