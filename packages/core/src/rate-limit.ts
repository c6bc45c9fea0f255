import { systemClock, type Clock } from "./clock.js";
import { FetchError } from "./errors.js";

/**
 * Enforces a minimum spacing between calls on one logical channel.
 * Slots are reserved synchronously, so concurrent callers queue in call order.
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private readonly clock: Clock;
  private nextSlotAt = 0;

  public constructor(intervalMs: number, clock: Clock = systemClock) {
    this.intervalMs = intervalMs;
    this.clock = clock;
  }

  public async acquire(): Promise<void> {
    const now = this.clock.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.intervalMs;
    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.clock.sleep(waitMs);
    }
  }
}

interface CacheEntry<T> {
  value: T;
  fetchedAt: number;
}

export interface RateLimitedCacheOptions {
  limiter: RateLimiter;
  clock?: Clock;
}

/**
 * Read-through TTL cache in front of a rate-limited channel. Concurrent misses
 * on the same key share one fetch; a failed fetch leaves no entry behind.
 */
export class RateLimitedCache<T> {
  private readonly limiter: RateLimiter;
  private readonly clock: Clock;
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inflight = new Map<string, Promise<T>>();

  public constructor(options: RateLimitedCacheOptions) {
    this.limiter = options.limiter;
    this.clock = options.clock ?? systemClock;
  }

  public async getOrFetch(key: string, ttlMs: number, fetchFn: () => Promise<T>): Promise<T> {
    const hit = this.entries.get(key);
    if (hit && this.clock.now() - hit.fetchedAt < ttlMs) {
      return hit.value;
    }
    return this.load(key, fetchFn);
  }

  /** Bypasses the TTL but still honours the channel spacing. */
  public async refresh(key: string, fetchFn: () => Promise<T>): Promise<T> {
    return this.load(key, fetchFn);
  }

  public peek(key: string): T | undefined {
    return this.entries.get(key)?.value;
  }

  public get size(): number {
    return this.entries.size;
  }

  private async load(key: string, fetchFn: () => Promise<T>): Promise<T> {
    const pending = this.inflight.get(key);
    if (pending) {
      return pending;
    }

    const task = this.fetchAndStore(key, fetchFn);
    this.inflight.set(key, task);
    try {
      return await task;
    } finally {
      this.inflight.delete(key);
    }
  }

  private async fetchAndStore(key: string, fetchFn: () => Promise<T>): Promise<T> {
    await this.limiter.acquire();
    let value: T;
    try {
      value = await fetchFn();
    } catch (error) {
      throw error instanceof FetchError ? error : new FetchError(key, error);
    }
    this.entries.set(key, { value, fetchedAt: this.clock.now() });
    return value;
  }
}
