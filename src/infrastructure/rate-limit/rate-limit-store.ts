/** Counts hits per key within a fixed window. */
export interface RateLimitStore {
  /** Records one hit and returns the number of hits in the key's window. */
  hit(key: string, windowMs: number): Promise<number>;
}

/**
 * Subset of the ioredis client the Redis store relies on.
 * `Redis` satisfies it structurally.
 */
export interface CounterClient {
  incr(key: string): Promise<number>;
  pexpire(key: string, milliseconds: number): Promise<number>;
}

/**
 * Redis-backed counter: `INCR`, plus `PEXPIRE` on the first hit so the
 * key disappears once its window is over.
 */
export class RedisRateLimitStore implements RateLimitStore {
  constructor(private readonly client: CounterClient) {}

  async hit(key: string, windowMs: number): Promise<number> {
    const count = await this.client.incr(key);
    if (count === 1) {
      await this.client.pexpire(key, windowMs);
    }
    return count;
  }
}

/** Process-local counter for single-instance runs without Redis. */
export class MemoryRateLimitStore implements RateLimitStore {
  private readonly counters = new Map<string, { count: number; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async hit(key: string, windowMs: number): Promise<number> {
    const nowMs = this.now();
    this.evictExpired(nowMs);

    const entry = this.counters.get(key);
    if (entry === undefined) {
      this.counters.set(key, { count: 1, expiresAt: nowMs + windowMs });
      return 1;
    }
    entry.count += 1;
    return entry.count;
  }

  private evictExpired(nowMs: number): void {
    for (const [key, entry] of this.counters) {
      if (entry.expiresAt <= nowMs) this.counters.delete(key);
    }
  }
}
