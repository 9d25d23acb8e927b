import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import {
  MemoryRateLimitStore,
  RedisRateLimitStore,
  createRateLimitHook,
} from '../../src/infrastructure/index.js';
import type { CounterClient } from '../../src/infrastructure/index.js';
import { registerErrorHandler } from '../../src/interfaces/http/index.js';

/** In-process stand-in for the INCR/PEXPIRE subset of Redis. */
function fakeRedis() {
  const counts = new Map<string, number>();
  const client = {
    incr: vi.fn(async (key: string) => {
      const next = (counts.get(key) ?? 0) + 1;
      counts.set(key, next);
      return next;
    }),
    pexpire: vi.fn(async (_key: string, _ms: number) => 1),
  } satisfies CounterClient;
  return client;
}

describe('RedisRateLimitStore', () => {
  it('counts hits and sets the expiry only on the first', async () => {
    const redis = fakeRedis();
    const store = new RedisRateLimitStore(redis);

    expect(await store.hit('k', 60_000)).toBe(1);
    expect(await store.hit('k', 60_000)).toBe(2);
    expect(await store.hit('other', 60_000)).toBe(1);

    expect(redis.pexpire).toHaveBeenCalledTimes(2);
    expect(redis.pexpire).toHaveBeenNthCalledWith(1, 'k', 60_000);
    expect(redis.pexpire).toHaveBeenNthCalledWith(2, 'other', 60_000);
  });
});

describe('MemoryRateLimitStore', () => {
  it('resets a key once its window has expired', async () => {
    let now = 1_000;
    const store = new MemoryRateLimitStore(() => now);

    expect(await store.hit('k', 500)).toBe(1);
    expect(await store.hit('k', 500)).toBe(2);

    now = 1_500;
    expect(await store.hit('k', 500)).toBe(1);
  });
});

describe('createRateLimitHook', () => {
  // 2 minutes and 15 seconds past the epoch: third one-minute window, 45 s left
  const NOW_MS = 135_000;
  let app: FastifyInstance;

  beforeEach(async () => {
    app = Fastify({ logger: false });
    registerErrorHandler(app);
    const hook = createRateLimitHook(new MemoryRateLimitStore(() => NOW_MS), {
      scope: 'test',
      limit: 2,
      now: () => NOW_MS,
    });
    app.get('/limited', { onRequest: hook }, async () => ({ ok: true }));
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports the remaining budget and rejects over the limit', async () => {
    const first = await app.inject({ method: 'GET', url: '/limited' });
    expect(first.statusCode).toBe(200);
    expect(first.headers['x-ratelimit-limit']).toBe('2');
    expect(first.headers['x-ratelimit-remaining']).toBe('1');

    const second = await app.inject({ method: 'GET', url: '/limited' });
    expect(second.headers['x-ratelimit-remaining']).toBe('0');

    const third = await app.inject({ method: 'GET', url: '/limited' });
    expect(third.statusCode).toBe(429);
    expect(third.headers['retry-after']).toBe('45');
    expect(third.json()).toEqual({ error: 'Too many requests', code: 'RATE_LIMITED' });
  });

  it('counts clients separately', async () => {
    await app.inject({ method: 'GET', url: '/limited', remoteAddress: '10.0.0.1' });
    await app.inject({ method: 'GET', url: '/limited', remoteAddress: '10.0.0.1' });
    const other = await app.inject({ method: 'GET', url: '/limited', remoteAddress: '10.0.0.2' });
    expect(other.statusCode).toBe(200);
  });
});
