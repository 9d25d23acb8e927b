import type { FastifyReply, FastifyRequest } from 'fastify';
import { RateLimitedError } from '../../domain/index.js';
import type { RateLimitStore } from './rate-limit-store.js';

export interface RateLimitOptions {
  /** Groups routes that share a budget, e.g. `webhook` or `stats`. */
  scope: string;
  /** Requests allowed per window and client. */
  limit: number;
  windowMs?: number;
  now?: () => number;
}

export type RateLimitHook = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

/**
 * Builds a fixed-window, per-client-IP rate limit `onRequest` hook.
 *
 * The window index is part of the key, so counters from one window
 * never leak into the next. Over the limit the hook throws
 * RateLimitedError carrying the seconds left in the window.
 */
export function createRateLimitHook(store: RateLimitStore, opts: RateLimitOptions): RateLimitHook {
  const windowMs = opts.windowMs ?? 60_000;
  const now = opts.now ?? Date.now;

  return async (request, reply) => {
    const nowMs = now();
    const window = Math.floor(nowMs / windowMs);
    const key = `ratelimit:${opts.scope}:${request.ip}:${window}`;

    const count = await store.hit(key, windowMs);
    const remaining = Math.max(0, opts.limit - count);

    reply.header('x-ratelimit-limit', String(opts.limit));
    reply.header('x-ratelimit-remaining', String(remaining));

    if (count > opts.limit) {
      const retryAfterSeconds = Math.ceil(((window + 1) * windowMs - nowMs) / 1000);
      throw new RateLimitedError(retryAfterSeconds);
    }
  };
}
