export { RedisRateLimitStore, MemoryRateLimitStore } from './rate-limit-store.js';
export type { RateLimitStore, CounterClient } from './rate-limit-store.js';
export { createRateLimitHook } from './rate-limit-hook.js';
export type { RateLimitOptions, RateLimitHook } from './rate-limit-hook.js';
