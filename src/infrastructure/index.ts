export { redisPlugin } from './redis/index.js';
export type { RedisPluginOptions } from './redis/index.js';
export {
  createDbClient,
  ensureSchema,
  salesEvents,
  rewardRules,
  eventLog,
  dbPlugin,
  PostgresEventStore,
  PostgresRewardRuleRepository,
} from './db/index.js';
export type { Database, SqlClient, DbPluginOptions } from './db/index.js';
export { InMemoryEventStore, InMemoryRewardRuleRepository } from './memory/index.js';
export type { AuditEntry } from './memory/index.js';
export {
  RedisRateLimitStore,
  MemoryRateLimitStore,
  createRateLimitHook,
} from './rate-limit/index.js';
export type { RateLimitStore, CounterClient, RateLimitOptions, RateLimitHook } from './rate-limit/index.js';
