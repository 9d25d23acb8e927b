export { salesEvents, rewardRules, eventLog } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export { ensureSchema } from './migrate.js';
export { PostgresEventStore } from './postgres-event-store.js';
export { PostgresRewardRuleRepository } from './postgres-rule-repository.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
