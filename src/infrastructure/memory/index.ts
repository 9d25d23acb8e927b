export { InMemoryEventStore } from './in-memory-event-store.js';
export type { AuditEntry } from './in-memory-event-store.js';
export { InMemoryRewardRuleRepository } from './in-memory-rule-repo.js';
