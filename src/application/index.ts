export { IngestionService, DEFAULT_DEDUP_WINDOW_MINUTES } from './ingestion-service.js';
export type { IngestResult, IngestionServiceDeps, IngestionServiceOptions } from './ingestion-service.js';
export { createIngestSchema, toValidationError, DEFAULT_METADATA_MAX_CHARS } from './ingest-schema.js';
export type { IngestPayload, IngestSchemaOptions } from './ingest-schema.js';
export { createSecretVerifier } from './secret.js';
export type { SecretVerifier } from './secret.js';
export { StatsService, ratePct, DEFAULT_DAILY_DAYS, MAX_DAILY_DAYS } from './stats-service.js';
export type { CurrentStats, DailyPerformance, StatsOptions } from './stats-service.js';
export { statsWindow, localDate, shiftDate, startOfLocalDay, isValidTimeZone, WEEK_STARTS } from './calendar.js';
export type { WeekStart } from './calendar.js';
export { listRules, getRule, replaceRule, patchRule } from './rule-crud.js';
export { replaceRuleSchema, patchRuleSchema } from './rule-schema.js';
export type { ReplaceRuleInput, PatchRuleInput } from './rule-schema.js';
export { listEvents } from './query-events.js';
export type { ListEventsParams, EventPage } from './query-events.js';
export { purgeEventsOlderThan, DEFAULT_RETENTION_DAYS } from './retention.js';
export type { PurgeResult } from './retention.js';
export type {
  DedupKey,
  IngestSession,
  StatsWindow,
  EventAggregates,
  DailyBucket,
  EventListFilters,
  PaginationParams,
  EventStore,
  RewardRuleRepository,
  RewardRulePatch,
} from './ports.js';
