import type {
  EventSource,
  EventType,
  NewSalesEvent,
  RewardRule,
  SalesEvent,
} from '../domain/index.js';

/** Key the duplicate window is scoped to. */
export interface DedupKey {
  readonly source: EventSource;
  readonly event_type: EventType;
}

/**
 * Operations available while a key is held exclusively.
 *
 * Implementations guarantee that no other session for the same key
 * runs between `findRecent` and `append`.
 */
export interface IngestSession {
  /** Newest event for the session key created at or after `since`. */
  findRecent(since: Date): Promise<SalesEvent | undefined>;
  /** Inserts the event; id and timestamp are assigned by the store. */
  append(event: NewSalesEvent): Promise<SalesEvent>;
}

/** Calendar boundaries for one stats read, already resolved to instants. */
export interface StatsWindow {
  readonly dayStart: Date;
  readonly dayEnd: Date;
  readonly weekStart: Date;
}

export interface EventAggregates {
  readonly total_gold: number;
  readonly total_xp: number;
  readonly total_events: number;
  readonly events_today: number;
  readonly calls_made: number;
  readonly calls_connected: number;
  readonly meetings_booked: number;
  readonly weekly_meetings: number;
}

export interface DailyBucket {
  readonly event_date: string; // YYYY-MM-DD in the requested zone
  readonly total_events: number;
  readonly total_gold: number;
  readonly total_xp: number;
  readonly calls_made: number;
  readonly calls_connected: number;
  readonly meetings_booked: number;
  readonly meetings_attended: number;
  readonly emails_sent: number;
}

export interface EventListFilters {
  event_type?: EventType;
  source?: EventSource;
}

export interface PaginationParams {
  limit: number;
  offset: number;
}

/** Append-only event log plus the read models derived from it. */
export interface EventStore {
  withExclusiveKey<T>(key: DedupKey, work: (session: IngestSession) => Promise<T>): Promise<T>;
  aggregate(window: StatsWindow): Promise<EventAggregates>;
  dailyBuckets(since: Date, timeZone: string): Promise<DailyBucket[]>;
  list(filters: EventListFilters, pagination: PaginationParams): Promise<SalesEvent[]>;
  countOlderThan(cutoff: Date): Promise<number>;
  deleteOlderThan(cutoff: Date): Promise<number>;
  ping(): Promise<boolean>;
}

export type RewardRulePatch = Partial<Omit<RewardRule, 'event_type'>>;

export interface RewardRuleRepository {
  findByEventType(eventType: EventType): Promise<RewardRule | undefined>;
  findAll(): Promise<RewardRule[]>;
  upsert(rule: RewardRule): Promise<RewardRule>;
  patch(eventType: EventType, patch: RewardRulePatch): Promise<RewardRule | undefined>;
}
