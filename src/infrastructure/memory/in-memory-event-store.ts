import { randomUUID } from 'node:crypto';
import type { SalesEvent } from '../../domain/index.js';
import { localDate } from '../../application/calendar.js';
import type {
  DailyBucket,
  DedupKey,
  EventAggregates,
  EventListFilters,
  EventStore,
  IngestSession,
  PaginationParams,
  StatsWindow,
} from '../../application/index.js';

export interface AuditEntry {
  readonly event_id: string;
  readonly action: string;
  readonly details: Record<string, unknown>;
  readonly created_at: Date;
}

function emptyBucket(eventDate: string): DailyBucket {
  return {
    event_date: eventDate,
    total_events: 0,
    total_gold: 0,
    total_xp: 0,
    calls_made: 0,
    calls_connected: 0,
    meetings_booked: 0,
    meetings_attended: 0,
    emails_sent: 0,
  };
}

/**
 * Process-local event store.
 *
 * Used by the `memory` store driver and by tests. Sessions for the same
 * key are chained so they run one after another, mirroring the advisory
 * lock of the Postgres store. Timestamps come from the injected clock.
 */
export class InMemoryEventStore implements EventStore {
  private events: SalesEvent[] = [];
  private audit: AuditEntry[] = [];
  private readonly queues = new Map<string, Promise<void>>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  /** Current contents, oldest first. */
  all(): readonly SalesEvent[] {
    return this.events;
  }

  auditLog(): readonly AuditEntry[] {
    return this.audit;
  }

  async withExclusiveKey<T>(key: DedupKey, work: (session: IngestSession) => Promise<T>): Promise<T> {
    const queueKey = `${key.source}:${key.event_type}`;
    const previous = this.queues.get(queueKey) ?? Promise.resolve();

    const run = previous.then(() => work(this.session(key)));
    // The queue only orders sessions; failures reach the caller through `run`.
    const tail = run.then(() => undefined, () => undefined);
    this.queues.set(queueKey, tail);

    try {
      return await run;
    } finally {
      if (this.queues.get(queueKey) === tail) {
        this.queues.delete(queueKey);
      }
    }
  }

  private session(key: DedupKey): IngestSession {
    return {
      findRecent: async (since) => {
        let newest: SalesEvent | undefined;
        for (const event of this.events) {
          if (event.source !== key.source || event.event_type !== key.event_type) continue;
          if (event.created_at.getTime() < since.getTime()) continue;
          if (newest === undefined || event.created_at.getTime() >= newest.created_at.getTime()) {
            newest = event;
          }
        }
        return newest;
      },

      append: async (input) => {
        const event: SalesEvent = {
          event_id: randomUUID(),
          source: input.source,
          event_type: input.event_type,
          gold_value: input.gold_value,
          xp_value: input.xp_value,
          metadata: { ...input.metadata },
          created_at: this.now(),
        };
        this.events.push(event);
        this.audit.push({
          event_id: event.event_id,
          action: 'created',
          details: { source: event.source, event_type: event.event_type },
          created_at: event.created_at,
        });
        return event;
      },
    };
  }

  async aggregate(window: StatsWindow): Promise<EventAggregates> {
    const dayStart = window.dayStart.getTime();
    const dayEnd = window.dayEnd.getTime();
    const weekStart = window.weekStart.getTime();

    const result = {
      total_gold: 0,
      total_xp: 0,
      total_events: 0,
      events_today: 0,
      calls_made: 0,
      calls_connected: 0,
      meetings_booked: 0,
      weekly_meetings: 0,
    };

    for (const event of this.events) {
      const ts = event.created_at.getTime();
      result.total_gold += event.gold_value;
      result.total_xp += event.xp_value;
      result.total_events += 1;
      if (ts >= dayStart && ts < dayEnd) result.events_today += 1;
      if (event.event_type === 'call_dial') result.calls_made += 1;
      if (event.event_type === 'call_connect') result.calls_connected += 1;
      if (event.event_type === 'meeting_booked') {
        result.meetings_booked += 1;
        if (ts >= weekStart) result.weekly_meetings += 1;
      }
    }

    return result;
  }

  async dailyBuckets(since: Date, timeZone: string): Promise<DailyBucket[]> {
    const buckets = new Map<string, DailyBucket>();

    for (const event of this.events) {
      if (event.created_at.getTime() < since.getTime()) continue;

      const date = localDate(event.created_at, timeZone);
      const b = buckets.get(date) ?? emptyBucket(date);
      buckets.set(date, {
        ...b,
        total_events: b.total_events + 1,
        total_gold: b.total_gold + event.gold_value,
        total_xp: b.total_xp + event.xp_value,
        calls_made: b.calls_made + (event.event_type === 'call_dial' ? 1 : 0),
        calls_connected: b.calls_connected + (event.event_type === 'call_connect' ? 1 : 0),
        meetings_booked: b.meetings_booked + (event.event_type === 'meeting_booked' ? 1 : 0),
        meetings_attended: b.meetings_attended + (event.event_type === 'meeting_attended' ? 1 : 0),
        emails_sent: b.emails_sent + (event.event_type === 'email_sent' ? 1 : 0),
      });
    }

    return [...buckets.values()].sort((a, b) => b.event_date.localeCompare(a.event_date));
  }

  async list(filters: EventListFilters, pagination: PaginationParams): Promise<SalesEvent[]> {
    return [...this.events]
      .reverse()
      .filter((e) => filters.event_type === undefined || e.event_type === filters.event_type)
      .filter((e) => filters.source === undefined || e.source === filters.source)
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .slice(pagination.offset, pagination.offset + pagination.limit);
  }

  async countOlderThan(cutoff: Date): Promise<number> {
    return this.events.filter((e) => e.created_at.getTime() < cutoff.getTime()).length;
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const keep = this.events.filter((e) => e.created_at.getTime() >= cutoff.getTime());
    const deleted = this.events.length - keep.length;
    const kept = new Set(keep.map((e) => e.event_id));

    this.events = keep;
    this.audit = this.audit.filter((entry) => kept.has(entry.event_id));
    return deleted;
  }

  async ping(): Promise<boolean> {
    return true;
  }
}
