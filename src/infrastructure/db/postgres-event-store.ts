import { and, count, desc, eq, gte, lt, sql, type SQL } from 'drizzle-orm';
import type { EventType, SalesEvent } from '../../domain/index.js';
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
import type { Database } from './client.js';
import { eventLog, salesEvents } from './schema.js';

function countOf(eventType: EventType): SQL<number> {
  return sql<number>`count(*) filter (where ${salesEvents.event_type} = ${eventType})`.mapWith(Number);
}

function sumOf(column: typeof salesEvents.gold_value | typeof salesEvents.xp_value): SQL<number> {
  return sql<number>`coalesce(sum(${column}), 0)`.mapWith(Number);
}

function at(instant: Date): SQL {
  return sql`${instant.toISOString()}::timestamptz`;
}

/**
 * PostgreSQL-backed event store.
 *
 * Exclusive sessions run in a transaction holding a transaction-scoped
 * advisory lock on `hashtext(source:event_type)`, which closes the
 * check-then-insert race between concurrent deliveries of one key.
 */
export class PostgresEventStore implements EventStore {
  constructor(private readonly db: Database) {}

  async withExclusiveKey<T>(key: DedupKey, work: (session: IngestSession) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => {
      await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${`${key.source}:${key.event_type}`}))`);

      const session: IngestSession = {
        findRecent: async (since) => {
          const rows = await tx
            .select()
            .from(salesEvents)
            .where(and(
              eq(salesEvents.source, key.source),
              eq(salesEvents.event_type, key.event_type),
              gte(salesEvents.created_at, since),
            ))
            .orderBy(desc(salesEvents.created_at))
            .limit(1);
          return rows[0];
        },

        append: async (event) => {
          const [row] = await tx
            .insert(salesEvents)
            .values({
              source: event.source,
              event_type: event.event_type,
              gold_value: event.gold_value,
              xp_value: event.xp_value,
              metadata: event.metadata,
            })
            .returning();

          if (row === undefined) {
            throw new Error('Insert into sales_events returned no row');
          }

          await tx.insert(eventLog).values({
            event_id: row.event_id,
            action: 'created',
            details: { source: row.source, event_type: row.event_type },
          });

          return row;
        },
      };

      return work(session);
    });
  }

  /** Single-row aggregate over all events; built separately so its SQL can be inspected. */
  aggregateQuery(window: StatsWindow) {
    return this.db
      .select({
        total_gold: sumOf(salesEvents.gold_value),
        total_xp: sumOf(salesEvents.xp_value),
        total_events: count(),
        events_today: sql<number>`count(*) filter (where ${salesEvents.created_at} >= ${at(window.dayStart)} and ${salesEvents.created_at} < ${at(window.dayEnd)})`.mapWith(Number),
        calls_made: countOf('call_dial'),
        calls_connected: countOf('call_connect'),
        meetings_booked: countOf('meeting_booked'),
        weekly_meetings: sql<number>`count(*) filter (where ${salesEvents.event_type} = 'meeting_booked' and ${salesEvents.created_at} >= ${at(window.weekStart)})`.mapWith(Number),
      })
      .from(salesEvents);
  }

  async aggregate(window: StatsWindow): Promise<EventAggregates> {
    const rows = await this.aggregateQuery(window);
    const row = rows[0];
    return {
      total_gold: row?.total_gold ?? 0,
      total_xp: row?.total_xp ?? 0,
      total_events: row?.total_events ?? 0,
      events_today: row?.events_today ?? 0,
      calls_made: row?.calls_made ?? 0,
      calls_connected: row?.calls_connected ?? 0,
      meetings_booked: row?.meetings_booked ?? 0,
      weekly_meetings: row?.weekly_meetings ?? 0,
    };
  }

  dailyBucketsQuery(since: Date, timeZone: string) {
    const eventDate = sql<string>`to_char(${salesEvents.created_at} at time zone ${timeZone}, 'YYYY-MM-DD')`;

    return this.db
      .select({
        event_date: eventDate,
        total_events: count(),
        total_gold: sumOf(salesEvents.gold_value),
        total_xp: sumOf(salesEvents.xp_value),
        calls_made: countOf('call_dial'),
        calls_connected: countOf('call_connect'),
        meetings_booked: countOf('meeting_booked'),
        meetings_attended: countOf('meeting_attended'),
        emails_sent: countOf('email_sent'),
      })
      .from(salesEvents)
      .where(gte(salesEvents.created_at, since))
      // Ordinal: the zone is bound as a parameter, so repeating the
      // expression would not match the select list.
      .groupBy(sql`1`)
      .orderBy(sql`1 desc`);
  }

  async dailyBuckets(since: Date, timeZone: string): Promise<DailyBucket[]> {
    return this.dailyBucketsQuery(since, timeZone);
  }

  async list(filters: EventListFilters, pagination: PaginationParams): Promise<SalesEvent[]> {
    const conditions: SQL[] = [];

    if (filters.event_type !== undefined) {
      conditions.push(eq(salesEvents.event_type, filters.event_type));
    }
    if (filters.source !== undefined) {
      conditions.push(eq(salesEvents.source, filters.source));
    }

    const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

    return this.db
      .select()
      .from(salesEvents)
      .where(whereClause)
      .orderBy(desc(salesEvents.created_at))
      .limit(pagination.limit)
      .offset(pagination.offset);
  }

  async countOlderThan(cutoff: Date): Promise<number> {
    const rows = await this.db
      .select({ count: count() })
      .from(salesEvents)
      .where(lt(salesEvents.created_at, cutoff));
    return Number(rows[0]?.count ?? 0);
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const deleted = await this.db
      .delete(salesEvents)
      .where(lt(salesEvents.created_at, cutoff))
      .returning({ event_id: salesEvents.event_id });
    return deleted.length;
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.execute(sql`select 1`);
      return true;
    } catch {
      return false;
    }
  }
}
