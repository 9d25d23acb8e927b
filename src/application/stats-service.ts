import { DEFAULT_RANK_TIERS, DEFAULT_XP_PER_LEVEL, levelFromXp, rankForMeetings } from '../domain/index.js';
import { shiftDate, localDate, startOfLocalDay, statsWindow } from './calendar.js';
import type { WeekStart } from './calendar.js';
import type { DailyBucket, EventStore } from './ports.js';

export interface CurrentStats {
  total_gold: number;
  total_xp: number;
  current_level: number;
  xp_in_current_level: number;
  xp_to_next_level: number;
  events_today: number;
  total_events: number;
  rank: string;
  calls_made: number;
  calls_connected: number;
  meetings_booked: number;
}

export interface DailyPerformance extends DailyBucket {
  connect_rate_pct: number;
  booking_rate_pct: number;
}

export interface StatsOptions {
  xpPerLevel?: number;
  timeZone?: string;
  weekStart?: WeekStart;
  rankTiers?: readonly [string, ...string[]];
}

export const DEFAULT_DAILY_DAYS = 7;
export const MAX_DAILY_DAYS = 90;

/** Percentage rounded to two decimals; 0 when the denominator is 0. */
export function ratePct(numerator: number, denominator: number): number {
  if (denominator <= 0) return 0;
  return Math.round((numerator / denominator) * 10_000) / 100;
}

/**
 * Derived player state, recomputed from the event store on every read.
 *
 * Level comes from lifetime XP; rank from meetings booked since the
 * start of the current week. The two are independent.
 */
export class StatsService {
  private readonly xpPerLevel: number;
  private readonly timeZone: string;
  private readonly weekStart: WeekStart;
  private readonly rankTiers: readonly [string, ...string[]];

  constructor(
    private readonly events: EventStore,
    options: StatsOptions = {},
    private readonly now: () => Date = () => new Date(),
  ) {
    this.xpPerLevel = options.xpPerLevel ?? DEFAULT_XP_PER_LEVEL;
    this.timeZone = options.timeZone ?? 'UTC';
    this.weekStart = options.weekStart ?? 'monday';
    this.rankTiers = options.rankTiers ?? DEFAULT_RANK_TIERS;
  }

  async currentStats(at: Date = this.now()): Promise<CurrentStats> {
    const agg = await this.events.aggregate(statsWindow(at, this.timeZone, this.weekStart));
    const level = levelFromXp(agg.total_xp, this.xpPerLevel);

    return {
      total_gold: agg.total_gold,
      total_xp: agg.total_xp,
      current_level: level.current_level,
      xp_in_current_level: level.xp_in_current_level,
      xp_to_next_level: level.xp_to_next_level,
      events_today: agg.events_today,
      total_events: agg.total_events,
      rank: rankForMeetings(agg.weekly_meetings, this.rankTiers),
      calls_made: agg.calls_made,
      calls_connected: agg.calls_connected,
      meetings_booked: agg.meetings_booked,
    };
  }

  /**
   * Per-day performance for today and the previous `days - 1` days,
   * newest first. Days without events are omitted.
   */
  async dailyPerformance(
    days: number = DEFAULT_DAILY_DAYS,
    at: Date = this.now(),
  ): Promise<DailyPerformance[]> {
    const span = Math.min(Math.max(Math.floor(days), 1), MAX_DAILY_DAYS);
    const firstDay = shiftDate(localDate(at, this.timeZone), -(span - 1));
    const buckets = await this.events.dailyBuckets(startOfLocalDay(firstDay, this.timeZone), this.timeZone);

    return [...buckets]
      .sort((a, b) => b.event_date.localeCompare(a.event_date))
      .map((bucket) => ({
        ...bucket,
        connect_rate_pct: ratePct(bucket.calls_connected, bucket.calls_made),
        booking_rate_pct: ratePct(bucket.meetings_booked, bucket.calls_connected),
      }));
  }
}
