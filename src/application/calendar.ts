import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import timezone from 'dayjs/plugin/timezone.js';
import type { StatsWindow } from './ports.js';

dayjs.extend(utc);
dayjs.extend(timezone);

export const WEEK_STARTS = ['monday', 'sunday'] as const;
export type WeekStart = (typeof WEEK_STARTS)[number];

const WEEK_START_DAY: Record<WeekStart, number> = { sunday: 0, monday: 1 };

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/** Calendar date (YYYY-MM-DD) of `instant` as seen in `timeZone`. */
export function localDate(instant: Date, timeZone: string): string {
  return dayjs(instant).tz(timeZone).format('YYYY-MM-DD');
}

/**
 * Shifts a calendar date by whole days.
 *
 * Done on the UTC calendar so DST transitions in the target zone
 * cannot skew the result.
 */
export function shiftDate(date: string, days: number): string {
  return dayjs.utc(date).add(days, 'day').format('YYYY-MM-DD');
}

/** Instant of local midnight starting `date` in `timeZone`. */
export function startOfLocalDay(date: string, timeZone: string): Date {
  return dayjs.tz(date, timeZone).toDate();
}

/**
 * Resolves today's bounds and the start of the current week.
 *
 * `dayEnd` is exclusive. The week begins at local midnight of the
 * most recent `weekStart` day, which is today when today is that day.
 */
export function statsWindow(now: Date, timeZone: string, weekStart: WeekStart): StatsWindow {
  const today = localDate(now, timeZone);
  const weekday = dayjs.utc(today).day();
  const daysIntoWeek = (weekday - WEEK_START_DAY[weekStart] + 7) % 7;

  return {
    dayStart: startOfLocalDay(today, timeZone),
    dayEnd: startOfLocalDay(shiftDate(today, 1), timeZone),
    weekStart: startOfLocalDay(shiftDate(today, -daysIntoWeek), timeZone),
  };
}
