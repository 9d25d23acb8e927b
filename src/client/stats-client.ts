/* ------------------------------------------------------------------ */
/*  Stats client: thin fetch wrapper for dashboards and HUD overlays   */
/*                                                                     */
/*  Responses are parsed with Zod; a shape mismatch throws.            */
/* ------------------------------------------------------------------ */

import { z } from 'zod';

const currentStatsSchema = z.object({
  total_gold: z.number(),
  total_xp: z.number(),
  current_level: z.number(),
  xp_in_current_level: z.number(),
  xp_to_next_level: z.number(),
  events_today: z.number(),
  total_events: z.number(),
  rank: z.string(),
  calls_made: z.number(),
  calls_connected: z.number(),
  meetings_booked: z.number(),
});

const dailyRowSchema = z.object({
  event_date: z.string(),
  total_events: z.number(),
  total_gold: z.number(),
  total_xp: z.number(),
  calls_made: z.number(),
  calls_connected: z.number(),
  meetings_booked: z.number(),
  meetings_attended: z.number(),
  emails_sent: z.number(),
  connect_rate_pct: z.number(),
  booking_rate_pct: z.number(),
});

const dailyResponseSchema = z.object({
  days: z.number(),
  data: z.array(dailyRowSchema),
});

const dependencyStatus = z.enum(['connected', 'disconnected', 'disabled']);

const healthSchema = z.object({
  status: z.enum(['healthy', 'degraded', 'unhealthy']),
  database: dependencyStatus,
  redis: dependencyStatus,
  timestamp: z.string(),
  version: z.string(),
});

export type StatsSnapshot = z.infer<typeof currentStatsSchema>;
export type DailyRow = z.infer<typeof dailyRowSchema>;
export type HealthSnapshot = z.infer<typeof healthSchema>;

export interface StatsClientOptions {
  /** Server origin, e.g. `http://localhost:3000`. */
  baseUrl: string;
}

export interface StatsClient {
  currentStats(): Promise<StatsSnapshot>;
  dailyPerformance(days?: number): Promise<DailyRow[]>;
  /** Resolves for 503 as well; the body says what is down. */
  health(): Promise<HealthSnapshot>;
}

export function createStatsClient(options: StatsClientOptions): StatsClient {
  const base = `${options.baseUrl.replace(/\/+$/, '')}/api/v1`;

  async function get<T>(path: string, schema: z.ZodType<T>, acceptStatus: readonly number[] = []): Promise<T> {
    const res = await fetch(`${base}${path}`);
    if (!res.ok && !acceptStatus.includes(res.status)) {
      throw new Error(`API ${res.status}: ${res.statusText}`);
    }
    return schema.parse(await res.json());
  }

  return {
    currentStats: () => get('/stats/current', currentStatsSchema),
    dailyPerformance: async (days?: number) => {
      const q = days === undefined ? '' : `?days=${days}`;
      const body = await get(`/stats/daily${q}`, dailyResponseSchema);
      return body.data;
    },
    health: () => get('/health', healthSchema, [503]),
  };
}

export const DEFAULT_POLL_INTERVAL_MS = 5_000;

export interface PollStatsOptions {
  intervalMs?: number;
  onStats: (stats: StatsSnapshot) => void;
  /** Without it the first failure rejects the returned promise. */
  onError?: (err: unknown) => void;
  signal?: AbortSignal;
}

function sleep(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted === true) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Fetches current stats immediately, then every `intervalMs`, until
 * `signal` aborts. Resolves once polling has stopped.
 */
export async function pollStats(client: StatsClient, options: PollStatsOptions): Promise<void> {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const { signal } = options;

  while (signal?.aborted !== true) {
    try {
      const stats = await client.currentStats();
      if (signal?.aborted === true) return;
      options.onStats(stats);
    } catch (err: unknown) {
      if (options.onError === undefined) throw err;
      options.onError(err);
    }
    await sleep(intervalMs, signal);
  }
}
