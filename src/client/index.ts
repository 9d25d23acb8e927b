export { createStatsClient, pollStats, DEFAULT_POLL_INTERVAL_MS } from './stats-client.js';
export type {
  StatsClient,
  StatsClientOptions,
  StatsSnapshot,
  DailyRow,
  HealthSnapshot,
  PollStatsOptions,
} from './stats-client.js';
