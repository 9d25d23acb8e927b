import { z } from 'zod';
import { EVENT_SOURCES, EVENT_TYPES } from './domain/index.js';
import type { EventSource, EventType } from './domain/index.js';
import { WEEK_STARTS, isValidTimeZone } from './application/calendar.js';

/**
 * Parses a comma-separated list restricted to `allowed`.
 * An unset or blank value means every allowed entry.
 */
function commaList<T extends string>(allowed: readonly [T, ...T[]], name: string) {
  return z
    .string()
    .optional()
    .transform((raw, ctx): T[] => {
      if (raw === undefined || raw.trim() === '') return [...allowed];

      const items = raw.split(',').map((s) => s.trim()).filter((s) => s !== '');
      const result: T[] = [];
      for (const item of items) {
        const match = allowed.find((candidate) => candidate === item);
        if (match === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown ${name}: ${item}. Allowed: ${allowed.join(', ')}`,
          });
          return z.NEVER;
        }
        if (!result.includes(match)) result.push(match);
      }
      return result;
    });
}

export const ConfigSchema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),

  // Auth
  WEBHOOK_SECRET: z
    .string({ required_error: 'WEBHOOK_SECRET is required' })
    .min(32, 'WEBHOOK_SECRET must be at least 32 characters'),

  // Storage
  STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().optional(),
  REDIS_URL: z.string().optional(),

  // Ingestion
  DEDUP_WINDOW_MINUTES: z.coerce.number().min(0).default(5),
  METADATA_MAX_CHARS: z.coerce.number().int().min(2).default(5000),
  ALLOWED_SOURCES: commaList<EventSource>(EVENT_SOURCES, 'source'),
  ALLOWED_EVENT_TYPES: commaList<EventType>(EVENT_TYPES, 'event type'),

  // Progression
  XP_PER_LEVEL: z.coerce.number().int().min(1).default(1000),
  TIME_ZONE: z
    .string()
    .default('UTC')
    .refine(isValidTimeZone, { message: 'TIME_ZONE must be a valid IANA time zone' }),
  WEEK_START: z.enum(WEEK_STARTS).default('monday'),

  // Rate limiting
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).default(60),

  // Retention
  RETENTION_DAYS: z.coerce.number().int().min(1).default(90),
}).superRefine((config, ctx) => {
  if (config.STORE_DRIVER === 'postgres' && (config.DATABASE_URL === undefined || config.DATABASE_URL === '')) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DATABASE_URL'],
      message: 'DATABASE_URL is required when STORE_DRIVER=postgres',
    });
  }
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Loads and validates configuration from environment variables.
 *
 * Throws one error listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const lines = parsed.error.issues.map((issue) => {
      const key = issue.path.length > 0 ? issue.path.join('.') : 'config';
      return `  ${key}: ${issue.message}`;
    });
    throw new Error(`Invalid configuration:\n${lines.join('\n')}`);
  }
  return parsed.data;
}
