import { readFileSync } from 'node:fs';
import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import { DEFAULT_REWARD_RULES } from './domain/index.js';
import {
  IngestionService,
  StatsService,
  createSecretVerifier,
} from './application/index.js';
import type { EventStore, RewardRuleRepository } from './application/index.js';
import {
  InMemoryEventStore,
  InMemoryRewardRuleRepository,
  MemoryRateLimitStore,
  PostgresEventStore,
  PostgresRewardRuleRepository,
  RedisRateLimitStore,
  createRateLimitHook,
  dbPlugin,
  redisPlugin,
} from './infrastructure/index.js';
import type { RateLimitStore } from './infrastructure/index.js';
import {
  healthRoutes,
  queryRoutes,
  registerErrorHandler,
  ruleRoutes,
  statsRoutes,
  webhookRoutes,
} from './interfaces/http/index.js';

export const SERVICE_NAME = 'quota-quest';

const STATS_LIMIT_PER_MINUTE = 120;
const HEALTH_LIMIT_PER_MINUTE = 100;

/** Version from package.json, which sits one level above both src/ and dist/. */
export const SERVICE_VERSION = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))).version;

export interface BuildServerOptions {
  /** Overrides the store selected by `STORE_DRIVER`. */
  events?: EventStore;
  rules?: RewardRuleRepository;
  /** Overrides the Redis or in-memory counter selected by `REDIS_URL`. */
  rateLimitStore?: RateLimitStore;
  logger?: FastifyServerOptions['logger'];
  now?: () => Date;
}

interface Storage {
  events: EventStore;
  rules: RewardRuleRepository;
}

async function resolveStorage(
  fastify: FastifyInstance,
  config: AppConfig,
  options: BuildServerOptions,
  now: () => Date,
): Promise<Storage> {
  if (options.events !== undefined && options.rules !== undefined) {
    return { events: options.events, rules: options.rules };
  }

  if (config.STORE_DRIVER === 'memory') {
    fastify.log.warn('Using in-memory store; events are lost on restart');
    return {
      events: options.events ?? new InMemoryEventStore(now),
      rules: options.rules ?? new InMemoryRewardRuleRepository(),
    };
  }

  if (config.DATABASE_URL === undefined) {
    throw new Error('DATABASE_URL is required when STORE_DRIVER=postgres');
  }

  await fastify.register(dbPlugin, {
    databaseUrl: config.DATABASE_URL,
    seedRules: DEFAULT_REWARD_RULES,
  });

  return {
    events: options.events ?? new PostgresEventStore(fastify.db),
    rules: options.rules ?? new PostgresRewardRuleRepository(fastify.db),
  };
}

/**
 * Builds the HTTP server without listening.
 *
 * Order:
 * 1) Error handler
 * 2) Infrastructure plugins (db, redis) as configured
 * 3) Services
 * 4) HTTP routes
 */
export async function buildServer(
  config: AppConfig,
  options: BuildServerOptions = {},
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? { level: config.LOG_LEVEL },
  });

  registerErrorHandler(fastify);

  const now = options.now ?? (() => new Date());
  const { events, rules } = await resolveStorage(fastify, config, options, now);

  // --------------------------------------------------
  // Rate limiting
  // --------------------------------------------------

  let redisStore: RateLimitStore | undefined;
  let pingRedis: (() => Promise<boolean>) | undefined;

  if (config.REDIS_URL !== undefined && config.REDIS_URL !== '') {
    await fastify.register(redisPlugin, { url: config.REDIS_URL });
    const redis = fastify.redis;
    redisStore = new RedisRateLimitStore(redis);
    pingRedis = async () => (await redis.ping()) === 'PONG';
  }

  const rateLimitStore = options.rateLimitStore ?? redisStore ?? new MemoryRateLimitStore();
  const limiterClock = () => now().getTime();
  const limiter = (scope: string, limit: number) =>
    createRateLimitHook(rateLimitStore, { scope, limit, now: limiterClock });

  // --------------------------------------------------
  // Services
  // --------------------------------------------------

  const verifySecret = createSecretVerifier(config.WEBHOOK_SECRET);

  const ingestion = new IngestionService(
    { events, rules, verifySecret, log: fastify.log, now },
    {
      dedupWindowMinutes: config.DEDUP_WINDOW_MINUTES,
      allowedSources: config.ALLOWED_SOURCES,
      allowedEventTypes: config.ALLOWED_EVENT_TYPES,
      metadataMaxChars: config.METADATA_MAX_CHARS,
    },
  );

  const stats = new StatsService(
    events,
    {
      xpPerLevel: config.XP_PER_LEVEL,
      timeZone: config.TIME_ZONE,
      weekStart: config.WEEK_START,
    },
    now,
  );

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(webhookRoutes, {
    ingestion,
    verifySecret,
    rateLimit: limiter('webhook', config.RATE_LIMIT_PER_MINUTE),
  });
  await fastify.register(statsRoutes, {
    stats,
    rateLimit: limiter('stats', STATS_LIMIT_PER_MINUTE),
  });
  await fastify.register(queryRoutes, { events, verifySecret });
  await fastify.register(ruleRoutes, { rules, verifySecret });
  await fastify.register(healthRoutes, {
    events,
    version: SERVICE_VERSION,
    pingRedis,
    rateLimit: limiter('health', HEALTH_LIMIT_PER_MINUTE),
    now,
  });

  fastify.get('/', async () => ({
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    status: 'running',
    endpoints: {
      webhook: '/api/v1/webhook/ingest',
      stats: '/api/v1/stats/current',
      daily: '/api/v1/stats/daily',
      events: '/api/v1/events',
      rules: '/api/v1/rules',
      health: '/api/v1/health',
    },
  }));

  return fastify;
}
