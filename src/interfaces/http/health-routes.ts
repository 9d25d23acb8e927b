import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { EventStore } from '../../application/index.js';
import type { RateLimitHook } from '../../infrastructure/index.js';

export type DependencyStatus = 'connected' | 'disconnected' | 'disabled';

export interface HealthBody {
  status: 'healthy' | 'degraded' | 'unhealthy';
  database: DependencyStatus;
  redis: DependencyStatus;
  timestamp: string;
  version: string;
}

export interface HealthRoutesOptions {
  events: EventStore;
  version: string;
  /** Omitted when Redis is not configured. */
  pingRedis?: () => Promise<boolean>;
  rateLimit?: RateLimitHook;
  now?: () => Date;
}

async function probe(check: () => Promise<boolean>): Promise<DependencyStatus> {
  try {
    return (await check()) ? 'connected' : 'disconnected';
  } catch {
    return 'disconnected';
  }
}

/**
 * GET /api/v1/health — 503 when the database is unreachable, 200
 * otherwise. A Redis outage only degrades the status.
 */
async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {
  const now = opts.now ?? (() => new Date());

  fastify.get(
    '/api/v1/health',
    { onRequest: opts.rateLimit === undefined ? [] : [opts.rateLimit] },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const database = await probe(() => opts.events.ping());
      const redis = opts.pingRedis === undefined ? 'disabled' : await probe(opts.pingRedis);

      let status: HealthBody['status'] = 'healthy';
      if (database !== 'connected') status = 'unhealthy';
      else if (redis === 'disconnected') status = 'degraded';

      const body: HealthBody = {
        status,
        database,
        redis,
        timestamp: now().toISOString(),
        version: opts.version,
      };

      return reply.status(database === 'connected' ? 200 : 503).send(body);
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
