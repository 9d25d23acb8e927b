import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ValidationError } from '../../domain/index.js';
import { DEFAULT_DAILY_DAYS, MAX_DAILY_DAYS } from '../../application/index.js';
import type { StatsService } from '../../application/index.js';
import type { RateLimitHook } from '../../infrastructure/index.js';

export interface StatsRoutesOptions {
  stats: StatsService;
  rateLimit?: RateLimitHook;
}

/**
 * Read-only stats routes consumed by dashboards.
 *
 * GET /api/v1/stats/current — derived player state
 * GET /api/v1/stats/daily   — per-day performance, `days` in [1, 90]
 */
async function statsRoutes(fastify: FastifyInstance, opts: StatsRoutesOptions): Promise<void> {
  const onRequest = opts.rateLimit === undefined ? [] : [opts.rateLimit];

  fastify.get(
    '/api/v1/stats/current',
    { onRequest },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const stats = await opts.stats.currentStats();
      return reply.status(200).send(stats);
    },
  );

  fastify.get<{ Querystring: { days?: string } }>(
    '/api/v1/stats/daily',
    { onRequest },
    async (
      request: FastifyRequest<{ Querystring: { days?: string } }>,
      reply: FastifyReply,
    ) => {
      let days = DEFAULT_DAILY_DAYS;
      if (request.query.days !== undefined) {
        const n = Number(request.query.days);
        if (!Number.isInteger(n) || n < 1 || n > MAX_DAILY_DAYS) {
          throw new ValidationError('days', `days must be an integer between 1 and ${MAX_DAILY_DAYS}`);
        }
        days = n;
      }

      fastify.log.debug({ days }, 'Daily stats requested');

      const rows = await opts.stats.dailyPerformance(days);
      return reply.status(200).send({ days, data: rows });
    },
  );
}

export default fp(statsRoutes, {
  name: 'stats-routes',
  fastify: '5.x',
});
