import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { IngestionService, SecretVerifier } from '../../application/index.js';
import type { RateLimitHook } from '../../infrastructure/index.js';
import { requireSecret, secretFrom } from './auth.js';

export interface WebhookRoutesOptions {
  ingestion: IngestionService;
  verifySecret: SecretVerifier;
  rateLimit?: RateLimitHook;
}

/**
 * Registers the webhook ingestion route.
 *
 * POST /api/v1/webhook/ingest — 201 for a new event, 200 for a
 * suppressed duplicate. The secret is checked in `onRequest`, before
 * the body is read, and again by the ingestion service.
 */
async function webhookRoutes(fastify: FastifyInstance, opts: WebhookRoutesOptions): Promise<void> {
  const authenticated = requireSecret(opts.verifySecret);
  const onRequest = opts.rateLimit === undefined ? [authenticated] : [opts.rateLimit, authenticated];

  fastify.post<{ Body: unknown }>(
    '/api/v1/webhook/ingest',
    { onRequest },
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const result = await opts.ingestion.ingest(secretFrom(request), request.body);
      return reply.status(result.duplicate ? 200 : 201).send(result);
    },
  );
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  fastify: '5.x',
});
