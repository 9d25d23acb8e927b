import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ValidationError, isEventSource, isEventType } from '../../domain/index.js';
import type { EventSource, EventType } from '../../domain/index.js';
import { listEvents } from '../../application/index.js';
import type { EventStore, SecretVerifier } from '../../application/index.js';
import { requireSecret } from './auth.js';

export interface QueryRoutesOptions {
  events: EventStore;
  verifySecret: SecretVerifier;
}

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values.
 */
function safeInt(field: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new ValidationError(field, `${field} must be an integer`);
  }
  return n;
}

/**
 * Read-only event feed.
 *
 * GET /api/v1/events — newest first, filters `event_type` and `source`
 */
async function queryRoutes(fastify: FastifyInstance, opts: QueryRoutesOptions): Promise<void> {
  fastify.get<{
    Querystring: {
      limit?: string;
      offset?: string;
      event_type?: string;
      source?: string;
    };
  }>(
    '/api/v1/events',
    { onRequest: requireSecret(opts.verifySecret) },
    async (
      request: FastifyRequest<{
        Querystring: {
          limit?: string;
          offset?: string;
          event_type?: string;
          source?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      let eventType: EventType | undefined;
      if (q.event_type !== undefined) {
        if (!isEventType(q.event_type)) {
          throw new ValidationError('event_type', `Unknown event type: ${q.event_type}`);
        }
        eventType = q.event_type;
      }

      let source: EventSource | undefined;
      if (q.source !== undefined) {
        if (!isEventSource(q.source)) {
          throw new ValidationError('source', `Unknown source: ${q.source}`);
        }
        source = q.source;
      }

      const result = await listEvents(opts.events, {
        limit: safeInt('limit', q.limit),
        offset: safeInt('offset', q.offset),
        event_type: eventType,
        source,
      });

      return reply.status(200).send(result);
    },
  );
}

export default fp(queryRoutes, {
  name: 'query-routes',
  fastify: '5.x',
});
