import type { FastifyInstance } from 'fastify';
import { RateLimitedError, ValidationError, isAppError } from '../../domain/index.js';

export interface ErrorBody {
  error: string;
  code: string;
  field?: string;
}

/**
 * Maps errors to the `{ error, code, field? }` body.
 *
 * Domain errors keep their own status and code. Fastify's client errors
 * (malformed JSON, unsupported content type, oversized body) keep their
 * status and are reported as VALIDATION_ERROR on `body`. Anything else
 * is a logged 500 whose message does not leak internals.
 */
export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error, request, reply) => {
    if (isAppError(error)) {
      const body: ErrorBody = { error: error.message, code: error.code };

      if (error instanceof ValidationError) {
        body.field = error.field;
      } else if (error instanceof RateLimitedError) {
        reply.header('retry-after', String(error.retryAfterSeconds));
      } else if (error.code === 'INTERNAL_ERROR') {
        request.log.error({ err: error.cause ?? error }, error.message);
      }

      return reply.status(error.statusCode).send(body);
    }

    if (typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
      const body: ErrorBody = { error: error.message, code: 'VALIDATION_ERROR', field: 'body' };
      return reply.status(error.statusCode).send(body);
    }

    request.log.error({ err: error }, 'Unhandled error');
    const body: ErrorBody = { error: 'Internal server error', code: 'INTERNAL_ERROR' };
    return reply.status(500).send(body);
  });

  fastify.setNotFoundHandler((request, reply) => {
    const body: ErrorBody = { error: `Route ${request.method} ${request.url} not found`, code: 'NOT_FOUND' };
    return reply.status(404).send(body);
  });
}
