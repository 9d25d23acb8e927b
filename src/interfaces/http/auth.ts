import type { FastifyReply, FastifyRequest } from 'fastify';
import { UnauthorizedError } from '../../domain/index.js';
import type { SecretVerifier } from '../../application/index.js';

/** Header carrying the shared webhook secret. */
export const SECRET_HEADER = 'x-webhook-secret';

/** Reads the secret header; repeated headers count as missing. */
export function secretFrom(request: FastifyRequest): string | undefined {
  const value = request.headers[SECRET_HEADER];
  return typeof value === 'string' ? value : undefined;
}

/** `onRequest` hook rejecting requests without the shared secret. */
export function requireSecret(verify: SecretVerifier) {
  return async (request: FastifyRequest, _reply: FastifyReply): Promise<void> => {
    if (!verify(secretFrom(request))) {
      throw new UnauthorizedError();
    }
  };
}
