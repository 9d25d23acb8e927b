import { createHash, timingSafeEqual } from 'node:crypto';

/** Checks a presented credential against the configured shared secret. */
export type SecretVerifier = (candidate: string | undefined) => boolean;

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Returns a constant-time verifier bound to `secret`.
 *
 * Both sides are hashed first so `timingSafeEqual` always compares
 * equal-length buffers and the secret's length does not leak.
 */
export function createSecretVerifier(secret: string): SecretVerifier {
  const expected = digest(secret);
  return (candidate) => {
    if (candidate === undefined) return false;
    return timingSafeEqual(digest(candidate), expected);
  };
}
