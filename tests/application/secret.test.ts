import { describe, it, expect } from 'vitest';
import { createSecretVerifier } from '../../src/application/index.js';

describe('createSecretVerifier', () => {
  const verify = createSecretVerifier('test-secret');

  it('accepts the exact secret', () => {
    expect(verify('test-secret')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(verify(undefined)).toBe(false);
    expect(verify('')).toBe(false);
    expect(verify('test-secre')).toBe(false);
    expect(verify('test-secret ')).toBe(false);
    expect(verify('TEST-SECRET')).toBe(false);
  });
});
