import { describe, it, expect } from 'vitest';
import { createIngestSchema, toValidationError } from '../../src/application/index.js';
import { ValidationError } from '../../src/domain/index.js';

function validationErrorFor(schema: ReturnType<typeof createIngestSchema>, payload: unknown): ValidationError {
  const parsed = schema.safeParse(payload);
  if (parsed.success) throw new Error('expected payload to be rejected');
  return toValidationError(parsed.error);
}

describe('createIngestSchema', () => {
  const schema = createIngestSchema();

  it('defaults missing or null metadata to an empty object', () => {
    expect(schema.parse({ source: 'outreach', event_type: 'call_dial' })).toEqual({
      source: 'outreach',
      event_type: 'call_dial',
      metadata: {},
    });
    expect(schema.parse({ source: 'nooks', event_type: 'call_connect', metadata: null }).metadata).toEqual({});
  });

  it('keeps provided metadata', () => {
    const parsed = schema.parse({ source: 'zapier', event_type: 'meeting_booked', metadata: { lead_id: 'L-1' } });
    expect(parsed.metadata).toEqual({ lead_id: 'L-1' });
  });

  it('names the field and the allowed values for an unknown source', () => {
    const err = validationErrorFor(schema, { source: 'hubspot', event_type: 'call_dial' });
    expect(err.field).toBe('source');
    expect(err.message).toBe('Unknown source: hubspot. Allowed sources: outreach, nooks, manual, zapier');
  });

  it('reports a missing event type on its field', () => {
    const err = validationErrorFor(schema, { source: 'manual' });
    expect(err.field).toBe('event_type');
  });

  it('rejects metadata that is not an object', () => {
    expect(validationErrorFor(schema, { source: 'manual', event_type: 'email_sent', metadata: 'x' }).field).toBe('metadata');
  });

  it('attributes a non-object body to the body', () => {
    const err = validationErrorFor(schema, 'nope');
    expect(err.field).toBe('body');
  });

  it('restricts to the configured event types', () => {
    const restricted = createIngestSchema({ allowedEventTypes: ['call_dial'] });
    const err = validationErrorFor(restricted, { source: 'manual', event_type: 'email_sent' });
    expect(err.message).toBe('Unknown event type: email_sent. Allowed types: call_dial');
  });

  it('caps serialized metadata size', () => {
    const small = createIngestSchema({ metadataMaxChars: 20 });
    // {"note":"xxxxxxxxxxxx"} is 23 characters
    const err = validationErrorFor(small, { source: 'manual', event_type: 'call_dial', metadata: { note: 'x'.repeat(12) } });
    expect(err.field).toBe('metadata');
    expect(err.message).toBe('Metadata too large (max 20 characters)');

    // {"note":"xxxxxxxxx"} is exactly 20
    expect(small.safeParse({ source: 'manual', event_type: 'call_dial', metadata: { note: 'x'.repeat(9) } }).success).toBe(true);
  });

  it('counts metadata size in code points', () => {
    const small = createIngestSchema({ metadataMaxChars: 20 });
    // nine astral characters: 20 code points, 29 UTF-16 units
    const fits = small.safeParse({ source: 'manual', event_type: 'call_dial', metadata: { note: '\u{1F4DE}'.repeat(9) } });
    expect(fits.success).toBe(true);

    const err = validationErrorFor(small, { source: 'manual', event_type: 'call_dial', metadata: { note: '\u{1F4DE}'.repeat(10) } });
    expect(err.field).toBe('metadata');
  });
});
