import { z } from 'zod';
import type { EventSource, EventType } from '../domain/index.js';
import { EVENT_SOURCES, EVENT_TYPES, ValidationError, isOneOf } from '../domain/index.js';

export const DEFAULT_METADATA_MAX_CHARS = 5000;

export interface IngestSchemaOptions {
  allowedSources?: readonly EventSource[];
  allowedEventTypes?: readonly EventType[];
  metadataMaxChars?: number;
}

/**
 * Builds the Zod schema for an inbound webhook body.
 *
 * `metadata` may be omitted or null; both become `{}`. Its JSON
 * serialization is capped at `metadataMaxChars` code points.
 */
export function createIngestSchema(options: IngestSchemaOptions = {}) {
  const sources = options.allowedSources ?? EVENT_SOURCES;
  const eventTypes = options.allowedEventTypes ?? EVENT_TYPES;
  const maxChars = options.metadataMaxChars ?? DEFAULT_METADATA_MAX_CHARS;

  return z.object({
    source: z.string().refine(
      (value): value is EventSource => isOneOf(sources, value),
      (value) => ({ message: `Unknown source: ${value}. Allowed sources: ${sources.join(', ')}` }),
    ),
    event_type: z.string().refine(
      (value): value is EventType => isOneOf(eventTypes, value),
      (value) => ({ message: `Unknown event type: ${value}. Allowed types: ${eventTypes.join(', ')}` }),
    ),
    metadata: z
      .record(z.string(), z.unknown())
      .nullish()
      .transform((value) => value ?? {})
      .refine(
        (value) => [...JSON.stringify(value)].length <= maxChars,
        { message: `Metadata too large (max ${maxChars} characters)` },
      ),
  });
}

export type IngestSchema = ReturnType<typeof createIngestSchema>;
export type IngestPayload = z.output<IngestSchema>;

/**
 * Converts the first Zod issue into a ValidationError naming the field.
 * Issues without a path concern the body as a whole.
 */
export function toValidationError(error: z.ZodError): ValidationError {
  const issue = error.issues[0];
  if (issue === undefined) {
    return new ValidationError('body', 'Invalid request body');
  }
  const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
  return new ValidationError(field, issue.message);
}
