import type { BaseLogger } from 'pino';
import type { EventSource, EventType } from '../domain/index.js';
import {
  ConfigurationError,
  InternalError,
  UnauthorizedError,
  isAppError,
} from '../domain/index.js';
import { createIngestSchema, toValidationError } from './ingest-schema.js';
import type { IngestSchema } from './ingest-schema.js';
import type { EventStore, RewardRuleRepository } from './ports.js';
import type { SecretVerifier } from './secret.js';

export const DEFAULT_DEDUP_WINDOW_MINUTES = 5;

export interface IngestResult {
  status: 'success';
  event_id: string;
  gold_earned: number;
  xp_earned: number;
  message: string;
  duplicate: boolean;
}

export interface IngestionServiceDeps {
  events: EventStore;
  rules: RewardRuleRepository;
  verifySecret: SecretVerifier;
  log: BaseLogger;
  now?: () => Date;
}

export interface IngestionServiceOptions {
  dedupWindowMinutes?: number;
  allowedSources?: readonly EventSource[];
  allowedEventTypes?: readonly EventType[];
  metadataMaxChars?: number;
}

/**
 * Turns webhook payloads into persisted, rewarded events.
 *
 * Order per call: credential → validation → duplicate check → rule
 * lookup → insert. The duplicate check and insert run inside one
 * exclusive session for the (source, event_type) key, so concurrent
 * replays of the same key cannot both insert.
 */
export class IngestionService {
  private readonly schema: IngestSchema;
  private readonly dedupWindowMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly deps: IngestionServiceDeps,
    options: IngestionServiceOptions = {},
  ) {
    this.schema = createIngestSchema(options);
    this.dedupWindowMs = (options.dedupWindowMinutes ?? DEFAULT_DEDUP_WINDOW_MINUTES) * 60_000;
    this.now = deps.now ?? (() => new Date());
  }

  async ingest(secret: string | undefined, payload: unknown): Promise<IngestResult> {
    if (!this.deps.verifySecret(secret)) {
      throw new UnauthorizedError();
    }

    const parsed = this.schema.safeParse(payload);
    if (!parsed.success) {
      throw toValidationError(parsed.error);
    }

    const { source, event_type, metadata } = parsed.data;
    const { events, rules, log } = this.deps;

    try {
      return await events.withExclusiveKey<IngestResult>({ source, event_type }, async (session) => {
        const since = new Date(this.now().getTime() - this.dedupWindowMs);
        const existing = await session.findRecent(since);

        if (existing !== undefined) {
          log.info(
            { event_id: existing.event_id, source, event_type },
            'Duplicate event ignored',
          );
          return {
            status: 'success',
            event_id: existing.event_id,
            gold_earned: 0,
            xp_earned: 0,
            message: 'Duplicate event ignored (idempotency check)',
            duplicate: true,
          };
        }

        const rule = await rules.findByEventType(event_type);
        if (rule === undefined) {
          log.error({ event_type }, 'No reward rule configured for event type');
          throw new ConfigurationError(`No reward rule configured for event type: ${event_type}`);
        }

        const event = await session.append({
          source,
          event_type,
          gold_value: rule.gold_value,
          xp_value: rule.xp_value,
          metadata,
        });

        log.info(
          { event_id: event.event_id, event_type, gold: event.gold_value, xp: event.xp_value },
          'Event processed',
        );

        return {
          status: 'success',
          event_id: event.event_id,
          gold_earned: event.gold_value,
          xp_earned: event.xp_value,
          message: 'Event processed successfully',
          duplicate: false,
        };
      });
    } catch (err: unknown) {
      if (isAppError(err)) throw err;
      log.error({ err, source, event_type }, 'Failed to ingest event');
      throw new InternalError('Failed to process event', { cause: err });
    }
  }
}
