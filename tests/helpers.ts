import { pino } from 'pino';
import { DEFAULT_REWARD_RULES } from '../src/domain/index.js';
import type { EventSource, EventType, SalesEvent } from '../src/domain/index.js';
import type { EventStore } from '../src/application/index.js';

/** Placeholder secret, long enough for config validation. */
export const TEST_SECRET = 'test-secret-0123456789-0123456789';

export const silentLogger = pino({ level: 'silent' });

export interface TestClock {
  now: () => Date;
  set(iso: string): void;
  advance(ms: number): void;
}

export function createClock(iso: string): TestClock {
  let current = new Date(iso).getTime();
  return {
    now: () => new Date(current),
    set(next) {
      current = new Date(next).getTime();
    },
    advance(ms) {
      current += ms;
    },
  };
}

/**
 * Appends an event with the default reward values, stamped at `at`.
 * `clock` must be the clock the store was built with.
 */
export async function seedEvent(
  store: EventStore,
  clock: TestClock,
  at: string,
  eventType: EventType,
  overrides: { source?: EventSource; gold_value?: number; xp_value?: number } = {},
): Promise<SalesEvent> {
  clock.set(at);
  const rule = DEFAULT_REWARD_RULES.find((r) => r.event_type === eventType);
  const source = overrides.source ?? 'manual';

  return store.withExclusiveKey({ source, event_type: eventType }, (session) =>
    session.append({
      source,
      event_type: eventType,
      gold_value: overrides.gold_value ?? rule?.gold_value ?? 0,
      xp_value: overrides.xp_value ?? rule?.xp_value ?? 0,
      metadata: {},
    }),
  );
}
