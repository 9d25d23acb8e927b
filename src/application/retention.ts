import type { EventStore } from './ports.js';

export const DEFAULT_RETENTION_DAYS = 90;

export interface PurgeResult {
  cutoff: Date;
  matched: number;
  deleted: number;
}

/**
 * Deletes events created before `now - days`.
 *
 * With `dryRun` the matching events are only counted. Audit rows go
 * with their events.
 */
export async function purgeEventsOlderThan(
  store: EventStore,
  days: number,
  options: { dryRun?: boolean; now?: Date } = {},
): Promise<PurgeResult> {
  if (!Number.isInteger(days) || days < 1) {
    throw new RangeError(`Retention days must be a positive integer, got ${days}`);
  }

  const now = options.now ?? new Date();
  const cutoff = new Date(now.getTime() - days * 86_400_000);

  if (options.dryRun === true) {
    const matched = await store.countOlderThan(cutoff);
    return { cutoff, matched, deleted: 0 };
  }

  const deleted = await store.deleteOlderThan(cutoff);
  return { cutoff, matched: deleted, deleted };
}
