import { pino } from 'pino';
import { loadConfig } from '../config.js';
import { purgeEventsOlderThan } from '../application/index.js';
import { PostgresEventStore, createDbClient } from '../infrastructure/index.js';
import { parseCleanupArgs } from './cleanup-args.js';

/**
 * Deletes events older than the retention period.
 *
 *   npm run cleanup -- --days 30 --dry-run
 *
 * `--days` defaults to RETENTION_DAYS.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = pino({ level: config.LOG_LEVEL, name: 'cleanup' });
  const args = parseCleanupArgs(process.argv.slice(2));

  if (config.STORE_DRIVER !== 'postgres' || config.DATABASE_URL === undefined) {
    throw new Error('Cleanup needs STORE_DRIVER=postgres and DATABASE_URL');
  }

  const days = args.days ?? config.RETENTION_DAYS;
  const { sql, db } = createDbClient(config.DATABASE_URL);

  try {
    const result = await purgeEventsOlderThan(new PostgresEventStore(db), days, { dryRun: args.dryRun });
    log.info(
      { days, cutoff: result.cutoff.toISOString(), matched: result.matched, deleted: result.deleted, dry_run: args.dryRun },
      args.dryRun ? 'Dry run: events matched for cleanup' : 'Old events deleted',
    );
  } finally {
    await sql.end();
  }
}

main().catch((err: unknown) => {
  console.error('Fatal: cleanup failed', err);
  process.exit(1);
});
