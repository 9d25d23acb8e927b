import type { BaseLogger } from 'pino';
import type { RewardRule } from '../../domain/index.js';
import type { Database, SqlClient } from './client.js';
import { rewardRules } from './schema.js';

/**
 * Creates tables and indexes when missing, then seeds reward rules.
 *
 * Later schema changes go through drizzle-kit. Seeding uses
 * ON CONFLICT DO NOTHING, leaving edited rules untouched.
 */
export async function ensureSchema(
  sql: SqlClient,
  db: Database,
  seedRules: readonly RewardRule[],
  log: BaseLogger,
): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS reward_rules (
      event_type    VARCHAR(50)  PRIMARY KEY,
      gold_value    INTEGER      NOT NULL DEFAULT 0,
      xp_value      INTEGER      NOT NULL DEFAULT 0,
      display_name  VARCHAR(100) NOT NULL,
      description   TEXT         NOT NULL DEFAULT '',
      created_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      updated_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      CONSTRAINT reward_rules_gold_non_negative CHECK (gold_value >= 0),
      CONSTRAINT reward_rules_xp_non_negative CHECK (xp_value >= 0)
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS sales_events (
      event_id    UUID         PRIMARY KEY DEFAULT gen_random_uuid(),
      source      VARCHAR(20)  NOT NULL,
      event_type  VARCHAR(50)  NOT NULL,
      gold_value  INTEGER      NOT NULL,
      xp_value    INTEGER      NOT NULL,
      metadata    JSONB        NOT NULL DEFAULT '{}',
      created_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      CONSTRAINT sales_events_gold_non_negative CHECK (gold_value >= 0),
      CONSTRAINT sales_events_xp_non_negative CHECK (xp_value >= 0)
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS event_log (
      id          SERIAL       PRIMARY KEY,
      event_id    UUID         NOT NULL REFERENCES sales_events(event_id) ON DELETE CASCADE,
      action      VARCHAR(50)  NOT NULL,
      details     JSONB        NOT NULL DEFAULT '{}',
      created_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_sales_events_dedup ON sales_events (source, event_type, created_at)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_sales_events_created_at ON sales_events (created_at)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_sales_events_event_type ON sales_events (event_type)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_event_log_event_id ON event_log (event_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_event_log_created_at ON event_log (created_at)`);

  if (seedRules.length > 0) {
    const inserted = await db
      .insert(rewardRules)
      .values(seedRules.map((rule) => ({ ...rule })))
      .onConflictDoNothing({ target: rewardRules.event_type })
      .returning({ event_type: rewardRules.event_type });

    log.info(
      { seeded: inserted.map((r) => r.event_type) },
      'Reward rules seeded',
    );
  }

  log.info('Database ready (reward_rules + sales_events + event_log tables)');
}
