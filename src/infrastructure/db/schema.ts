import { sql } from 'drizzle-orm';
import {
  pgTable,
  uuid,
  varchar,
  integer,
  text,
  serial,
  timestamp,
  jsonb,
  index,
  check,
} from 'drizzle-orm/pg-core';
import type { EventMetadata, EventSource, EventType } from '../../domain/index.js';

/**
 * Drizzle schema for the `sales_events` table.
 *
 * Append-only. `gold_value` / `xp_value` are copied from the rule at
 * ingestion time. The composite index serves the duplicate-window
 * range query.
 */
export const salesEvents = pgTable('sales_events', {
  event_id: uuid('event_id').primaryKey().defaultRandom(),
  source: varchar('source', { length: 20 }).$type<EventSource>().notNull(),
  event_type: varchar('event_type', { length: 50 }).$type<EventType>().notNull(),
  gold_value: integer('gold_value').notNull(),
  xp_value: integer('xp_value').notNull(),
  metadata: jsonb('metadata').$type<EventMetadata>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_sales_events_dedup').on(table.source, table.event_type, table.created_at),
  index('idx_sales_events_created_at').on(table.created_at),
  index('idx_sales_events_event_type').on(table.event_type),
  check('sales_events_gold_non_negative', sql`${table.gold_value} >= 0`),
  check('sales_events_xp_non_negative', sql`${table.xp_value} >= 0`),
]);

/**
 * Drizzle schema for the `reward_rules` table.
 *
 * One row per event type. Seeded on startup without overwriting
 * administrative edits.
 */
export const rewardRules = pgTable('reward_rules', {
  event_type: varchar('event_type', { length: 50 }).$type<EventType>().primaryKey(),
  gold_value: integer('gold_value').notNull().default(0),
  xp_value: integer('xp_value').notNull().default(0),
  display_name: varchar('display_name', { length: 100 }).notNull(),
  description: text('description').notNull().default(''),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  check('reward_rules_gold_non_negative', sql`${table.gold_value} >= 0`),
  check('reward_rules_xp_non_negative', sql`${table.xp_value} >= 0`),
]);

/**
 * Drizzle schema for the `event_log` audit table.
 *
 * Rows cascade with their event when retention deletes it.
 */
export const eventLog = pgTable('event_log', {
  id: serial('id').primaryKey(),
  event_id: uuid('event_id').notNull().references(() => salesEvents.event_id, { onDelete: 'cascade' }),
  action: varchar('action', { length: 50 }).notNull(),
  details: jsonb('details').$type<Record<string, unknown>>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_event_log_event_id').on(table.event_id),
  index('idx_event_log_created_at').on(table.created_at),
]);
