import { asc, eq } from 'drizzle-orm';
import type { EventType, RewardRule } from '../../domain/index.js';
import type { RewardRulePatch, RewardRuleRepository } from '../../application/index.js';
import type { Database } from './client.js';
import { rewardRules } from './schema.js';

type RewardRuleRow = typeof rewardRules.$inferSelect;

function toRule(row: RewardRuleRow): RewardRule {
  return {
    event_type: row.event_type,
    gold_value: row.gold_value,
    xp_value: row.xp_value,
    display_name: row.display_name,
    description: row.description,
  };
}

export class PostgresRewardRuleRepository implements RewardRuleRepository {
  constructor(private readonly db: Database) {}

  async findByEventType(eventType: EventType): Promise<RewardRule | undefined> {
    const rows = await this.db
      .select()
      .from(rewardRules)
      .where(eq(rewardRules.event_type, eventType))
      .limit(1);
    return rows[0] === undefined ? undefined : toRule(rows[0]);
  }

  async findAll(): Promise<RewardRule[]> {
    const rows = await this.db.select().from(rewardRules).orderBy(asc(rewardRules.event_type));
    return rows.map(toRule);
  }

  async upsert(rule: RewardRule): Promise<RewardRule> {
    const now = new Date();
    const [row] = await this.db
      .insert(rewardRules)
      .values({ ...rule, created_at: now, updated_at: now })
      .onConflictDoUpdate({
        target: rewardRules.event_type,
        set: {
          gold_value: rule.gold_value,
          xp_value: rule.xp_value,
          display_name: rule.display_name,
          description: rule.description,
          updated_at: now,
        },
      })
      .returning();

    if (row === undefined) {
      throw new Error(`Upsert of reward rule ${rule.event_type} returned no row`);
    }
    return toRule(row);
  }

  async patch(eventType: EventType, patch: RewardRulePatch): Promise<RewardRule | undefined> {
    const setFields: Partial<typeof rewardRules.$inferInsert> = { updated_at: new Date() };
    if (patch.gold_value !== undefined) setFields.gold_value = patch.gold_value;
    if (patch.xp_value !== undefined) setFields.xp_value = patch.xp_value;
    if (patch.display_name !== undefined) setFields.display_name = patch.display_name;
    if (patch.description !== undefined) setFields.description = patch.description;

    const rows = await this.db
      .update(rewardRules)
      .set(setFields)
      .where(eq(rewardRules.event_type, eventType))
      .returning();

    return rows[0] === undefined ? undefined : toRule(rows[0]);
  }
}
