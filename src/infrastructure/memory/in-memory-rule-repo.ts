import type { EventType, RewardRule } from '../../domain/index.js';
import { DEFAULT_REWARD_RULES } from '../../domain/index.js';
import type { RewardRulePatch, RewardRuleRepository } from '../../application/index.js';

/**
 * In-memory reward rule repository.
 *
 * Backs the `memory` store driver and tests. Starts from the default
 * rule set unless given one.
 */
export class InMemoryRewardRuleRepository implements RewardRuleRepository {
  private readonly rules: Map<EventType, RewardRule> = new Map();

  constructor(rules: readonly RewardRule[] = DEFAULT_REWARD_RULES) {
    for (const rule of rules) {
      this.rules.set(rule.event_type, rule);
    }
  }

  async findByEventType(eventType: EventType): Promise<RewardRule | undefined> {
    return this.rules.get(eventType);
  }

  async findAll(): Promise<RewardRule[]> {
    return [...this.rules.values()].sort((a, b) => a.event_type.localeCompare(b.event_type));
  }

  async upsert(rule: RewardRule): Promise<RewardRule> {
    this.rules.set(rule.event_type, rule);
    return rule;
  }

  async patch(eventType: EventType, patch: RewardRulePatch): Promise<RewardRule | undefined> {
    const current = this.rules.get(eventType);
    if (current === undefined) return undefined;

    const next: RewardRule = {
      event_type: current.event_type,
      gold_value: patch.gold_value ?? current.gold_value,
      xp_value: patch.xp_value ?? current.xp_value,
      display_name: patch.display_name ?? current.display_name,
      description: patch.description ?? current.description,
    };
    this.rules.set(eventType, next);
    return next;
  }

  /** Drops a rule; lets tests simulate a missing mapping. */
  remove(eventType: EventType): boolean {
    return this.rules.delete(eventType);
  }
}
