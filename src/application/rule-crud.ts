import type { EventType, RewardRule } from '../domain/index.js';
import type { RewardRuleRepository } from './ports.js';
import type { PatchRuleInput, ReplaceRuleInput } from './rule-schema.js';

/** List all reward rules. */
export async function listRules(repo: RewardRuleRepository): Promise<RewardRule[]> {
  return repo.findAll();
}

/** Fetch a single rule by event type. Returns null if not found. */
export async function getRule(repo: RewardRuleRepository, eventType: EventType): Promise<RewardRule | null> {
  const rule = await repo.findByEventType(eventType);
  return rule ?? null;
}

/**
 * Full replace of a rule, inserting it when missing.
 * Existing events keep the values they were ingested with.
 */
export async function replaceRule(
  repo: RewardRuleRepository,
  eventType: EventType,
  input: ReplaceRuleInput,
): Promise<RewardRule> {
  return repo.upsert({
    event_type: eventType,
    gold_value: input.gold_value,
    xp_value: input.xp_value,
    display_name: input.display_name,
    description: input.description,
  });
}

/** Partial update of a rule. Returns null if not found. */
export async function patchRule(
  repo: RewardRuleRepository,
  eventType: EventType,
  input: PatchRuleInput,
): Promise<RewardRule | null> {
  const rule = await repo.patch(eventType, input);
  return rule ?? null;
}
