import { z } from 'zod';

const goldValue = z.number().int().min(0);
const xpValue = z.number().int().min(0);
const displayName = z.string().trim().min(1).max(100);
const description = z.string().max(1000);

/**
 * Schema for PUT /api/v1/rules/:event_type (full replace).
 * `description` defaults to an empty string.
 */
export const replaceRuleSchema = z.object({
  gold_value: goldValue,
  xp_value: xpValue,
  display_name: displayName,
  description: description.optional().default(''),
});

export type ReplaceRuleInput = z.infer<typeof replaceRuleSchema>;

/**
 * Schema for PATCH /api/v1/rules/:event_type (partial update).
 * All fields optional, at least one required.
 */
export const patchRuleSchema = z.object({
  gold_value: goldValue.optional(),
  xp_value: xpValue.optional(),
  display_name: displayName.optional(),
  description: description.optional(),
}).refine(
  (data) => Object.values(data).some((value) => value !== undefined),
  { message: 'At least one field must be provided' },
);

export type PatchRuleInput = z.infer<typeof patchRuleSchema>;
