export const DEFAULT_XP_PER_LEVEL = 1000;

export interface LevelProgress {
  readonly current_level: number;
  readonly xp_in_current_level: number;
  readonly xp_to_next_level: number;
}

/**
 * Level from lifetime XP.
 *
 * `(current_level - 1) * xpPerLevel + xp_in_current_level === totalXp`
 * holds for every non-negative integer input.
 */
export function levelFromXp(totalXp: number, xpPerLevel: number = DEFAULT_XP_PER_LEVEL): LevelProgress {
  if (!Number.isInteger(xpPerLevel) || xpPerLevel < 1) {
    throw new RangeError(`xpPerLevel must be a positive integer, got ${xpPerLevel}`);
  }
  const xp = Math.max(0, Math.floor(totalXp));
  const inLevel = xp % xpPerLevel;

  return {
    current_level: Math.floor(xp / xpPerLevel) + 1,
    xp_in_current_level: inLevel,
    xp_to_next_level: xpPerLevel - inLevel,
  };
}

/**
 * Weekly rank tiers indexed by meeting count.
 *
 * Counts below the last index match exactly; the last tier covers that
 * count and everything above it.
 */
export const DEFAULT_RANK_TIERS = [
  'Iron',
  'Bronze',
  'Silver',
  'Gold',
  'Platinum',
  'Emerald',
  'Diamond',
  'Master',
  'Grandmaster',
  'Challenger',
] as const;

export type RankName = (typeof DEFAULT_RANK_TIERS)[number];

export function rankForMeetings<T extends string>(
  weeklyMeetings: number,
  tiers: readonly [T, ...T[]],
): T;
export function rankForMeetings(weeklyMeetings: number): RankName;
export function rankForMeetings(
  weeklyMeetings: number,
  tiers: readonly [string, ...string[]] = DEFAULT_RANK_TIERS,
): string {
  const index = Math.min(Math.max(0, Math.floor(weeklyMeetings)), tiers.length - 1);
  return tiers[index] ?? tiers[0];
}
