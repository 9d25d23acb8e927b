export { EVENT_SOURCES, EVENT_TYPES, isEventSource, isEventType, isOneOf } from './event.js';
export type { EventSource, EventType, EventMetadata, SalesEvent, NewSalesEvent } from './event.js';
export { DEFAULT_REWARD_RULES } from './reward-rule.js';
export type { RewardRule } from './reward-rule.js';
export { DEFAULT_XP_PER_LEVEL, DEFAULT_RANK_TIERS, levelFromXp, rankForMeetings } from './progression.js';
export type { LevelProgress, RankName } from './progression.js';
export {
  AppError,
  UnauthorizedError,
  ValidationError,
  ConfigurationError,
  NotFoundError,
  RateLimitedError,
  InternalError,
  isAppError,
} from './errors.js';
export type { ErrorCode } from './errors.js';
