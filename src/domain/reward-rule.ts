import type { EventType } from './event.js';

/** Gold/XP reward granted for one event type. */
export interface RewardRule {
  readonly event_type: EventType;
  readonly gold_value: number;
  readonly xp_value: number;
  readonly display_name: string;
  readonly description: string;
}

/** Rule set inserted on first start. Existing rows are never overwritten. */
export const DEFAULT_REWARD_RULES: readonly RewardRule[] = [
  {
    event_type: 'call_dial',
    gold_value: 10,
    xp_value: 5,
    display_name: 'Dial Attempt',
    description: 'Gold for making a call attempt',
  },
  {
    event_type: 'call_connect',
    gold_value: 25,
    xp_value: 15,
    display_name: 'Call Connected',
    description: 'Bonus for reaching a prospect (no meeting)',
  },
  {
    event_type: 'email_sent',
    gold_value: 10,
    xp_value: 3,
    display_name: 'Email Sent',
    description: 'Gold for sending a personalized email',
  },
  {
    event_type: 'meeting_booked',
    gold_value: 200,
    xp_value: 100,
    display_name: 'Meeting Booked',
    description: 'Major achievement - meeting scheduled',
  },
  {
    event_type: 'meeting_attended',
    gold_value: 500,
    xp_value: 200,
    display_name: 'Meeting Attended',
    description: 'Prospect showed up to meeting',
  },
];
