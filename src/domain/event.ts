/**
 * Core domain types for sales-activity events.
 *
 * These types define the canonical shape of an event as it flows
 * through the system. They carry no framework dependencies.
 */

/** Origin systems allowed to post events. */
export const EVENT_SOURCES = ['outreach', 'nooks', 'manual', 'zapier'] as const;

/** Activity kinds that can earn a reward. */
export const EVENT_TYPES = [
  'call_dial',
  'call_connect',
  'email_sent',
  'meeting_booked',
  'meeting_attended',
] as const;

export type EventSource = (typeof EVENT_SOURCES)[number];
export type EventType = (typeof EVENT_TYPES)[number];

/** Free-form key/value document supplied by the sender. */
export type EventMetadata = Record<string, unknown>;

/** Narrows `value` to a member of `allowed`. */
export function isOneOf<T extends string>(allowed: readonly T[], value: string): value is T {
  return allowed.some((candidate) => candidate === value);
}

export function isEventSource(value: string): value is EventSource {
  return isOneOf(EVENT_SOURCES, value);
}

export function isEventType(value: string): value is EventType {
  return isOneOf(EVENT_TYPES, value);
}

/**
 * A persisted sales event.
 *
 * `gold_value` and `xp_value` are snapshots of the reward rule at
 * ingestion time. Events are never mutated after insert.
 */
export interface SalesEvent {
  readonly event_id: string;
  readonly source: EventSource;
  readonly event_type: EventType;
  readonly gold_value: number;
  readonly xp_value: number;
  readonly metadata: EventMetadata;
  readonly created_at: Date;
}

/** Fields the caller controls when appending an event. */
export interface NewSalesEvent {
  readonly source: EventSource;
  readonly event_type: EventType;
  readonly gold_value: number;
  readonly xp_value: number;
  readonly metadata: EventMetadata;
}
