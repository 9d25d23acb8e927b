import type { EventSource, EventType, SalesEvent } from '../domain/index.js';
import type { EventListFilters, EventStore } from './ports.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

export interface ListEventsParams {
  limit?: number;
  offset?: number;
  event_type?: EventType;
  source?: EventSource;
}

export interface EventPage {
  data: SalesEvent[];
  pagination: { limit: number; offset: number; count: number };
}

/**
 * Use case: list events with pagination and filters.
 * Clamps limit to [1, 500], defaults to 50.
 */
export async function listEvents(store: EventStore, params: ListEventsParams): Promise<EventPage> {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const filters: EventListFilters = {};
  if (params.event_type !== undefined) filters.event_type = params.event_type;
  if (params.source !== undefined) filters.source = params.source;

  const data = await store.list(filters, { limit, offset });

  return {
    data,
    pagination: { limit, offset, count: data.length },
  };
}
