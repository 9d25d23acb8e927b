import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/app.js';
import { loadConfig } from '../../src/config.js';
import { InMemoryEventStore, InMemoryRewardRuleRepository } from '../../src/infrastructure/index.js';
import { SECRET_HEADER } from '../../src/interfaces/http/index.js';
import { TEST_SECRET, createClock } from '../helpers.js';
import type { TestClock } from '../helpers.js';

const INGEST = '/api/v1/webhook/ingest';
const auth = { [SECRET_HEADER]: TEST_SECRET };

describe('HTTP API', () => {
  let app: FastifyInstance;
  let clock: TestClock;
  let events: InMemoryEventStore;
  let rules: InMemoryRewardRuleRepository;

  async function start(env: Record<string, string> = {}): Promise<void> {
    const config = loadConfig({ WEBHOOK_SECRET: TEST_SECRET, STORE_DRIVER: 'memory', ...env });
    app = await buildServer(config, { events, rules, logger: false, now: clock.now });
    await app.ready();
  }

  beforeEach(() => {
    clock = createClock('2026-10-18T12:00:00Z');
    events = new InMemoryEventStore(clock.now);
    rules = new InMemoryRewardRuleRepository();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /api/v1/webhook/ingest', () => {
    beforeEach(async () => {
      await start();
    });

    it('returns 201 for a new event and 200 for its duplicate', async () => {
      const first = await app.inject({
        method: 'POST',
        url: INGEST,
        headers: auth,
        payload: { source: 'outreach', event_type: 'call_dial', metadata: { call_id: 'c-1' } },
      });
      expect(first.statusCode).toBe(201);
      expect(first.json()).toMatchObject({
        status: 'success',
        gold_earned: 10,
        xp_earned: 5,
        duplicate: false,
      });

      const second = await app.inject({
        method: 'POST',
        url: INGEST,
        headers: auth,
        payload: { source: 'outreach', event_type: 'call_dial' },
      });
      expect(second.statusCode).toBe(200);
      expect(second.json()).toEqual({
        status: 'success',
        event_id: first.json().event_id,
        gold_earned: 0,
        xp_earned: 0,
        message: 'Duplicate event ignored (idempotency check)',
        duplicate: true,
      });
      expect(events.all()).toHaveLength(1);
    });

    it('rejects a missing or wrong secret with 401', async () => {
      const missing = await app.inject({
        method: 'POST',
        url: INGEST,
        payload: { source: 'outreach', event_type: 'call_dial' },
      });
      expect(missing.statusCode).toBe(401);
      expect(missing.json()).toEqual({ error: 'Invalid credential', code: 'UNAUTHORIZED' });

      const wrong = await app.inject({
        method: 'POST',
        url: INGEST,
        headers: { [SECRET_HEADER]: 'test-secret' },
        payload: { source: 'outreach', event_type: 'call_dial' },
      });
      expect(wrong.statusCode).toBe(401);
      expect(events.all()).toHaveLength(0);
    });

    it('rejects a bad secret before reading the body', async () => {
      const malformed = await app.inject({
        method: 'POST',
        url: INGEST,
        headers: { [SECRET_HEADER]: 'wrong', 'content-type': 'application/json' },
        payload: '{"source":',
      });
      expect(malformed.statusCode).toBe(401);
      expect(malformed.json()).toEqual({ error: 'Invalid credential', code: 'UNAUTHORIZED' });

      const unsupported = await app.inject({
        method: 'POST',
        url: INGEST,
        headers: { 'content-type': 'application/xml' },
        payload: '<event/>',
      });
      expect(unsupported.statusCode).toBe(401);
      expect(unsupported.json()).toEqual({ error: 'Invalid credential', code: 'UNAUTHORIZED' });
    });

    it('reports an unsupported content type as a body validation error', async () => {
      const res = await app.inject({
        method: 'POST',
        url: INGEST,
        headers: { ...auth, 'content-type': 'application/xml' },
        payload: '<event/>',
      });
      expect(res.statusCode).toBe(415);
      expect(res.json()).toMatchObject({ code: 'VALIDATION_ERROR', field: 'body' });
    });

    it('returns 400 naming the invalid field', async () => {
      const res = await app.inject({
        method: 'POST',
        url: INGEST,
        headers: auth,
        payload: { source: 'outreach', event_type: 'unknown_type' },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ code: 'VALIDATION_ERROR', field: 'event_type' });
    });

    it('returns 400 for malformed JSON', async () => {
      const res = await app.inject({
        method: 'POST',
        url: INGEST,
        headers: { ...auth, 'content-type': 'application/json' },
        payload: '{"source":',
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ code: 'VALIDATION_ERROR', field: 'body' });
    });

    it('returns 422 when the event type has no rule', async () => {
      rules.remove('email_sent');
      const res = await app.inject({
        method: 'POST',
        url: INGEST,
        headers: auth,
        payload: { source: 'manual', event_type: 'email_sent' },
      });
      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({
        error: 'No reward rule configured for event type: email_sent',
        code: 'CONFIGURATION_ERROR',
      });
    });

    it('returns 500 without internals when storage fails', async () => {
      vi.spyOn(events, 'withExclusiveKey').mockRejectedValue(new Error('password authentication failed'));
      const res = await app.inject({
        method: 'POST',
        url: INGEST,
        headers: auth,
        payload: { source: 'manual', event_type: 'call_dial' },
      });
      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({ error: 'Failed to process event', code: 'INTERNAL_ERROR' });
    });
  });

  describe('rate limiting', () => {
    it('returns 429 with retry-after once the webhook budget is spent', async () => {
      await start({ RATE_LIMIT_PER_MINUTE: '2' });
      const send = () =>
        app.inject({ method: 'POST', url: INGEST, headers: auth, payload: { source: 'manual', event_type: 'call_dial' } });

      expect((await send()).statusCode).toBe(201);
      expect((await send()).statusCode).toBe(200);

      const limited = await send();
      expect(limited.statusCode).toBe(429);
      expect(limited.headers['retry-after']).toBe('60');
      expect(limited.json()).toEqual({ error: 'Too many requests', code: 'RATE_LIMITED' });
    });
  });

  describe('stats', () => {
    beforeEach(async () => {
      await start();
      await app.inject({ method: 'POST', url: INGEST, headers: auth, payload: { source: 'nooks', event_type: 'call_dial' } });
      await app.inject({ method: 'POST', url: INGEST, headers: auth, payload: { source: 'nooks', event_type: 'meeting_booked' } });
    });

    it('GET /api/v1/stats/current derives the player state', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/stats/current' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        total_gold: 210,
        total_xp: 105,
        current_level: 1,
        xp_in_current_level: 105,
        xp_to_next_level: 895,
        events_today: 2,
        total_events: 2,
        rank: 'Bronze',
        calls_made: 1,
        calls_connected: 0,
        meetings_booked: 1,
      });
    });

    it('GET /api/v1/stats/daily returns one row per active day', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/stats/daily?days=7' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        days: 7,
        data: [
          {
            event_date: '2026-10-18',
            total_events: 2,
            total_gold: 210,
            total_xp: 105,
            calls_made: 1,
            calls_connected: 0,
            meetings_booked: 1,
            meetings_attended: 0,
            emails_sent: 0,
            connect_rate_pct: 0,
            booking_rate_pct: 0,
          },
        ],
      });
    });

    it('rejects an out-of-range day count', async () => {
      for (const days of ['0', '91', 'abc']) {
        const res = await app.inject({ method: 'GET', url: `/api/v1/stats/daily?days=${days}` });
        expect(res.statusCode).toBe(400);
        expect(res.json()).toEqual({
          error: 'days must be an integer between 1 and 90',
          code: 'VALIDATION_ERROR',
          field: 'days',
        });
      }
    });
  });

  describe('GET /api/v1/events', () => {
    beforeEach(async () => {
      await start();
      await app.inject({ method: 'POST', url: INGEST, headers: auth, payload: { source: 'zapier', event_type: 'email_sent' } });
    });

    it('requires the secret', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/events' });
      expect(res.statusCode).toBe(401);
    });

    it('returns a page of events', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/events?limit=10', headers: auth });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.pagination).toEqual({ limit: 10, offset: 0, count: 1 });
      expect(body.data[0]).toMatchObject({
        source: 'zapier',
        event_type: 'email_sent',
        gold_value: 10,
        xp_value: 3,
        metadata: {},
        created_at: '2026-10-18T12:00:00.000Z',
      });
    });

    it('validates filters and integers', async () => {
      const badType = await app.inject({ method: 'GET', url: '/api/v1/events?event_type=demo', headers: auth });
      expect(badType.json()).toMatchObject({ code: 'VALIDATION_ERROR', field: 'event_type' });

      const badLimit = await app.inject({ method: 'GET', url: '/api/v1/events?limit=ten', headers: auth });
      expect(badLimit.json()).toEqual({ error: 'limit must be an integer', code: 'VALIDATION_ERROR', field: 'limit' });
    });
  });

  describe('rules', () => {
    beforeEach(async () => {
      await start();
    });

    it('lists and reads rules without auth', async () => {
      const list = await app.inject({ method: 'GET', url: '/api/v1/rules' });
      expect(list.statusCode).toBe(200);
      expect(list.json()).toHaveLength(5);

      const one = await app.inject({ method: 'GET', url: '/api/v1/rules/meeting_attended' });
      expect(one.json()).toMatchObject({ event_type: 'meeting_attended', gold_value: 500, xp_value: 200 });
    });

    it('returns 404 for a type without a rule and 400 for an unknown type', async () => {
      rules.remove('call_connect');
      const missing = await app.inject({ method: 'GET', url: '/api/v1/rules/call_connect' });
      expect(missing.statusCode).toBe(404);
      expect(missing.json()).toEqual({ error: 'No reward rule for event type: call_connect', code: 'NOT_FOUND' });

      const unknown = await app.inject({ method: 'GET', url: '/api/v1/rules/coffee_chat' });
      expect(unknown.statusCode).toBe(400);
    });

    it('replaces a rule and applies it to later events only', async () => {
      await app.inject({ method: 'POST', url: INGEST, headers: auth, payload: { source: 'manual', event_type: 'call_dial' } });

      const unauthenticated = await app.inject({
        method: 'PUT',
        url: '/api/v1/rules/call_dial',
        payload: { gold_value: 50, xp_value: 20, display_name: 'Dial' },
      });
      expect(unauthenticated.statusCode).toBe(401);

      const put = await app.inject({
        method: 'PUT',
        url: '/api/v1/rules/call_dial',
        headers: auth,
        payload: { gold_value: 50, xp_value: 20, display_name: 'Dial' },
      });
      expect(put.statusCode).toBe(200);
      expect(put.json()).toEqual({
        event_type: 'call_dial',
        gold_value: 50,
        xp_value: 20,
        display_name: 'Dial',
        description: '',
      });

      const next = await app.inject({ method: 'POST', url: INGEST, headers: auth, payload: { source: 'outreach', event_type: 'call_dial' } });
      expect(next.json()).toMatchObject({ gold_earned: 50, xp_earned: 20 });
      expect(events.all().map((e) => e.gold_value)).toEqual([10, 50]);
    });

    it('patches a rule', async () => {
      const res = await app.inject({
        method: 'PATCH',
        url: '/api/v1/rules/email_sent',
        headers: auth,
        payload: { xp_value: 4 },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ event_type: 'email_sent', gold_value: 10, xp_value: 4 });
    });

    it('rejects an empty patch and a patch of a missing rule', async () => {
      const empty = await app.inject({ method: 'PATCH', url: '/api/v1/rules/email_sent', headers: auth, payload: {} });
      expect(empty.statusCode).toBe(400);
      expect(empty.json()).toEqual({
        error: 'At least one field must be provided',
        code: 'VALIDATION_ERROR',
        field: 'body',
      });

      rules.remove('email_sent');
      const missing = await app.inject({
        method: 'PATCH',
        url: '/api/v1/rules/email_sent',
        headers: auth,
        payload: { xp_value: 4 },
      });
      expect(missing.statusCode).toBe(404);
    });
  });

  describe('health and info', () => {
    beforeEach(async () => {
      await start();
    });

    it('reports healthy when the store answers', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/health' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        status: 'healthy',
        database: 'connected',
        redis: 'disabled',
        timestamp: '2026-10-18T12:00:00.000Z',
        version: '1.0.0',
      });
    });

    it('returns 503 when the store is down', async () => {
      vi.spyOn(events, 'ping').mockRejectedValue(new Error('ECONNREFUSED'));
      const res = await app.inject({ method: 'GET', url: '/api/v1/health' });
      expect(res.statusCode).toBe(503);
      expect(res.json()).toMatchObject({ status: 'unhealthy', database: 'disconnected' });
    });

    it('describes the service at the root', async () => {
      const res = await app.inject({ method: 'GET', url: '/' });
      expect(res.json()).toMatchObject({ service: 'quota-quest', version: '1.0.0', status: 'running' });
    });

    it('answers unknown routes with a NOT_FOUND body', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/nope' });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Route GET /api/v1/nope not found', code: 'NOT_FOUND' });
    });
  });
});
