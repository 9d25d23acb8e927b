import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { NotFoundError, ValidationError, isEventType } from '../../domain/index.js';
import type { EventType } from '../../domain/index.js';
import {
  getRule,
  listRules,
  patchRule,
  patchRuleSchema,
  replaceRule,
  replaceRuleSchema,
  toValidationError,
} from '../../application/index.js';
import type { RewardRuleRepository, SecretVerifier } from '../../application/index.js';
import { requireSecret } from './auth.js';

export interface RuleRoutesOptions {
  rules: RewardRuleRepository;
  verifySecret: SecretVerifier;
}

type RuleRequest = FastifyRequest<{ Params: { event_type: string }; Body: unknown }>;

function eventTypeParam(request: RuleRequest): EventType {
  const { event_type } = request.params;
  if (!isEventType(event_type)) {
    throw new ValidationError('event_type', `Unknown event type: ${event_type}`);
  }
  return event_type;
}

/**
 * Reward rule administration.
 *
 * GET   /api/v1/rules              — list all rules
 * GET   /api/v1/rules/:event_type  — single rule
 * PUT   /api/v1/rules/:event_type  — full replace (creates when missing)
 * PATCH /api/v1/rules/:event_type  — partial update
 *
 * Writes need the shared secret. Changes apply to future events only.
 */
async function ruleRoutes(fastify: FastifyInstance, opts: RuleRoutesOptions): Promise<void> {
  const authenticated = requireSecret(opts.verifySecret);

  fastify.get(
    '/api/v1/rules',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const rows = await listRules(opts.rules);
      return reply.status(200).send(rows);
    },
  );

  fastify.get(
    '/api/v1/rules/:event_type',
    async (request: RuleRequest, reply: FastifyReply) => {
      const eventType = eventTypeParam(request);
      const row = await getRule(opts.rules, eventType);
      if (row === null) {
        throw new NotFoundError(`No reward rule for event type: ${eventType}`);
      }
      return reply.status(200).send(row);
    },
  );

  fastify.put<{ Params: { event_type: string }; Body: unknown }>(
    '/api/v1/rules/:event_type',
    { onRequest: authenticated },
    async (request: RuleRequest, reply: FastifyReply) => {
      const eventType = eventTypeParam(request);

      const parsed = replaceRuleSchema.safeParse(request.body);
      if (!parsed.success) {
        throw toValidationError(parsed.error);
      }

      const row = await replaceRule(opts.rules, eventType, parsed.data);
      request.log.info({ event_type: eventType, gold: row.gold_value, xp: row.xp_value }, 'Reward rule replaced');
      return reply.status(200).send(row);
    },
  );

  fastify.patch<{ Params: { event_type: string }; Body: unknown }>(
    '/api/v1/rules/:event_type',
    { onRequest: authenticated },
    async (request: RuleRequest, reply: FastifyReply) => {
      const eventType = eventTypeParam(request);

      const parsed = patchRuleSchema.safeParse(request.body);
      if (!parsed.success) {
        throw toValidationError(parsed.error);
      }

      const row = await patchRule(opts.rules, eventType, parsed.data);
      if (row === null) {
        throw new NotFoundError(`No reward rule for event type: ${eventType}`);
      }

      request.log.info({ event_type: eventType, gold: row.gold_value, xp: row.xp_value }, 'Reward rule updated');
      return reply.status(200).send(row);
    },
  );
}

export default fp(ruleRoutes, {
  name: 'rule-routes',
  fastify: '5.x',
});
