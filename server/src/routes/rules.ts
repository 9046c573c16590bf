import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { AppConfig } from '../config.js';
import type { AppContext } from '../context.js';
import { requireAdmin } from '../auth.js';
import { RuleValidationError, toRuleInput, type ClockRuleInput } from '../rules/rule.js';
import { toPersistedRule } from '../rules/ruleStore.js';

export async function registerRulesRoutes(app: FastifyInstance, config: AppConfig, ctx: AppContext): Promise<void> {
  app.get(
    '/api/rules',
    {
      config: {
        rateLimit: {
          max: 120,
          timeWindow: '1 minute'
        }
      }
    },
    async (request) => {
      await requireAdmin(config, request);
      const snapshot = ctx.store.current();
      return { version: snapshot.version, items: snapshot.rules.map(toPersistedRule) };
    }
  );

  app.post(
    '/api/rules',
    {
      config: {
        rateLimit: {
          max: 60,
          timeWindow: '1 minute'
        }
      },
      schema: {
        body: {
          type: 'object',
          additionalProperties: false,
          required: ['pattern', 'ip'],
          properties: {
            pattern: { type: 'string', minLength: 1, maxLength: 256 },
            ip: { type: 'string', minLength: 1, maxLength: 64 },
            start: { type: 'string', maxLength: 5 },
            end: { type: 'string', maxLength: 5 },
            enabled: { type: 'boolean' }
          }
        }
      }
    },
    async (request: FastifyRequest<{ Body: ClockRuleInput }>, reply: FastifyReply) => {
      await requireAdmin(config, request);

      const input = toRuleInput(request.body);
      if (input instanceof RuleValidationError) {
        reply.code(400);
        return { error: input.code, message: input.message };
      }

      const res = ctx.store.addRule(input);
      if (!res.ok) {
        reply.code(400);
        return { error: res.error.code, message: res.error.message };
      }

      reply.code(201);
      return toPersistedRule(res.rule);
    }
  );

  app.delete(
    '/api/rules',
    {
      config: {
        rateLimit: {
          max: 60,
          timeWindow: '1 minute'
        }
      },
      schema: {
        querystring: {
          type: 'object',
          required: ['pattern'],
          properties: {
            pattern: { type: 'string', minLength: 1, maxLength: 256 }
          }
        }
      }
    },
    async (request: FastifyRequest<{ Querystring: { pattern: string } }>, reply: FastifyReply) => {
      await requireAdmin(config, request);

      const removed = ctx.store.removeRule(request.query.pattern);
      if (removed === 0) {
        reply.code(404);
        return { error: 'NOT_FOUND' };
      }

      reply.code(204);
      return null;
    }
  );

  app.post(
    '/api/rules/toggle',
    {
      config: {
        rateLimit: {
          max: 60,
          timeWindow: '1 minute'
        }
      },
      schema: {
        body: {
          type: 'object',
          additionalProperties: false,
          required: ['pattern'],
          properties: {
            pattern: { type: 'string', minLength: 1, maxLength: 256 }
          }
        }
      }
    },
    async (request: FastifyRequest<{ Body: { pattern: string } }>, reply: FastifyReply) => {
      await requireAdmin(config, request);

      const toggled = ctx.store.toggleRule(request.body.pattern);
      if (toggled === 0) {
        reply.code(404);
        return { error: 'NOT_FOUND' };
      }

      return { toggled };
    }
  );
}
