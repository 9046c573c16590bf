import type { FastifyInstance, FastifyReply } from 'fastify';
import type { AppConfig } from '../config.js';
import type { AppContext } from '../context.js';
import { requireAdmin } from '../auth.js';

export async function registerStatsRoutes(app: FastifyInstance, config: AppConfig, ctx: AppContext): Promise<void> {
  app.get(
    '/api/stats',
    { config: { rateLimit: { max: 120, timeWindow: '1 minute' } } },
    async (request) => {
      await requireAdmin(config, request);
      return { items: ctx.stats.snapshot() };
    }
  );

  app.post(
    '/api/stats/reset',
    { config: { rateLimit: { max: 20, timeWindow: '1 minute' } } },
    async (request, reply: FastifyReply) => {
      await requireAdmin(config, request);
      ctx.stats.reset();
      reply.code(204);
      return null;
    }
  );
}
