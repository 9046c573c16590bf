import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../config.js';
import type { AppContext } from '../context.js';
import { requireAdmin } from '../auth.js';

export async function registerQueryLogsRoutes(app: FastifyInstance, config: AppConfig, ctx: AppContext): Promise<void> {
  app.get(
    '/api/query-logs',
    { config: { rateLimit: { max: 120, timeWindow: '1 minute' } } },
    async (request) => {
      await requireAdmin(config, request);
      return { items: ctx.queryLog.list() };
    }
  );
}
