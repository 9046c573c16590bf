import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../config.js';
import type { AppContext } from '../context.js';

export async function registerHealthRoutes(app: FastifyInstance, config: AppConfig, ctx: AppContext): Promise<void> {
  app.get('/api/health', async () => {
    return {
      ok: true,
      env: config.NODE_ENV,
      time: new Date().toISOString(),
      maintenance: ctx.store.maintenance().active,
      rules: ctx.store.current().rules.length
    };
  });
}
