import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { AppConfig } from '../config.js';
import type { AppContext } from '../context.js';
import { requireAdmin } from '../auth.js';

export async function registerMaintenanceRoutes(app: FastifyInstance, config: AppConfig, ctx: AppContext): Promise<void> {
  app.get(
    '/api/maintenance',
    { config: { rateLimit: { max: 120, timeWindow: '1 minute' } } },
    async (request) => {
      await requireAdmin(config, request);
      return ctx.store.maintenance();
    }
  );

  app.put(
    '/api/maintenance',
    {
      config: { rateLimit: { max: 20, timeWindow: '1 minute' } },
      schema: {
        body: {
          type: 'object',
          additionalProperties: false,
          required: ['active'],
          properties: {
            active: { type: 'boolean' }
          }
        }
      }
    },
    async (request: FastifyRequest<{ Body: { active: boolean } }>) => {
      await requireAdmin(config, request);
      const state = ctx.store.setMaintenance(request.body.active);
      request.log.info({ active: state.active }, 'maintenance mode changed');
      return state;
    }
  );
}
