import type { HealthStatus } from '@stackhook/shared';
import type { FastifyPluginAsync } from 'fastify';

export const healthRoutes: FastifyPluginAsync = async (app) => {
  const health = async (): Promise<HealthStatus> => ({ status: 'ok' });

  app.get('/health', health);
  app.post('/health', health);
};
