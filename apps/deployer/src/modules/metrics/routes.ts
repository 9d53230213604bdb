import type { FastifyPluginAsync } from 'fastify';

import { metricsRegistry } from '../../lib/observability.js';

/** Prometheus scrape endpoint for the deployer's own registry. */
export const metricsRoutes: FastifyPluginAsync = async (app) => {
  app.get('/metrics', async (_request, reply) => {
    const exposition = await metricsRegistry.metrics();
    return reply.type(metricsRegistry.contentType).header('Cache-Control', 'no-store').send(exposition);
  });
};
