import type { FastifyInstance } from 'fastify';

import fp from 'fastify-plugin';

import type { AdmissionPolicy } from '../core/rate-limiter.js';
import { recordRateLimited } from '../lib/observability.js';

interface RateLimitPluginOptions {
  policy: AdmissionPolicy;
  now?: () => number;
}

/** Admission control ahead of routing and body parsing, on every route. */
export default fp<RateLimitPluginOptions>(async (app: FastifyInstance, options) => {
  const now = options.now ?? Date.now;

  app.addHook('onRequest', async (request, reply) => {
    const decision = options.policy.admit(request.ip, now());
    if (decision.admitted) {
      return;
    }

    recordRateLimited();
    request.log.warn({ event: 'rate_limited', client: request.ip }, 'Rate limit exceeded');
    return reply
      .code(429)
      .header('Retry-After', String(Math.max(1, Math.ceil(decision.retryAfterMs / 1000))))
      .send({ ok: false, detail: 'rate limit exceeded' });
  });

  app.addHook('onClose', async () => {
    options.policy.close();
  });
});
