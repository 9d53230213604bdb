import Fastify, { type FastifyBaseLogger, type FastifyServerOptions } from 'fastify';

import type { Settings } from './config/env.js';
import { SlidingWindowRateLimiter, type AdmissionPolicy } from './core/rate-limiter.js';
import { CommandRunner, type StepExecutor } from './core/run-command.js';
import { StackLock } from './core/stack-lock.js';
import { StackResolver } from './core/stack-resolver.js';
import { errorBody } from './lib/http-errors.js';
import { instrumentHttpRequest } from './lib/observability.js';
import { deployRoutes } from './modules/deploy/routes.js';
import { healthRoutes } from './modules/health/routes.js';
import { metricsRoutes } from './modules/metrics/routes.js';
import { DeploymentPipeline } from './pipeline/deployment-pipeline.js';
import rateLimitPlugin from './plugins/rate-limit.js';
import { CachedStackSecrets, noStackSecrets, type StackSecretsProvider } from './secrets/stack-secrets.js';
import { VaultClient } from './secrets/vault-client.js';

export interface AppOverrides {
  logger?: FastifyServerOptions['logger'];
  runner?: StepExecutor;
  rateLimiter?: AdmissionPolicy;
  secrets?: StackSecretsProvider;
  lock?: StackLock;
  clock?: () => Date;
  now?: () => number;
}

// Route matching must not be what rejects a long stack name.
const MAX_STACK_PARAM_LENGTH = 1024;

const createSecretsProvider = (settings: Readonly<Settings>, logger: FastifyBaseLogger): StackSecretsProvider => {
  if (!settings.vault) {
    return noStackSecrets;
  }

  const vault = new VaultClient(
    {
      addr: settings.vault.addr,
      roleId: settings.vault.roleId,
      secretId: settings.vault.secretId,
      mount: settings.vault.mount,
    },
    logger,
  );
  return new CachedStackSecrets(vault, { paths: settings.vault.paths, ttlMs: settings.vault.cacheTtlMs });
};

export const buildApp = (settings: Readonly<Settings>, overrides: AppOverrides = {}) => {
  const app = Fastify({
    logger: overrides.logger ?? { level: settings.logLevel },
    trustProxy: settings.trustProxy,
    maxParamLength: MAX_STACK_PARAM_LENGTH,
  });

  // Bodies stay raw: signatures cover the transmitted bytes, and JSON is
  // parsed by the handler only after verification.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  app.register(rateLimitPlugin, {
    policy:
      overrides.rateLimiter ??
      new SlidingWindowRateLimiter({
        limit: settings.rateLimitPerMinute,
        maxClients: settings.rateLimitMaxClients,
      }),
    now: overrides.now,
  });

  app.addHook('onResponse', (request, reply, done) => {
    instrumentHttpRequest({
      method: request.method,
      route: request.routeOptions.url ?? 'unknown',
      statusCode: reply.statusCode,
      durationSeconds: reply.elapsedTime / 1000,
    });
    done();
  });

  app.setNotFoundHandler((_request, reply) => reply.code(404).send(errorBody('not found')));

  app.setErrorHandler((error, request, reply) => {
    // Only Fastify's own request errors (FST_* codes) reach the client as-is.
    const statusCode = error.statusCode ?? 500;
    const isRequestError = typeof error.code === 'string' && error.code.startsWith('FST_');
    if (isRequestError && statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send(errorBody(error.message));
    }

    request.log.error({ event: 'error', error: error.message }, 'Unhandled error');
    return reply.code(500).send(errorBody('internal server error'));
  });

  const pipeline = new DeploymentPipeline({
    settings,
    resolver: new StackResolver(settings.stacksRoot),
    runner: overrides.runner ?? new CommandRunner(app.log),
    secrets: overrides.secrets ?? createSecretsProvider(settings, app.log),
    lock: overrides.lock ?? new StackLock(settings.stackLockEnabled),
    logger: app.log,
    clock: overrides.clock,
  });

  app.register(healthRoutes);
  app.register(metricsRoutes);
  app.register(deployRoutes, { pipeline, deploySecret: settings.deploySecret });

  return app;
};
