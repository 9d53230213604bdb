import type { StepName } from '@stackhook/shared';
import type { FastifyBaseLogger } from 'fastify';

import type { Settings } from '../config/env.js';
import { fail, succeed, type Outcome } from '../core/outcome.js';
import type { StepExecutor, StepResult } from '../core/run-command.js';
import type { StackLock } from '../core/stack-lock.js';
import type { ResolvedStack, StackResolver } from '../core/stack-resolver.js';
import { recordDeployment, recordStep } from '../lib/observability.js';
import type { StackSecretsProvider } from '../secrets/stack-secrets.js';

export const NO_RUNNING_SERVICES_NOTICE = 'No running services found; aborting deploy.';

interface StepPlan {
  name: StepName;
  args: string[];
}

/** Fixed order; each step only runs if the previous one succeeded. */
export const STEP_PLAN: readonly StepPlan[] = [
  { name: 'status', args: ['compose', 'ps', '--status=running', '--services'] },
  { name: 'config', args: ['compose', 'config'] },
  { name: 'pull', args: ['compose', 'pull'] },
  { name: 'up', args: ['compose', 'up', '-d', '--remove-orphans'] },
];

export interface DeploymentRun {
  stack: string;
  steps: StepResult[];
  startedAt: Date;
  finishedAt: Date;
}

export interface PipelineDependencies {
  settings: Pick<Settings, 'timeouts' | 'dockerBin'>;
  resolver: StackResolver;
  runner: StepExecutor;
  secrets: StackSecretsProvider;
  lock: StackLock;
  logger: FastifyBaseLogger;
  clock?: () => Date;
}

export const countListedServices = (tail: string) =>
  tail
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0).length;

/**
 * A stack with nothing running is treated as not deployable, so a status
 * step that lists no services fails even when the command exited 0.
 */
export const requireRunningServices = (result: StepResult): StepResult => {
  if (!result.ok || countListedServices(result.tail) > 0) {
    return result;
  }

  return { ...result, ok: false, tail: `${result.tail}\n${NO_RUNNING_SERVICES_NOTICE}` };
};

export class DeploymentPipeline {
  private readonly clock: () => Date;

  constructor(private readonly deps: PipelineDependencies) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async deploy(stack: string): Promise<Outcome<DeploymentRun>> {
    const resolved = await this.deps.resolver.resolve(stack);
    if (!resolved.ok) {
      return resolved;
    }

    const locked = await this.deps.lock.withLock(resolved.value.name, () => this.runSteps(resolved.value));
    if (!locked.acquired) {
      this.deps.logger.warn({ event: 'deploy_rejected', stack }, 'Deployment already in progress');
      recordDeployment('rejected');
      return fail('conflict', 'deployment already in progress');
    }

    return succeed(locked.value);
  }

  private async runSteps(target: ResolvedStack): Promise<DeploymentRun> {
    const { logger, runner, settings } = this.deps;

    const registryEnv = await this.deps.resolver.registryEnv(target.path);
    const secrets = await this.deps.secrets.secretsFor(target.name, target.manifestPath);
    const env = { ...secrets, ...registryEnv };
    const redact = Object.values(secrets);

    const startedAt = this.clock();
    logger.info(
      {
        event: 'deploy_start',
        stack: target.name,
        dockerConfig: registryEnv.DOCKER_CONFIG ?? null,
        injectedSecrets: Object.keys(secrets).length,
      },
      'Deployment started',
    );

    const steps: StepResult[] = [];
    for (const plan of STEP_PLAN) {
      let result = await runner.run({
        stack: target.name,
        name: plan.name,
        args: [settings.dockerBin, ...plan.args],
        cwd: target.path,
        timeoutMs: settings.timeouts[plan.name],
        env,
        redact,
      });

      if (plan.name === 'status') {
        result = requireRunningServices(result);
      }

      recordStep({ step: result.name, ok: result.ok, durationMs: result.durationMs });
      steps.push(result);
      if (!result.ok) {
        break;
      }
    }

    const ok = steps.every((step) => step.ok);
    logger.info({ event: 'deploy_done', stack: target.name, ok }, 'Deployment finished');
    recordDeployment(ok ? 'succeeded' : 'failed');

    return { stack: target.name, steps, startedAt, finishedAt: this.clock() };
  }
}
