import type { DeployEnvelope, StepReport } from '@stackhook/shared';

import type { StepResult } from '../core/run-command.js';
import type { DeploymentRun } from './deployment-pipeline.js';

export interface RenderedResponse<T> {
  statusCode: number;
  body: T;
}

export const toStepReport = (step: StepResult): StepReport => ({
  name: step.name,
  ok: step.ok,
  exit_code: step.exitCode,
  duration_ms: step.durationMs,
  tail: step.tail,
});

/**
 * Overall verdict is the conjunction of the attempted steps; steps that never
 * ran are absent rather than reported as skipped.
 */
export const buildDeployResponse = (run: DeploymentRun): RenderedResponse<DeployEnvelope> => {
  const ok = run.steps.every((step) => step.ok);

  return {
    statusCode: ok ? 200 : 500,
    body: {
      ok,
      stack: run.stack,
      steps: run.steps.map(toStepReport),
      started_at: run.startedAt.toISOString(),
      finished_at: run.finishedAt.toISOString(),
    },
  };
};
