import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { CommandSpec, StepExecutor, StepResult } from '../src/core/run-command.js';
import { StackLock } from '../src/core/stack-lock.js';
import { StackResolver } from '../src/core/stack-resolver.js';
import {
  countListedServices,
  DeploymentPipeline,
  NO_RUNNING_SERVICES_NOTICE,
  requireRunningServices,
} from '../src/pipeline/deployment-pipeline.js';
import { buildDeployResponse } from '../src/pipeline/response-builder.js';
import { noStackSecrets, type StackSecretsProvider } from '../src/secrets/stack-secrets.js';
import { createStack, makeSettings, makeTempDir, removeDir, silentLogger } from './helpers.js';

const stepResult = (spec: CommandSpec, overrides: Partial<StepResult> = {}): StepResult => ({
  name: spec.name,
  ok: true,
  exitCode: 0,
  durationMs: 5,
  tail: spec.name === 'status' ? 'web\n' : '',
  ...overrides,
});

describe('DeploymentPipeline', () => {
  let root: string;
  let stackDir: string;
  let lock: StackLock;
  const started = new Date('2024-05-01T10:00:00.000Z');
  const finished = new Date('2024-05-01T10:01:30.000Z');

  beforeEach(async () => {
    root = await makeTempDir('stackhook-pipeline-');
    stackDir = await createStack(root, 'web');
    lock = new StackLock();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  const createPipeline = (runner: StepExecutor, secrets: StackSecretsProvider = noStackSecrets) => {
    const clock = vi.fn<() => Date>().mockReturnValueOnce(started).mockReturnValueOnce(finished);
    const settings = makeSettings(root, {
      dockerBin: 'docker',
      timeouts: { status: 1_000, config: 2_000, pull: 3_000, up: 4_000 },
    });
    return new DeploymentPipeline({
      settings,
      resolver: new StackResolver(root),
      runner,
      secrets,
      lock,
      logger: silentLogger(),
      clock,
    });
  };

  it('runs all four steps in order when each succeeds', async () => {
    const run = vi.fn(async (spec: CommandSpec) => stepResult(spec));
    const outcome = await createPipeline({ run }).deploy('web');

    expect(outcome.ok).toBe(true);
    expect(run.mock.calls.map(([spec]) => [spec.name, spec.args, spec.timeoutMs, spec.cwd])).toEqual([
      ['status', ['docker', 'compose', 'ps', '--status=running', '--services'], 1_000, stackDir],
      ['config', ['docker', 'compose', 'config'], 2_000, stackDir],
      ['pull', ['docker', 'compose', 'pull'], 3_000, stackDir],
      ['up', ['docker', 'compose', 'up', '-d', '--remove-orphans'], 4_000, stackDir],
    ]);

    if (!outcome.ok) {
      return;
    }
    const response = buildDeployResponse(outcome.value);
    expect(response.statusCode).toBe(200);
    expect(response.body.ok).toBe(true);
    expect(response.body.steps).toHaveLength(4);
    expect(response.body.started_at).toBe('2024-05-01T10:00:00.000Z');
    expect(response.body.finished_at).toBe('2024-05-01T10:01:30.000Z');
  });

  it('stops after status when no services are running', async () => {
    const run = vi.fn(async (spec: CommandSpec) => stepResult(spec, { tail: '' }));
    const outcome = await createPipeline({ run }).deploy('web');

    expect(run).toHaveBeenCalledTimes(1);
    expect(outcome).toEqual({
      ok: true,
      value: {
        stack: 'web',
        startedAt: started,
        finishedAt: finished,
        steps: [{ name: 'status', ok: false, exitCode: 0, durationMs: 5, tail: `\n${NO_RUNNING_SERVICES_NOTICE}` }],
      },
    });
  });

  it('stops at the first failing step', async () => {
    const run = vi.fn(async (spec: CommandSpec) =>
      stepResult(spec, spec.name === 'pull' ? { ok: false, exitCode: 1, tail: 'manifest unknown' } : {}),
    );
    const outcome = await createPipeline({ run }).deploy('web');

    expect(run.mock.calls.map(([spec]) => spec.name)).toEqual(['status', 'config', 'pull']);
    if (!outcome.ok) {
      throw new Error('expected a run');
    }
    const response = buildDeployResponse(outcome.value);
    expect(response.statusCode).toBe(500);
    expect(response.body.ok).toBe(false);
    expect(response.body.steps.map((step) => [step.name, step.ok])).toEqual([
      ['status', true],
      ['config', true],
      ['pull', false],
    ]);
  });

  it('stops at a timed out step', async () => {
    const run = vi.fn(async (spec: CommandSpec) =>
      stepResult(spec, spec.name === 'config' ? { ok: false, exitCode: null, tail: 'timed out after 2s' } : {}),
    );
    const outcome = await createPipeline({ run }).deploy('web');

    expect(run).toHaveBeenCalledTimes(2);
    if (!outcome.ok) {
      throw new Error('expected a run');
    }
    expect(buildDeployResponse(outcome.value).body.steps[1]).toEqual({
      name: 'config',
      ok: false,
      exit_code: null,
      duration_ms: 5,
      tail: 'timed out after 2s',
    });
  });

  it('passes registry config and stack secrets to every step', async () => {
    await mkdir(join(stackDir, '.docker'));
    await writeFile(join(stackDir, '.docker', 'config.json'), '{}');
    const secrets: StackSecretsProvider = { secretsFor: vi.fn(async () => ({ DB_PASSWORD: 'swordfish-1' })) };
    const run = vi.fn(async (spec: CommandSpec) => stepResult(spec));

    await createPipeline({ run }, secrets).deploy('web');

    expect(secrets.secretsFor).toHaveBeenCalledWith('web', join(stackDir, 'docker-compose.yml'));
    for (const [spec] of run.mock.calls) {
      expect(spec.env).toEqual({ DB_PASSWORD: 'swordfish-1', DOCKER_CONFIG: join(stackDir, '.docker') });
      expect(spec.redact).toEqual(['swordfish-1']);
    }
  });

  it('returns resolution failures without running anything', async () => {
    const run = vi.fn(async (spec: CommandSpec) => stepResult(spec));
    const pipeline = createPipeline({ run });

    await expect(pipeline.deploy('../web')).resolves.toEqual({
      ok: false,
      failure: { kind: 'bad_request', detail: 'invalid stack name' },
    });
    await expect(pipeline.deploy('nope')).resolves.toEqual({
      ok: false,
      failure: { kind: 'not_found', detail: 'stack not found' },
    });
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects a second deployment of a busy stack', async () => {
    const run = vi.fn(async (spec: CommandSpec) => stepResult(spec));
    lock.tryAcquire('web');

    await expect(createPipeline({ run }).deploy('web')).resolves.toEqual({
      ok: false,
      failure: { kind: 'conflict', detail: 'deployment already in progress' },
    });
    expect(run).not.toHaveBeenCalled();
  });

  it('releases the stack lock when a step throws', async () => {
    const run = vi.fn(async (): Promise<StepResult> => {
      throw new Error('spawn docker ENOENT');
    });

    await expect(createPipeline({ run }).deploy('web')).rejects.toThrow('spawn docker ENOENT');
    expect(lock.isHeld('web')).toBe(false);
  });
});

describe('requireRunningServices', () => {
  const status: StepResult = { name: 'status', ok: true, exitCode: 0, durationMs: 1, tail: '' };

  it('counts non-blank lines', () => {
    expect(countListedServices('web\n\n  db  \n')).toBe(2);
    expect(countListedServices(' \n')).toBe(0);
  });

  it('keeps a status step that lists services', () => {
    const listed = { ...status, tail: 'web\n' };
    expect(requireRunningServices(listed)).toBe(listed);
  });

  it('leaves an already failed status step unchanged', () => {
    const failed = { ...status, ok: false, exitCode: 1, tail: 'no such service' };
    expect(requireRunningServices(failed)).toBe(failed);
  });
});
