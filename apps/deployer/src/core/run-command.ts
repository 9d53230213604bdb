import { spawn } from 'child_process';

import type { StepName } from '@stackhook/shared';
import type { FastifyBaseLogger } from 'fastify';

import { sanitizeTail } from './sanitize.js';

export interface StepResult {
  name: StepName;
  ok: boolean;
  exitCode: number | null;
  durationMs: number;
  tail: string;
}

export interface CommandSpec {
  stack: string;
  name: StepName;
  /** argv; the first entry is the executable. No shell is involved. */
  args: string[];
  cwd: string;
  timeoutMs: number;
  env?: Record<string, string>;
  /** Values to scrub from the output in addition to sensitive key lines. */
  redact?: string[];
}

export interface StepExecutor {
  run(spec: CommandSpec): Promise<StepResult>;
}

const elapsedMs = (startedNs: bigint) => Math.round(Number(process.hrtime.bigint() - startedNs) / 1e6);

const formatSeconds = (ms: number) => `${Number((ms / 1000).toFixed(3))}s`;

/**
 * Runs one external command with a hard timeout. Non-zero exits and timeouts
 * come back as failed step results; only a failure to start the process
 * rejects.
 */
export class CommandRunner implements StepExecutor {
  constructor(private readonly logger: FastifyBaseLogger) {}

  run(spec: CommandSpec): Promise<StepResult> {
    const [command, ...args] = spec.args;
    if (!command) {
      return Promise.reject(new Error(`No command given for step ${spec.name}`));
    }

    const startedNs = process.hrtime.bigint();

    return new Promise<StepResult>((resolve, reject) => {
      const chunks: Buffer[] = [];
      let settled = false;

      const child = spawn(command, args, {
        cwd: spec.cwd,
        env: { ...process.env, ...spec.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const collect = (chunk: Buffer | string) => {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      };
      child.stdout?.on('data', collect);
      child.stderr?.on('data', collect);

      const output = () => Buffer.concat(chunks).toString('utf8');

      const timer = setTimeout(() => {
        if (settled) {
          return;
        }
        settled = true;
        child.kill('SIGKILL');

        const durationMs = elapsedMs(startedNs);
        const partial = output();
        const notice = `timed out after ${formatSeconds(spec.timeoutMs)}`;
        this.logger.warn(
          { event: 'step_timeout', stack: spec.stack, step: spec.name, ok: false, exitCode: null, durationMs },
          'Deploy step timed out',
        );
        resolve({
          name: spec.name,
          ok: false,
          exitCode: null,
          durationMs,
          tail: sanitizeTail(partial ? `${partial}\n${notice}` : notice, spec.redact),
        });
      }, spec.timeoutMs);

      child.on('error', (error) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        reject(new Error(`Failed to start ${spec.name} command: ${error.message}`));
      });

      child.on('close', (code) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);

        const durationMs = elapsedMs(startedNs);
        const exitCode = typeof code === 'number' ? code : null;
        const ok = exitCode === 0;

        this.logger.info(
          { event: 'step', stack: spec.stack, step: spec.name, ok, exitCode, durationMs },
          'Deploy step finished',
        );
        resolve({
          name: spec.name,
          ok,
          exitCode,
          durationMs,
          tail: sanitizeTail(output(), spec.redact),
        });
      });
    });
  }
}
