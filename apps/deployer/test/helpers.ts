import { mkdir, mkdtemp, realpath, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import pino from 'pino';
import { z } from 'zod';

import type { Settings } from '../src/config/env.js';

export const TEST_SECRET = 'test-secret';

const logLineSchema = z.record(z.unknown());

export const silentLogger = () => pino({ level: 'silent' });

export const captureLogger = () => {
  const lines: Array<Record<string, unknown>> = [];
  const raw: string[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        raw.push(line);
        lines.push(logLineSchema.parse(JSON.parse(line)));
      },
    },
  );
  return { logger, lines, raw };
};

export const makeTempDir = async (prefix = 'stackhook-') => realpath(await mkdtemp(join(tmpdir(), prefix)));

export const removeDir = (dir: string) => rm(dir, { recursive: true, force: true });

export const createStack = async (root: string, name: string, manifest = 'services:\n  web:\n    image: nginx\n') => {
  const dir = join(root, name);
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, 'docker-compose.yml'), manifest);
  return dir;
};

export const makeSettings = (stacksRoot: string, overrides: Partial<Settings> = {}): Settings => ({
  nodeEnv: 'test',
  port: 0,
  host: '127.0.0.1',
  logLevel: 'silent',
  trustProxy: false,
  deploySecret: Buffer.from(TEST_SECRET, 'utf8'),
  stacksRoot,
  rateLimitPerMinute: 1000,
  rateLimitMaxClients: 100,
  timeouts: { status: 60_000, config: 120_000, pull: 600_000, up: 600_000 },
  dockerBin: 'docker',
  stackLockEnabled: true,
  vault: null,
  ...overrides,
});
