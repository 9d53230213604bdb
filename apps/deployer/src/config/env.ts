import 'dotenv/config';

import { statSync } from 'fs';
import { resolve } from 'path';

import { z } from 'zod';

const booleanFromEnv = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return value;
}, z.boolean());

const optionalString = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}, z.string().optional());

const timeoutSeconds = (fallback: number) => z.coerce.number().positive().max(86_400).default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  TRUST_PROXY: booleanFromEnv.optional(),
  DEPLOY_SECRET: z.string({ required_error: 'DEPLOY_SECRET must be set (fail-closed).' }).min(1, 'DEPLOY_SECRET must be set (fail-closed).'),
  STACKS_ROOT: z.string().min(1).default('/stacks'),
  RATE_LIMIT_PER_MIN: z.coerce.number().int().min(1).default(10),
  RATE_LIMIT_MAX_CLIENTS: z.coerce.number().int().min(1).default(10_000),
  STATUS_TIMEOUT: timeoutSeconds(60),
  CONFIG_TIMEOUT: timeoutSeconds(120),
  PULL_TIMEOUT: timeoutSeconds(600),
  UP_TIMEOUT: timeoutSeconds(600),
  DOCKER_BIN: z.string().min(1).default('docker'),
  STACK_LOCK_ENABLED: booleanFromEnv.optional(),
  VAULT_ADDR: optionalString.pipe(z.string().url().optional()),
  VAULT_ROLE_ID: optionalString,
  VAULT_SECRET_ID: optionalString,
  VAULT_KV_MOUNT: z.string().min(1).default('kv'),
  VAULT_SECRET_PATHS: z.string().default('stacks/{stack}'),
  SECRETS_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(300),
});

export type LogLevel = NonNullable<z.infer<typeof envSchema>['LOG_LEVEL']>;

export interface StepTimeouts {
  status: number;
  config: number;
  pull: number;
  up: number;
}

export interface VaultSettings {
  addr: string;
  roleId: string;
  secretId: string;
  mount: string;
  paths: string[];
  cacheTtlMs: number;
}

export interface Settings {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  host: string;
  logLevel: LogLevel;
  trustProxy: boolean;
  deploySecret: Buffer;
  stacksRoot: string;
  rateLimitPerMinute: number;
  rateLimitMaxClients: number;
  /** Per-step command timeouts in milliseconds. */
  timeouts: StepTimeouts;
  dockerBin: string;
  stackLockEnabled: boolean;
  vault: VaultSettings | null;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const describeIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`).join('; ');

const parsePathTemplates = (raw: string) =>
  raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

/**
 * Builds the process settings from environment variables. Called once at
 * startup; the returned object is frozen and handed to every component.
 */
export const loadSettings = (source: NodeJS.ProcessEnv = process.env): Readonly<Settings> => {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${describeIssues(result.error)}`);
  }

  const parsed = result.data;
  const stacksRoot = resolve(parsed.STACKS_ROOT);

  let rootIsDirectory = false;
  try {
    rootIsDirectory = statSync(stacksRoot).isDirectory();
  } catch {
    rootIsDirectory = false;
  }
  if (!rootIsDirectory) {
    throw new ConfigurationError(`Stacks root not found: ${stacksRoot}`);
  }

  const vault =
    parsed.VAULT_ADDR && parsed.VAULT_ROLE_ID && parsed.VAULT_SECRET_ID
      ? {
          addr: parsed.VAULT_ADDR.replace(/\/+$/, ''),
          roleId: parsed.VAULT_ROLE_ID,
          secretId: parsed.VAULT_SECRET_ID,
          mount: parsed.VAULT_KV_MOUNT,
          paths: parsePathTemplates(parsed.VAULT_SECRET_PATHS),
          cacheTtlMs: parsed.SECRETS_CACHE_TTL_SECONDS * 1000,
        }
      : null;

  return Object.freeze({
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL ?? (parsed.NODE_ENV === 'production' ? 'info' : 'debug'),
    trustProxy: parsed.TRUST_PROXY ?? false,
    deploySecret: Buffer.from(parsed.DEPLOY_SECRET, 'utf8'),
    stacksRoot,
    rateLimitPerMinute: parsed.RATE_LIMIT_PER_MIN,
    rateLimitMaxClients: parsed.RATE_LIMIT_MAX_CLIENTS,
    timeouts: Object.freeze({
      status: parsed.STATUS_TIMEOUT * 1000,
      config: parsed.CONFIG_TIMEOUT * 1000,
      pull: parsed.PULL_TIMEOUT * 1000,
      up: parsed.UP_TIMEOUT * 1000,
    }),
    dockerBin: parsed.DOCKER_BIN,
    stackLockEnabled: parsed.STACK_LOCK_ENABLED ?? true,
    vault,
  });
};
