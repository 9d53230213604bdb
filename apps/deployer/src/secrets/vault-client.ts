import type { FastifyBaseLogger } from 'fastify';

import { z } from 'zod';

const TOKEN_RENEW_MARGIN_MS = 60_000;

const loginResponseSchema = z.object({
  auth: z.object({
    client_token: z.string().min(1),
    lease_duration: z.number().int().nonnegative(),
  }),
});

const kvReadResponseSchema = z.object({
  data: z.object({
    data: z.record(z.unknown()).nullable(),
  }),
});

export interface VaultClientOptions {
  addr: string;
  roleId: string;
  secretId: string;
  mount?: string;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

export class VaultRequestError extends Error {
  constructor(
    message: string,
    readonly vaultStatus: number,
  ) {
    super(message);
    this.name = 'VaultRequestError';
  }
}

/**
 * Minimal Vault HTTP client: AppRole login and KV v2 reads. The client token
 * is reused until one minute before its lease ends.
 */
export class VaultClient {
  private token: string | null = null;
  private tokenExpiresAt = 0;
  private readonly mount: string;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(
    private readonly options: VaultClientOptions,
    private readonly logger: FastifyBaseLogger,
  ) {
    this.mount = options.mount ?? 'kv';
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async authenticate(): Promise<string> {
    const response = await this.fetchImpl(`${this.options.addr}/v1/auth/approle/login`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ role_id: this.options.roleId, secret_id: this.options.secretId }),
    });

    if (!response.ok) {
      this.logger.error({ statusCode: response.status }, 'Vault authentication failed');
      throw new VaultRequestError(`Vault authentication failed with status ${response.status}`, response.status);
    }

    const { auth } = loginResponseSchema.parse(await response.json());
    this.token = auth.client_token;
    this.tokenExpiresAt = this.now() + auth.lease_duration * 1000 - TOKEN_RENEW_MARGIN_MS;
    this.logger.info('Vault authenticated successfully');
    return this.token;
  }

  /** Reads one KV v2 path. A path that does not exist yields `{}`. */
  async getSecrets(path: string): Promise<Record<string, string>> {
    const token = await this.ensureToken();
    const url = `${this.options.addr}/v1/${this.mount}/data/${path.replace(/^\/+/, '')}`;
    const response = await this.fetchImpl(url, {
      method: 'GET',
      headers: { 'X-Vault-Token': token },
    });

    if (response.status === 404) {
      this.logger.warn({ path }, 'No secrets found at Vault path');
      return {};
    }
    if (!response.ok) {
      throw new VaultRequestError(`Vault read of ${path} failed with status ${response.status}`, response.status);
    }

    const { data } = kvReadResponseSchema.parse(await response.json());
    const secrets: Record<string, string> = {};
    for (const [key, value] of Object.entries(data.data ?? {})) {
      if (value === null || value === undefined) {
        continue;
      }
      secrets[key] = typeof value === 'string' ? value : JSON.stringify(value);
    }
    return secrets;
  }

  /** Reads several paths and merges them; later paths win. */
  async getAllSecretsForStack(stack: string, paths: string[]): Promise<Record<string, string>> {
    const merged: Record<string, string> = {};
    for (const path of paths) {
      const secrets = await this.getSecrets(path);
      const count = Object.keys(secrets).length;
      if (count > 0) {
        this.logger.info({ stack, path, count }, 'Loaded secrets from Vault');
      }
      Object.assign(merged, secrets);
    }
    return merged;
  }

  private async ensureToken(): Promise<string> {
    if (this.token && this.now() < this.tokenExpiresAt) {
      return this.token;
    }
    return this.authenticate();
  }
}
