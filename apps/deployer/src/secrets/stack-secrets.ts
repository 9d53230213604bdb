import { readFile } from 'fs/promises';

import { extractComposeVariables } from '../core/compose-variables.js';

export interface StackSecretsProvider {
  /** Environment variables to inject into every step of a stack's deployment. */
  secretsFor(stack: string, manifestPath: string): Promise<Record<string, string>>;
}

export interface SecretsSource {
  getAllSecretsForStack(stack: string, paths: string[]): Promise<Record<string, string>>;
}

export const noStackSecrets: StackSecretsProvider = {
  secretsFor: async () => ({}),
};

interface CacheEntry {
  secrets: Record<string, string>;
  expiresAt: number;
}

export const expandPathTemplate = (template: string, stack: string) => template.split('{stack}').join(stack);

/**
 * Fetches a stack's secrets from the configured paths, keeps only the
 * variables its manifest references, and caches the result per stack.
 */
export class CachedStackSecrets implements StackSecretsProvider {
  private readonly cache = new Map<string, CacheEntry>();

  constructor(
    private readonly source: SecretsSource,
    private readonly options: { paths: string[]; ttlMs: number; now?: () => number },
  ) {}

  async secretsFor(stack: string, manifestPath: string): Promise<Record<string, string>> {
    const now = (this.options.now ?? Date.now)();
    const cached = this.cache.get(stack);
    if (cached && now < cached.expiresAt) {
      return cached.secrets;
    }

    const referenced = extractComposeVariables(await readFile(manifestPath, 'utf8'));
    if (referenced.length === 0) {
      return {};
    }

    const paths = this.options.paths.map((template) => expandPathTemplate(template, stack));
    const available = await this.source.getAllSecretsForStack(stack, paths);

    const secrets: Record<string, string> = {};
    for (const name of referenced) {
      const value = available[name];
      if (value !== undefined) {
        secrets[name] = value;
      }
    }

    if (this.options.ttlMs > 0) {
      this.cache.set(stack, { secrets, expiresAt: now + this.options.ttlMs });
    }
    return secrets;
  }
}
