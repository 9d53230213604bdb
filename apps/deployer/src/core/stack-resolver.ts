import { access, realpath, stat } from 'fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'path';

import { fail, succeed, type Outcome } from './outcome.js';

export const STACK_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;
export const MANIFEST_FILE = 'docker-compose.yml';

export interface ResolvedStack {
  name: string;
  path: string;
  manifestPath: string;
}

const MISSING_CODES: ReadonlySet<unknown> = new Set(['ENOENT', 'ENOTDIR', 'ENAMETOOLONG']);

const isMissing = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error && MISSING_CODES.has(error.code);

const pathExists = async (target: string) => {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
};

export const isWithinRoot = (root: string, candidate: string): boolean => {
  const rel = relative(root, candidate);
  if (rel === '') {
    return true;
  }
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
};

export const isValidStackName = (name: string): boolean => STACK_NAME_PATTERN.test(name);

export class StackResolver {
  constructor(private readonly stacksRoot: string) {}

  /**
   * Maps an untrusted stack name to its directory under the stacks root.
   * The name is checked before any filesystem access.
   */
  async resolve(name: string): Promise<Outcome<ResolvedStack>> {
    if (!isValidStackName(name)) {
      return fail('bad_request', 'invalid stack name');
    }

    let root: string;
    try {
      root = await realpath(this.stacksRoot);
    } catch (error) {
      if (isMissing(error)) {
        return fail('internal', 'stacks root missing');
      }
      throw error;
    }

    const lexical = resolve(root, name);
    let candidate: string;
    try {
      candidate = await realpath(lexical);
    } catch (error) {
      if (!isMissing(error)) {
        throw error;
      }
      candidate = lexical;
    }

    if (!isWithinRoot(root, candidate)) {
      return fail('bad_request', 'invalid stack path');
    }

    const isDirectory = await stat(candidate).then(
      (stats) => stats.isDirectory(),
      () => false,
    );
    if (!isDirectory) {
      return fail('not_found', 'stack not found');
    }

    const manifestPath = join(candidate, MANIFEST_FILE);
    if (!(await pathExists(manifestPath))) {
      return fail('bad_request', `${MANIFEST_FILE} missing`);
    }

    return succeed({ name, path: candidate, manifestPath });
  }

  /**
   * Points the compose CLI at a stack-local registry config when the stack
   * carries `.docker/config.json`.
   */
  async registryEnv(stackPath: string): Promise<Record<string, string>> {
    const configDir = join(stackPath, '.docker');
    if (await pathExists(join(configDir, 'config.json'))) {
      return { DOCKER_CONFIG: configDir };
    }
    return {};
  }
}
