import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

/**
 * Find the git root directory starting from a given path.
 */
export function findGitRoot(startPath: string): string | undefined {
  let current = resolve(startPath);
  while (current !== dirname(current)) {
    if (existsSync(join(current, '.git'))) {
      return current;
    }
    current = dirname(current);
  }
  return undefined;
}

/**
 * Directory config discovery stops at: the explicit workspace, else the git
 * root above `from`. `undefined` lets discovery walk to the filesystem root.
 */
export function resolveWorkspaceRoot(override: string | undefined, from: string): string | undefined {
  if (override) {
    return resolve(override);
  }
  return findGitRoot(from);
}
