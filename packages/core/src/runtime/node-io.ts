import { access, readFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { IO } from './types';

async function exists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Node IO adapter (fs + path) for `.http` files and environment documents.
 */
export function createNodeIO(): IO {
  return {
    cwd: () => process.cwd(),
    path: {
      resolve: (...parts) => path.resolve(...parts),
      dirname: (p) => path.dirname(p),
      basename: (p) => path.basename(p),
      isAbsolute: (p) => path.isAbsolute(p)
    },
    exists,
    readText: async (p) => await readFile(p, 'utf8')
  };
}
