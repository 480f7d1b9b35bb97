import * as path from 'node:path';
import { DEFAULT_MAX_REDIRECTS, DEFAULT_TIMEOUT_MS } from '../execute';
import { DEFAULT_ENVIRONMENT, DEFAULT_ENVIRONMENT_FILE } from '../resolver/environment';
import type {
  DefaultsInput,
  ExecutorOverrides,
  LoadedConfig,
  ResolvedExecutorOptions
} from './types';

export type ResolveExecutorOptionsInput = {
  loaded: LoadedConfig;
  overrides?: ExecutorOverrides;
  /** Directory of the `.http` file; used when no config file was found */
  baseDir: string;
};

/**
 * Merge built-in defaults < config file < command-line overrides.
 *
 * A relative `environmentFile` from the config resolves against the config
 * file's directory; one from the command line against the working directory.
 */
export function resolveExecutorOptions(input: ResolveExecutorOptionsInput): ResolvedExecutorOptions {
  const { loaded, baseDir } = input;
  const overrides: ExecutorOverrides = input.overrides ?? {};
  const config = loaded.config;
  const defaults: DefaultsInput = config.defaults ?? {};
  const configDir = loaded.path ? path.dirname(loaded.path) : baseDir;

  const environmentFile = overrides.environmentFile
    ? path.resolve(overrides.environmentFile)
    : path.resolve(configDir, config.environmentFile ?? DEFAULT_ENVIRONMENT_FILE);

  return {
    timeoutMs: overrides.timeoutMs ?? defaults.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    followRedirects: overrides.followRedirects ?? defaults.followRedirects ?? true,
    maxRedirects: overrides.maxRedirects ?? defaults.maxRedirects ?? DEFAULT_MAX_REDIRECTS,
    headerDefaults: { ...(defaults.headers ?? {}) },
    environment: overrides.environment ?? config.environment ?? DEFAULT_ENVIRONMENT,
    environmentFile,
    variables: { ...(config.variables ?? {}) }
  };
}
