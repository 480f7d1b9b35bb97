import { access, readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { ConfigError, getErrorMessage } from '../errors';
import { parseJsonc } from './jsonc';
import { type ConfigFormat, type ConfigInput, ConfigSchema, type LoadedConfig } from './types';

export type LoadConfigOptions =
  | { path: string }
  | { startDir: string; filename?: string; stopDir?: string };

// Config file discovery order (preferred first)
const CONFIG_FILES: Array<{ filename: string; format: ConfigFormat }> = [
  { filename: 'reqchain.jsonc', format: 'jsonc' },
  { filename: 'reqchain.json', format: 'json' }
];

async function fileExists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

function getFormatFromFilename(filename: string): ConfigFormat {
  return filename.endsWith('.jsonc') ? 'jsonc' : 'json';
}

/**
 * Find config file by walking up from startDir.
 * Returns the first matching config file found.
 */
async function findUp(
  startDir: string,
  filename: string | undefined,
  stopDir?: string
): Promise<{ path: string; format: ConfigFormat } | undefined> {
  let dir = path.resolve(startDir);
  const stop = stopDir ? path.resolve(stopDir) : undefined;
  const candidates = filename
    ? [{ filename, format: getFormatFromFilename(filename) }]
    : CONFIG_FILES;

  while (true) {
    for (const { filename: fname, format } of candidates) {
      const candidate = path.join(dir, fname);
      if (await fileExists(candidate)) {
        return { path: candidate, format };
      }
    }

    if (stop && dir === stop) return undefined;

    const parent = path.dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

/**
 * Validate decoded config against the schema.
 *
 * @throws {ConfigError} naming the first offending field
 */
export function validateConfig(input: unknown, source = '<memory>'): ConfigInput {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(source, `${where}${issue?.message ?? 'invalid config'}`);
  }
  return result.data;
}

async function loadConfigFile(configPath: string): Promise<ConfigInput> {
  const content = await readFile(configPath, 'utf-8');
  let decoded: unknown;
  try {
    // JSONC is a superset of JSON, so both formats share the parser.
    decoded = parseJsonc(content);
  } catch (err) {
    throw new ConfigError(configPath, getErrorMessage(err));
  }
  return validateConfig(decoded, configPath);
}

/**
 * Load config from an explicit path or by searching upwards.
 *
 * Discovery order (when searching):
 * 1. reqchain.jsonc (preferred)
 * 2. reqchain.json
 *
 * A missing file yields an empty config.
 *
 * @throws {ConfigError} when the file exists but is invalid
 */
export async function loadConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  let configPath: string;
  let format: ConfigFormat;

  if ('path' in options) {
    configPath = path.resolve(options.path);
    format = getFormatFromFilename(configPath);
    if (!(await fileExists(configPath))) {
      return { config: {} };
    }
  } else {
    const found = await findUp(options.startDir, options.filename, options.stopDir);
    if (!found) {
      return { config: {} };
    }
    configPath = found.path;
    format = found.format;
  }

  const config = await loadConfigFile(configPath);
  return { path: configPath, config, format };
}
