import { z } from 'zod';
import { parseJsonc } from '../config/jsonc';
import { EnvironmentError, getErrorMessage } from '../errors';
import type { IO } from '../runtime/types';
import { findKey, setIgnoreCase } from '../utils/case-insensitive';

/** Section whose entries apply to every environment at lower precedence. */
export const SHARED_ENVIRONMENT = '$shared';

export const DEFAULT_ENVIRONMENT = 'dev';

export const DEFAULT_ENVIRONMENT_FILE = 'http-client.env.json';

/** Environment name → variable name → value. */
export type EnvironmentDocument = Record<string, Record<string, string>>;

const EnvironmentDocumentSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

/**
 * Validate a decoded environment document. Entries whose value is not a
 * string are dropped.
 *
 * @throws {EnvironmentError} when the document is not an object of objects
 */
export function normalizeEnvironmentDocument(
  input: unknown,
  source = '<memory>'
): EnvironmentDocument {
  const result = EnvironmentDocumentSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new EnvironmentError(source, `${issue?.message ?? 'invalid document'}${where}`);
  }

  const doc: EnvironmentDocument = {};
  for (const [envName, section] of Object.entries(result.data)) {
    const entries: Record<string, string> = {};
    for (const [key, value] of Object.entries(section)) {
      if (typeof value === 'string') entries[key] = value;
    }
    doc[envName] = entries;
  }
  return doc;
}

/**
 * Parse environment document text (JSON or JSONC).
 *
 * @throws {EnvironmentError} on syntax or shape errors
 */
export function parseEnvironmentDocument(content: string, source = '<memory>'): EnvironmentDocument {
  let decoded: unknown;
  try {
    decoded = parseJsonc(content);
  } catch (err) {
    throw new EnvironmentError(source, getErrorMessage(err));
  }
  return normalizeEnvironmentDocument(decoded, source);
}

/**
 * Read an environment document. A missing file is an empty document.
 *
 * @throws {EnvironmentError} when the file exists but is invalid
 */
export async function loadEnvironmentFile(path: string, io: IO): Promise<EnvironmentDocument> {
  if (!(await io.exists(path))) return {};
  const content = await io.readText(path);
  return parseEnvironmentDocument(content, path);
}

/**
 * Variables of one environment, with `$shared` entries filling in only the
 * keys the environment does not define (keys compared ignoring case).
 */
export function selectEnvironment(doc: EnvironmentDocument, name: string): Record<string, string> {
  const selected: Record<string, string> = {};

  const own = Object.prototype.hasOwnProperty.call(doc, name) ? doc[name] : undefined;
  for (const [key, value] of Object.entries(own ?? {})) {
    setIgnoreCase(selected, key, value);
  }

  const shared = doc[SHARED_ENVIRONMENT];
  for (const [key, value] of Object.entries(shared ?? {})) {
    if (findKey(selected, key) === undefined) selected[key] = value;
  }

  return selected;
}

/**
 * Names of the selectable environments (everything but `$shared`).
 */
export function listEnvironments(doc: EnvironmentDocument): string[] {
  return Object.keys(doc).filter((name) => name !== SHARED_ENVIRONMENT);
}
