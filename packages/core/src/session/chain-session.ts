import type { StoredResponse, StoreResponseInput } from '../types';
import { getIgnoreCase } from '../utils/case-insensitive';
import { navigateBodyPath, parseJsonBody, queryJsonPath, stringifyLeaf } from './body-path';

/**
 * `{{name.response.body}}`, `{{name.response.body.path}}` and
 * `{{name.response.headers.Header}}`.
 */
const CHAIN_REFERENCE_PATTERN =
  /\{\{([A-Za-z_][A-Za-z0-9_]*)\.response\.(body|headers)(?:\.([^}]+))?\}\}/g;

/**
 * Named responses of the current session, used to resolve references to
 * earlier requests.
 *
 * Every operation is synchronous, so store, resolve and clear never
 * interleave even when several requests run concurrently.
 */
export interface ChainSession {
  /**
   * Store (or replace) the response for `name`, compared ignoring case.
   * The body is parsed as JSON when possible; other bodies stay plain text.
   */
  storeResponse(name: string, response: StoreResponseInput): void;

  /**
   * Replace chain references in `text` in one pass. References that cannot
   * be resolved are left unchanged.
   */
  resolveChainReferences(text: string): string;

  /** Drop every stored response. */
  clearSession(): void;

  /** A copy of the stored response; changing it does not affect the session. */
  getResponse(name: string): StoredResponse | undefined;

  /** Stored request names, in their original spelling. */
  getStoredNames(): string[];

  readonly size: number;
}

export type ChainSessionOptions = {
  now?: () => Date;
};

export function createChainSession(options: ChainSessionOptions = {}): ChainSession {
  const now = options.now ?? (() => new Date());
  // Keyed by lower-cased name; each entry keeps the name as it was stored.
  const entries = new Map<string, { name: string; response: StoredResponse }>();

  function resolveReference(
    name: string,
    kind: 'body' | 'headers',
    path: string | undefined
  ): string | undefined {
    const response = entries.get(name.toLowerCase())?.response;
    if (!response) return undefined;

    if (kind === 'headers') {
      return path ? getIgnoreCase(response.headers, path) : undefined;
    }

    if (!path) return response.body;
    if (response.json === undefined) return undefined;

    const value = path.startsWith('$')
      ? queryJsonPath(response.json, path)
      : navigateBodyPath(response.json, path);
    return value === undefined ? undefined : stringifyLeaf(value);
  }

  return {
    storeResponse(name, response) {
      if (!name) return;

      const stored: StoredResponse = {
        status: response.status,
        headers: { ...response.headers },
        body: response.body,
        storedAt: now()
      };
      const json = parseJsonBody(response.body);
      if (json !== undefined) stored.json = json;

      entries.set(name.toLowerCase(), { name, response: stored });
    },

    resolveChainReferences(text) {
      if (!text || entries.size === 0) return text;

      return text.replace(
        CHAIN_REFERENCE_PATTERN,
        (match: string, name: string, kind: 'body' | 'headers', path: string | undefined) =>
          resolveReference(name, kind, path) ?? match
      );
    },

    clearSession() {
      entries.clear();
    },

    getResponse(name) {
      const response = entries.get(name.toLowerCase())?.response;
      if (!response) return undefined;
      const copy: StoredResponse = {
        status: response.status,
        headers: { ...response.headers },
        body: response.body,
        storedAt: new Date(response.storedAt.getTime())
      };
      const json = parseJsonBody(response.body);
      if (json !== undefined) copy.json = json;
      return copy;
    },

    getStoredNames() {
      return [...entries.values()].map((entry) => entry.name);
    },

    get size() {
      return entries.size;
    }
  };
}
