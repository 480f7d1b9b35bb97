import { getErrorMessage } from '../errors';
import { createNodeIO } from '../runtime/node-io';
import type { EngineEvent } from '../runtime/types';
import type { VariableResolverConfig } from '../types';
import { findKey, getIgnoreCase, setIgnoreCase } from '../utils/case-insensitive';
import { type BuiltinContext, BUILTIN_SIGIL, resolveBuiltin } from './builtins';
import {
  DEFAULT_ENVIRONMENT,
  type EnvironmentDocument,
  listEnvironments,
  loadEnvironmentFile,
  normalizeEnvironmentDocument,
  selectEnvironment
} from './environment';
import { replacePlaceholders } from './template';

export type VariableMap = Readonly<Record<string, string>>;

/**
 * Resolves `{{name}}` placeholders against request-local variables,
 * file variables, the selected environment and built-in generators.
 */
export interface VariableResolver {
  /**
   * Replace every placeholder in one pass. Unknown names are left as-is and
   * resolved values are never scanned again.
   */
  resolve(text: string, localVariables?: VariableMap, fileVariables?: VariableMap): string;

  /**
   * Load an environment document from disk. A missing file clears the
   * environment; an invalid one clears it and emits an `error` event.
   */
  loadEnvironment(path: string): Promise<void>;

  /** Replace the environment document with an in-memory one. */
  loadEnvironmentDocument(doc: unknown): void;

  /** Select the environment used from the next resolution on. */
  setEnvironment(name: string): void;

  getEnvironment(): string;

  getEnvironmentNames(): string[];

  /**
   * Effective environment variables:
   * config variables < `$shared` < environment < `setVariable`
   */
  getEnvironmentVariables(): Record<string, string>;

  /** Set a variable that takes precedence over environment entries. */
  setVariable(name: string, value: string): void;
}

export function createVariableResolver(config: VariableResolverConfig = {}): VariableResolver {
  const io = config.io ?? createNodeIO();
  const onEvent = config.onEvent;
  const builtinContext: BuiltinContext = {
    now: config.now ?? (() => new Date()),
    random: config.random ?? Math.random,
    processEnv: config.processEnv ?? process.env
  };

  let document: EnvironmentDocument = {};
  let environment = config.environment ?? DEFAULT_ENVIRONMENT;
  const baseVariables = { ...(config.variables ?? {}) };
  const overrides: Record<string, string> = {};

  function emit(event: EngineEvent): void {
    onEvent?.(event);
  }

  function environmentVariables(): Record<string, string> {
    const vars = selectEnvironment(document, environment);
    for (const [key, value] of Object.entries(baseVariables)) {
      if (findKey(vars, key) === undefined) vars[key] = value;
    }
    for (const [key, value] of Object.entries(overrides)) {
      setIgnoreCase(vars, key, value);
    }
    return vars;
  }

  function lookup(
    name: string,
    localVariables: VariableMap | undefined,
    fileVariables: VariableMap | undefined,
    envVariables: Record<string, string>
  ): string | undefined {
    if (name.startsWith(BUILTIN_SIGIL)) {
      return resolveBuiltin(name, builtinContext);
    }
    return (
      (localVariables && getIgnoreCase(localVariables, name)) ??
      (fileVariables && getIgnoreCase(fileVariables, name)) ??
      getIgnoreCase(envVariables, name)
    );
  }

  return {
    resolve(text, localVariables, fileVariables) {
      if (!text) return text;
      const envVariables = environmentVariables();
      return replacePlaceholders(text, (name) =>
        lookup(name, localVariables, fileVariables, envVariables)
      );
    },

    async loadEnvironment(path) {
      try {
        document = await loadEnvironmentFile(path, io);
        emit({ type: 'environmentLoaded', path, environments: listEnvironments(document) });
      } catch (err) {
        document = {};
        emit({ type: 'error', stage: 'environment', message: getErrorMessage(err) });
      }
    },

    loadEnvironmentDocument(doc) {
      document = normalizeEnvironmentDocument(doc);
    },

    setEnvironment(name) {
      environment = name || DEFAULT_ENVIRONMENT;
    },

    getEnvironment() {
      return environment;
    },

    getEnvironmentNames() {
      return listEnvironments(document);
    },

    getEnvironmentVariables() {
      return environmentVariables();
    },

    setVariable(name, value) {
      setIgnoreCase(overrides, name, value);
    }
  };
}
