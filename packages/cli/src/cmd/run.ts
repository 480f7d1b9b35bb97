import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import {
  createExecutor,
  createVariableResolver,
  type EngineEvent,
  type ExecutionResult,
  type ExecutorConfig,
  type ExecutorOverrides,
  findRequestByName,
  getErrorMessage,
  loadConfig,
  parse,
  type ParsedDocument,
  type RequestDefinition,
  RequestNotFoundError,
  type ResolvedExecutorOptions,
  resolveExecutorOptions,
  setOptional,
  type Transport,
  type VariableResolverConfig
} from '@reqchain/core';
import type { CommandModule } from 'yargs';
import {
  formatEvent,
  formatRequestLine,
  formatResult,
  formatSummary,
  resultToJson
} from '../format';
import { resolveWorkspaceRoot } from '../utils/path';

export interface RunOptions {
  file: string;
  name?: string;
  line?: number;
  all?: boolean;
  env?: string;
  envFile?: string;
  var?: string[];
  timeout?: number;
  maxRedirects?: number;
  workspace?: string;
  verbose?: boolean;
  json?: boolean;
}

type DiscoveryOptions = { startDir: string; stopDir?: string };

/** Injected collaborators; tests swap the network for an in-process stub. */
export interface RunDeps {
  transport?: Transport;
  signal?: AbortSignal;
}

export const runCommand: CommandModule<object, RunOptions> = {
  command: 'run <file>',
  describe: 'Execute requests from a .http file',
  builder: {
    file: {
      type: 'string',
      describe: 'Path to .http file',
      demandOption: true
    },
    name: {
      type: 'string',
      describe: 'Select request by @name directive',
      alias: 'n',
      conflicts: ['line', 'all']
    },
    line: {
      type: 'number',
      describe: 'Select the request containing this line (1-based)',
      alias: 'l',
      conflicts: ['all']
    },
    all: {
      type: 'boolean',
      describe: 'Run every request in order, chaining named responses',
      alias: 'a'
    },
    env: {
      type: 'string',
      describe: 'Environment to select from the environment file',
      alias: 'e'
    },
    'env-file': {
      type: 'string',
      describe: 'Environment file (defaults to http-client.env.json next to the config)'
    },
    var: {
      type: 'array',
      string: true,
      describe: 'Variables in format key=value',
      alias: 'v'
    },
    timeout: {
      type: 'number',
      describe: 'Request timeout in milliseconds',
      alias: 't'
      // No default: the config file wins when this is not given
    },
    'max-redirects': {
      type: 'number',
      describe: 'Maximum number of redirects to follow (0 disables following)'
    },
    workspace: {
      type: 'string',
      describe: 'Workspace root directory',
      alias: 'w'
    },
    verbose: {
      type: 'boolean',
      describe: 'Show engine events and request details on stderr',
      default: false
    },
    json: {
      type: 'boolean',
      describe: 'Output results as JSON',
      default: false
    }
  },
  handler: async (argv) => {
    process.exitCode = await runFile(argv);
  }
};

// ============================================================================
// Utility Functions
// ============================================================================

export function parseVariables(vars: string[] | undefined): Record<string, string> {
  if (!vars) return {};
  const result: Record<string, string> = {};
  for (const v of vars) {
    const eqIndex = v.indexOf('=');
    if (eqIndex <= 0) {
      console.warn(`Warning: Invalid variable format "${v}", expected key=value`);
      continue;
    }
    const key = v.slice(0, eqIndex);
    const value = v.slice(eqIndex + 1);
    result[key] = value;
  }
  return result;
}

export function buildOverrides(argv: RunOptions): ExecutorOverrides {
  const overrides: ExecutorOverrides = {};
  if (argv.timeout !== undefined) overrides.timeoutMs = argv.timeout;
  if (argv.maxRedirects !== undefined) {
    overrides.maxRedirects = argv.maxRedirects;
    if (argv.maxRedirects === 0) overrides.followRedirects = false;
  }
  if (argv.env !== undefined) overrides.environment = argv.env;
  if (argv.envFile !== undefined) overrides.environmentFile = argv.envFile;
  return overrides;
}

function printAvailable(document: ParsedDocument): void {
  console.error('Available requests:');
  document.requests.forEach((request, index) => {
    console.error(formatRequestLine(index, request));
  });
}

function selectRequests(
  argv: RunOptions,
  document: ParsedDocument
): readonly RequestDefinition[] | RequestNotFoundError {
  if (argv.all) return document.requests;

  if (argv.name !== undefined) {
    const found = findRequestByName(document, argv.name);
    return found ? [found] : new RequestNotFoundError(`name "${argv.name}"`);
  }

  if (argv.line !== undefined) {
    const line = argv.line;
    const found = document.requests.find((r) => line >= r.startLine && line <= r.endLine);
    return found ? [found] : new RequestNotFoundError(`a span containing line ${line}`);
  }

  const first = document.requests[0];
  return first ? [first] : new RequestNotFoundError('index 0');
}

function printResults(argv: RunOptions, results: ExecutionResult[]): void {
  if (argv.json) {
    const payload = results.map(resultToJson);
    console.log(JSON.stringify(argv.all ? payload : payload[0], null, 2));
    return;
  }

  results.forEach((result, index) => {
    if (results.length > 1) {
      if (index > 0) console.log('');
      console.log(`### ${formatSummary(result)}`);
    } else if (argv.verbose) {
      console.error(formatSummary(result));
    }
    console.log(formatResult(result));
  });
}

// ============================================================================
// Run
// ============================================================================

/**
 * Execute the selected requests of a `.http` file and print the results.
 * Resolves to the process exit code.
 */
export async function runFile(argv: RunOptions, deps: RunDeps = {}): Promise<number> {
  const filePath = resolve(process.cwd(), argv.file);
  if (!existsSync(filePath)) {
    console.error(`File not found: ${filePath}`);
    return 1;
  }

  const onEvent = argv.verbose
    ? (event: EngineEvent) => console.error(formatEvent(event))
    : undefined;

  const baseDir = dirname(filePath);
  let options: ResolvedExecutorOptions;
  try {
    const stopDir = resolveWorkspaceRoot(argv.workspace, baseDir);
    const loaded = await loadConfig(
      setOptional<DiscoveryOptions>({ startDir: baseDir }).ifDefined('stopDir', stopDir).build()
    );
    if (argv.verbose && loaded.path) {
      console.error(`Config: ${loaded.path}`);
    }
    options = resolveExecutorOptions({ loaded, overrides: buildOverrides(argv), baseDir });
  } catch (err) {
    console.error(getErrorMessage(err));
    return 1;
  }

  const resolver = createVariableResolver(
    setOptional<VariableResolverConfig>({
      environment: options.environment,
      variables: options.variables
    })
      .ifDefined('onEvent', onEvent)
      .build()
  );
  await resolver.loadEnvironment(options.environmentFile);
  for (const [key, value] of Object.entries(parseVariables(argv.var))) {
    resolver.setVariable(key, value);
  }

  const executor = createExecutor(
    setOptional<ExecutorConfig>({
      resolver,
      timeoutMs: options.timeoutMs,
      followRedirects: options.followRedirects,
      maxRedirects: options.maxRedirects,
      headerDefaults: options.headerDefaults
    })
      .ifDefined('transport', deps.transport)
      .ifDefined('onEvent', onEvent)
      .build()
  );

  const document = parse(await readFile(filePath, 'utf8'));
  if (document.requests.length === 0) {
    console.error('No valid requests found in file');
    return 1;
  }

  const selected = selectRequests(argv, document);
  if (selected instanceof RequestNotFoundError) {
    console.error(selected.message);
    printAvailable(document);
    return 1;
  }

  const results: ExecutionResult[] = [];
  for (const [index, request] of selected.entries()) {
    if (argv.verbose) {
      console.error(formatRequestLine(index, request));
    }
    results.push(await executor.execute(request, document.fileVariables, deps.signal));
  }

  printResults(argv, results);
  return results.every((result) => result.success) ? 0 : 1;
}
