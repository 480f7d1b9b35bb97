// Config
export {
  type ConfigInput,
  ConfigSchema,
  type ExecutorOverrides,
  type LoadConfigOptions,
  type LoadedConfig,
  loadConfig,
  parseJsonc,
  type ResolvedExecutorOptions,
  resolveExecutorOptions,
  validateConfig
} from './config';
// Cookies
export { parseSetCookie, parseSetCookies } from './cookies';
// Execution
export { type Executor, createExecutor } from './engine/executor';
export { buildOutgoingHeaders, isContentHeader, partitionHeaders } from './engine/headers';
export { decodeBody, getCharset } from './engine/response';
export {
  type BodyKind,
  bodyKind,
  formatDuration,
  formatSize,
  isSuccessStatus
} from './engine/result-utils';
// Errors
export {
  ConfigError,
  EnvironmentError,
  getErrorMessage,
  ReqchainError,
  RequestNotFoundError
} from './errors';
// Low-level dispatch
export { DEFAULT_MAX_REDIRECTS, DEFAULT_TIMEOUT_MS, execute, executeWithTransport } from './execute';
// Parsing
export {
  classifyLine,
  findRequestAt,
  findRequestByName,
  getRequestHeader,
  parse,
  parseFile
} from './parser';
// Variable resolution
export { BUILTIN_SIGIL, formatDateTime, randomInt, resolveBuiltin } from './resolver/builtins';
export {
  DEFAULT_ENVIRONMENT,
  DEFAULT_ENVIRONMENT_FILE,
  type EnvironmentDocument,
  listEnvironments,
  loadEnvironmentFile,
  parseEnvironmentDocument,
  SHARED_ENVIRONMENT,
  selectEnvironment
} from './resolver/environment';
export { listPlaceholders, replacePlaceholders, splitTemplate } from './resolver/template';
export {
  createVariableResolver,
  type VariableMap,
  type VariableResolver
} from './resolver/variable-resolver';
// Runtime adapters
export { createFetchTransport, createNodeIO } from './runtime';
export type { EngineEvent, EventSink, IO, PathApi, Transport } from './runtime/types';
// Chain session
export {
  navigateBodyPath,
  parseBodyPath,
  parseJsonBody,
  queryJsonPath,
  stringifyLeaf
} from './session/body-path';
export { type ChainSession, createChainSession } from './session/chain-session';
export { type OptionalBuilder, setOptional } from './utils/optional';
// Types
export type {
  CookieRecord,
  ExecuteDocumentOptions,
  ExecuteOptions,
  ExecuteRequest,
  ExecutionError,
  ExecutionErrorKind,
  ExecutionResponse,
  ExecutionResult,
  ExecutorConfig,
  JsonValue,
  ParsedDocument,
  RequestDefinition,
  ResolvedRequest,
  StoredResponse,
  StoreResponseInput,
  TimingInfo,
  VariableResolverConfig
} from './types';
