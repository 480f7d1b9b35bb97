// JSONC parsing
export { parseJsonc, stripJsonComments, stripTrailingCommas } from './jsonc';
// Config loading
export { type LoadConfigOptions, loadConfig, validateConfig } from './load';
// Config resolution
export { type ResolveExecutorOptionsInput, resolveExecutorOptions } from './resolve';

// Types
export {
  type ConfigFormat,
  type ConfigInput,
  ConfigSchema,
  type DefaultsInput,
  DefaultsSchema,
  type ExecutorOverrides,
  type LoadedConfig,
  type ResolvedExecutorOptions
} from './types';
