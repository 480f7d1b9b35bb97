import { z } from 'zod';

// ============================================================================
// Schema
// ============================================================================

export const DefaultsSchema = z
  .object({
    timeoutMs: z.number().int().positive().optional(),
    followRedirects: z.boolean().optional(),
    maxRedirects: z.number().int().nonnegative().optional(),
    headers: z.record(z.string(), z.string()).optional()
  })
  .strict();

export const ConfigSchema = z
  .object({
    /** Environment selected when none is given on the command line */
    environment: z.string().min(1).optional(),
    /** Environment document, relative to the config file */
    environmentFile: z.string().min(1).optional(),
    defaults: DefaultsSchema.optional(),
    /** Variables below every environment entry */
    variables: z.record(z.string(), z.string()).optional()
  })
  .strict();

export type ConfigInput = z.infer<typeof ConfigSchema>;
export type DefaultsInput = z.infer<typeof DefaultsSchema>;

// ============================================================================
// Loaded / Resolved
// ============================================================================

export type ConfigFormat = 'jsonc' | 'json';

export type LoadedConfig = {
  path?: string;
  config: ConfigInput;
  format?: ConfigFormat;
};

/** Options ready for `createExecutor` after every layer is applied. */
export type ResolvedExecutorOptions = {
  timeoutMs: number;
  followRedirects: boolean;
  maxRedirects: number;
  headerDefaults: Record<string, string>;
  environment: string;
  /** Absolute path of the environment document */
  environmentFile: string;
  /** Config variables, below every environment entry */
  variables: Record<string, string>;
};

/** Command-line values; each one beats the config file. */
export type ExecutorOverrides = {
  timeoutMs?: number;
  followRedirects?: boolean;
  maxRedirects?: number;
  environment?: string;
  environmentFile?: string;
};
