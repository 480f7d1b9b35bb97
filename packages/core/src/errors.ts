// ============================================================================
// Error taxonomy
// Parsing, resolution and execution never throw; these cover misuse of the
// library and front-end failures (missing files, bad config).
// ============================================================================

/**
 * Base error class for all reqchain errors.
 */
export class ReqchainError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'ReqchainError';
  }

  toObject(): { error: { code: string; message: string } } {
    return { error: { code: this.code, message: this.message } };
  }
}

export class EnvironmentError extends ReqchainError {
  constructor(path: string, reason: string) {
    super('ENVIRONMENT_INVALID', `Invalid environment file '${path}': ${reason}`);
    this.name = 'EnvironmentError';
  }
}

export class ConfigError extends ReqchainError {
  constructor(path: string, reason: string) {
    super('CONFIG_INVALID', `Invalid config file '${path}': ${reason}`);
    this.name = 'ConfigError';
  }
}

export class RequestNotFoundError extends ReqchainError {
  constructor(identifier: string) {
    super('REQUEST_NOT_FOUND', `No request found with ${identifier}`);
    this.name = 'RequestNotFoundError';
  }
}

/**
 * Render any thrown value as a message.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
