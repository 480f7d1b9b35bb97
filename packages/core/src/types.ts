import type { LosslessNumber } from 'lossless-json';
import type { VariableResolver } from './resolver/variable-resolver';
import type { EventSink, IO, Transport } from './runtime/types';
import type { ChainSession } from './session/chain-session';

// ============================================================================
// Parsed Document
// ============================================================================

/**
 * A single request parsed from a `.http` file.
 *
 * URL, header values and body are templates: `{{...}}` placeholders are kept
 * verbatim and resolved at execution time.
 *
 * @example
 * ```typescript
 * const request: RequestDefinition = {
 *   name: 'login',
 *   method: 'POST',
 *   url: '{{baseUrl}}/auth/login',
 *   headers: { 'Content-Type': 'application/json' },
 *   body: '{"user": "{{user}}"}',
 *   variables: {},
 *   startLine: 3,
 *   endLine: 8
 * };
 * ```
 */
export interface RequestDefinition {
  /** Name from a `# @name` directive, used for chaining */
  readonly name?: string;
  /** Upper-cased HTTP method */
  readonly method: string;
  /** URL template */
  readonly url: string;
  /** Header templates in declaration order; keys are unique ignoring case */
  readonly headers: Readonly<Record<string, string>>;
  /** Body template without trailing blank lines */
  readonly body?: string;
  /** Variables declared after the request line */
  readonly variables: Readonly<Record<string, string>>;
  /** 1-indexed line of the request line */
  readonly startLine: number;
  /** 1-indexed last line of the request block (inclusive) */
  readonly endLine: number;
}

export interface ParsedDocument {
  readonly requests: readonly RequestDefinition[];
  /** Variables declared before the first request of the file */
  readonly fileVariables: Readonly<Record<string, string>>;
}

// ============================================================================
// Chain Session
// ============================================================================

/**
 * A response retained by the chain session for `{{name.response...}}` lookups.
 */
export interface StoredResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
  /**
   * Parsed body, present only when the body is valid JSON. Numbers are kept
   * as `LosslessNumber`s holding their source text.
   */
  json?: JsonValue;
  storedAt: Date;
}

/**
 * What callers hand to `storeResponse`. The session parses the body and
 * stamps the time itself.
 */
export type StoreResponseInput = Pick<StoredResponse, 'status' | 'headers' | 'body'>;

export type JsonValue =
  | string
  | number
  | LosslessNumber
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ============================================================================
// Execution
// ============================================================================

/**
 * A cookie parsed from one `Set-Cookie` response header.
 */
export interface CookieRecord {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  expires?: Date;
  httpOnly: boolean;
  secure: boolean;
  sameSite?: string;
  /** Full `Set-Cookie` header value */
  raw: string;
}

/**
 * Timing information in milliseconds.
 * Phases that fetch does not expose (dns, connect, tls) are always 0.
 */
export interface TimingInfo {
  total: number;
  ttfb: number;
  download: number;
  dns: number;
  connect: number;
  tls: number;
}

export type ExecutionErrorKind = 'cancelled' | 'timeout' | 'transport' | 'unknown';

export interface ExecutionError {
  kind: ExecutionErrorKind;
  message: string;
}

/** The request exactly as it was sent, after resolution. */
export interface ResolvedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface ExecutionResponse {
  status: number;
  statusText: string;
  /** Message and payload headers, lower-cased, multi-values joined with `, ` */
  headers: Record<string, string>;
  cookies: CookieRecord[];
  body: string;
  bodyBytes: Uint8Array;
  contentType?: string;
  sizeBytes: number;
}

export interface ExecutionResult {
  success: boolean;
  request: ResolvedRequest;
  response?: ExecutionResponse;
  timing: TimingInfo;
  executedAt: Date;
  error?: ExecutionError;
}

/**
 * Options for a single low-level HTTP dispatch.
 */
export interface ExecuteOptions {
  /**
   * Request timeout in milliseconds.
   * @default 30000
   */
  timeoutMs?: number;

  /** Caller cancellation. Reported separately from timeout expiry. */
  signal?: AbortSignal;

  /**
   * Whether to follow redirects.
   * @default true
   */
  followRedirects?: boolean;

  /**
   * Maximum redirects followed before the last response is returned as-is.
   * @default 10
   */
  maxRedirects?: number;

  /** Called for every redirect hop that is followed */
  onRedirect?: (hop: { status: number; from: string; to: string }) => void;
}

/**
 * The request shape handed to the transport.
 */
export interface ExecuteRequest {
  method: string;
  url: string;
  headers?: Record<string, string>;
  body?: string;
}

// ============================================================================
// Executor
// ============================================================================

export interface ExecutorConfig {
  /** Chain session shared by every request run through this executor */
  session?: ChainSession;
  /** Variable resolver holding the environment */
  resolver?: VariableResolver;
  transport?: Transport;
  onEvent?: EventSink;
  /** Headers added to every request unless the request sets them */
  headerDefaults?: Record<string, string>;
  timeoutMs?: number;
  followRedirects?: boolean;
  maxRedirects?: number;
}

export interface ExecuteDocumentOptions {
  /** Run only the request with this name (case-insensitive) */
  name?: string;
  /** Run only the request whose span contains this 1-indexed line */
  line?: number;
  signal?: AbortSignal;
  /** Stop at the first unsuccessful result */
  stopOnFailure?: boolean;
}

export interface VariableResolverConfig {
  io?: IO;
  onEvent?: EventSink;
  /**
   * Initially selected environment.
   * @default 'dev'
   */
  environment?: string;
  /** Variables below every environment entry */
  variables?: Record<string, string>;
  /** Source of `$processEnv` values */
  processEnv?: Record<string, string | undefined>;
  /** Clock used by `$datetime` and `$timestamp` */
  now?: () => Date;
  /** Random source in [0, 1) used by `$randomInt` */
  random?: () => number;
}
