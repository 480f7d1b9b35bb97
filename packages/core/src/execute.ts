import { createFetchTransport } from './runtime/fetch-transport';
import type { Transport } from './runtime/types';
import type { ExecuteOptions, ExecuteRequest } from './types';
import { findKey } from './utils/case-insensitive';
import { setOptional } from './utils/optional';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_REDIRECTS = 10;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Determines if body should be attached to the request.
 * GET and HEAD requests must not carry a body.
 */
export function shouldAttachBody(method: string, body: string | undefined): body is string {
  return body !== undefined && body !== '' && !['GET', 'HEAD'].includes(method.toUpperCase());
}

function buildRequestInit(request: ExecuteRequest, signal: AbortSignal): RequestInit {
  return setOptional<RequestInit>({
    method: request.method,
    // Redirects are followed here so the hop count can be bounded.
    redirect: 'manual',
    signal
  })
    .ifDefined('headers', request.headers)
    .ifDefined('body', shouldAttachBody(request.method, request.body) ? request.body : undefined)
    .build();
}

function withoutHeaders(headers: Record<string, string>, names: string[]): Record<string, string> {
  const result = { ...headers };
  for (const name of names) {
    const key = findKey(result, name);
    if (key !== undefined) delete result[key];
  }
  return result;
}

/**
 * The request to send after a redirect response.
 *
 * 303, and 301/302 after a POST, switch to GET without a body; 307/308 keep
 * method and body. Credentials are not forwarded to another origin.
 */
export function redirectRequest(
  request: ExecuteRequest,
  status: number,
  location: string
): ExecuteRequest {
  const method = request.method.toUpperCase();
  const switchToGet =
    (status === 303 && method !== 'GET' && method !== 'HEAD') ||
    ((status === 301 || status === 302) && method === 'POST');

  let headers: Record<string, string> = request.headers ?? {};
  if (switchToGet) {
    headers = withoutHeaders(headers, [
      'content-type',
      'content-length',
      'content-encoding',
      'content-language',
      'content-location'
    ]);
  }
  if (new URL(location).origin !== new URL(request.url).origin) {
    headers = withoutHeaders(headers, ['authorization', 'cookie']);
  }

  return setOptional<ExecuteRequest>({
    method: switchToGet ? 'GET' : request.method,
    url: location,
    headers
  })
    .ifDefined('body', switchToGet ? undefined : request.body)
    .build();
}

/**
 * Create an AbortSignal for request execution.
 * Uses the provided signal as-is, or creates an internal timeout-based signal.
 */
function createExecutionSignal(opts: { provided?: AbortSignal; timeoutMs: number }): {
  signal: AbortSignal;
  isInternalTimeout: boolean;
  cleanup: () => void;
} {
  if (opts.provided) {
    return { signal: opts.provided, isInternalTimeout: false, cleanup: () => {} };
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), opts.timeoutMs);

  return {
    signal: controller.signal,
    isInternalTimeout: true,
    cleanup: () => clearTimeout(timeoutId)
  };
}

function mapExecuteError(
  error: unknown,
  ctx: { timeoutMs: number; isInternalTimeout: boolean }
): Error {
  if (error instanceof Error && error.name === 'AbortError' && ctx.isInternalTimeout) {
    return new Error(`Request timeout after ${ctx.timeoutMs}ms`);
  }
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// Main Execute Function
// ============================================================================

/**
 * Execute an HTTP request with the default fetch transport.
 * Returns the final fetch Response after redirects.
 */
export async function execute(
  request: ExecuteRequest,
  options: ExecuteOptions = {}
): Promise<Response> {
  return await executeWithTransport(request, options, createFetchTransport());
}

/**
 * Execute an HTTP request using an explicit transport.
 *
 * When `options.signal` is given it alone governs cancellation; otherwise
 * the request is aborted after `timeoutMs`.
 */
export async function executeWithTransport(
  request: ExecuteRequest,
  options: ExecuteOptions,
  transport: Transport
): Promise<Response> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const followRedirects = options.followRedirects ?? true;
  const maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;

  const { signal, isInternalTimeout, cleanup } = createExecutionSignal(
    setOptional<{ timeoutMs: number; provided?: AbortSignal }>({ timeoutMs })
      .ifDefined('provided', options.signal)
      .build()
  );

  try {
    let current = request;
    for (let hops = 0; ; hops++) {
      const response = await transport.fetch(current.url, buildRequestInit(current, signal));

      const location = response.headers.get('location');
      if (
        !followRedirects ||
        !REDIRECT_STATUSES.has(response.status) ||
        !location ||
        hops >= maxRedirects
      ) {
        return response;
      }

      await response.body?.cancel();
      const next = new URL(location, current.url).toString();
      options.onRedirect?.({ status: response.status, from: current.url, to: next });
      current = redirectRequest(current, response.status, next);
    }
  } catch (error) {
    throw mapExecuteError(error, { timeoutMs, isInternalTimeout });
  } finally {
    cleanup();
  }
}
