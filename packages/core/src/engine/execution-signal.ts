import type { ExecutionError } from '../types';

export type ExecutionSignal = {
  signal: AbortSignal;
  /** The caller's signal fired */
  cancelled: () => boolean;
  /** The timeout elapsed before the caller cancelled */
  timedOut: () => boolean;
  cleanup: () => void;
};

/**
 * One signal that aborts on caller cancellation or after `timeoutMs`,
 * remembering which of the two fired first.
 */
export function createExecutionSignal(
  provided: AbortSignal | undefined,
  timeoutMs: number
): ExecutionSignal {
  const controller = new AbortController();
  let cancelled = false;
  let timedOut = false;

  const onAbort = () => {
    if (!timedOut) cancelled = true;
    controller.abort(provided?.reason);
  };

  if (provided?.aborted) {
    onAbort();
  } else {
    provided?.addEventListener('abort', onAbort, { once: true });
  }

  const timeoutId = setTimeout(() => {
    if (cancelled) return;
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  return {
    signal: controller.signal,
    cancelled: () => cancelled,
    timedOut: () => timedOut,
    cleanup: () => {
      clearTimeout(timeoutId);
      provided?.removeEventListener('abort', onAbort);
    }
  };
}

// ============================================================================
// Error classification
// ============================================================================

const TRANSPORT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE'
]);

function getErrorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

function isTransportCode(code: string | undefined): boolean {
  if (!code) return false;
  return (
    TRANSPORT_ERROR_CODES.has(code) ||
    code.startsWith('UND_ERR_') ||
    code.startsWith('ERR_TLS_') ||
    code.includes('CERT')
  );
}

/**
 * Network-level failure: DNS, connection, TLS or a dropped socket.
 * Node's fetch reports these as `TypeError('fetch failed')` with the socket
 * error as `cause`.
 */
export function isTransportError(err: unknown): err is Error {
  if (!(err instanceof Error)) return false;
  if (err instanceof TypeError && err.message === 'fetch failed') return true;
  return isTransportCode(getErrorCode(err)) || isTransportCode(getErrorCode(err.cause));
}

function describeTransportError(err: Error): string {
  const cause = err.cause;
  if (cause instanceof Error && cause.message && cause.message !== err.message) {
    return `${err.message} (${cause.message})`;
  }
  return err.message;
}

/**
 * Map a failure to its kind. Cancellation is checked before timeout, timeout
 * before transport errors.
 */
export function classifyError(
  err: unknown,
  ctx: { cancelled: boolean; timedOut: boolean; timeoutMs: number }
): ExecutionError {
  if (ctx.cancelled) {
    return { kind: 'cancelled', message: 'Request was cancelled' };
  }
  if (ctx.timedOut) {
    return { kind: 'timeout', message: `Request timed out after ${ctx.timeoutMs}ms` };
  }
  if (isTransportError(err)) {
    return { kind: 'transport', message: `Transport error: ${describeTransportError(err)}` };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { kind: 'unknown', message: `Error: ${message}` };
}
