import { vi } from 'vitest';
import type { Transport } from '../../src/runtime/types';

export type FetchImpl = (url: string | URL | Request, init?: RequestInit) => Promise<Response>;

/**
 * Installs a fetch mock and returns a restore function.
 */
export function installFetchMock(impl: FetchImpl): () => void {
  vi.stubGlobal('fetch', impl);
  return () => {
    vi.unstubAllGlobals();
  };
}

export type RecordedCall = { url: string; init: RequestInit };

export type StubTransport = Transport & { calls: RecordedCall[] };

/**
 * In-process transport that records every call and answers with `handler`.
 */
export function createStubTransport(
  handler: (url: string, init: RequestInit, callIndex: number) => Response | Promise<Response>
): StubTransport {
  const calls: RecordedCall[] = [];
  return {
    calls,
    async fetch(url, init) {
      calls.push({ url, init });
      return await handler(url, init, calls.length - 1);
    }
  };
}

function abortError(): Error {
  const err = new Error('This operation was aborted');
  err.name = 'AbortError';
  return err;
}

/**
 * A response that never arrives; rejects with an AbortError once the
 * request's signal fires.
 */
export function hangUntilAborted(init: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init.signal;
    if (!signal) return;
    if (signal.aborted) {
      reject(abortError());
      return;
    }
    signal.addEventListener('abort', () => reject(abortError()), { once: true });
  });
}

/**
 * Headers passed to the transport, as a plain record.
 */
export function sentHeaders(call: RecordedCall | undefined): Record<string, string> {
  const headers = call?.init.headers;
  if (!headers || headers instanceof Headers || Array.isArray(headers)) return {};
  return { ...headers };
}
