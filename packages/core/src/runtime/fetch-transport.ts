import type { Transport } from './types';

type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

/**
 * Create a transport backed by a standard fetch implementation.
 *
 * Node's fetch pools connections per origin, decompresses gzip/deflate/br
 * bodies and is safe to share between concurrent requests.
 */
export function createFetchTransport(fetchImpl: FetchLike = fetch): Transport {
  return {
    async fetch(url, init) {
      return await fetchImpl(url, init);
    }
  };
}
