import { parseSetCookies } from '../cookies';
import type { ExecutionResponse } from '../types';
import { extractResponseHeaders } from './headers';

/**
 * The `charset` parameter of a Content-Type value, without quotes.
 */
export function getCharset(contentType: string | undefined): string | undefined {
  if (!contentType) return undefined;
  const match = contentType.match(/;\s*charset\s*=\s*("?)([^";]+)\1/i);
  const charset = match?.[2]?.trim();
  return charset || undefined;
}

/**
 * Decode a body with the declared charset, or UTF-8 when none is declared or
 * the label is unknown.
 */
export function decodeBody(bytes: Uint8Array, contentType: string | undefined): string {
  const charset = getCharset(contentType);
  if (charset) {
    try {
      return new TextDecoder(charset).decode(bytes);
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
    }
  }
  return new TextDecoder('utf-8').decode(bytes);
}

/**
 * Read a fetch Response fully into an ExecutionResponse.
 */
export async function readResponse(response: Response): Promise<ExecutionResponse> {
  const bodyBytes = new Uint8Array(await response.arrayBuffer());
  const headers = extractResponseHeaders(response.headers);
  const contentType = headers['content-type'];

  const result: ExecutionResponse = {
    status: response.status,
    statusText: response.statusText,
    headers,
    cookies: parseSetCookies(response.headers.getSetCookie()),
    body: decodeBody(bodyBytes, contentType),
    bodyBytes,
    sizeBytes: bodyBytes.byteLength
  };
  if (contentType !== undefined) result.contentType = contentType;
  return result;
}
