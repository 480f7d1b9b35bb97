import { Cookie } from 'tough-cookie';
import type { CookieRecord } from './types';

/**
 * Parse one `Set-Cookie` header value with `tough-cookie`.
 *
 * Returns `undefined` when the value has no `name=value` pair.
 *
 * @example
 * ```typescript
 * parseSetCookie('sid=1; Path=/; HttpOnly');
 * // { name: 'sid', value: '1', path: '/', httpOnly: true, secure: false, raw: '...' }
 * ```
 */
export function parseSetCookie(header: string): CookieRecord | undefined {
  const cookie = Cookie.parse(header);
  if (!cookie) return undefined;

  const record: CookieRecord = {
    name: cookie.key,
    value: cookie.value,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    raw: header
  };
  if (cookie.domain) record.domain = cookie.domain;
  if (cookie.path) record.path = cookie.path;
  if (cookie.expires instanceof Date) record.expires = cookie.expires;
  if (cookie.sameSite) record.sameSite = cookie.sameSite;
  return record;
}

/**
 * Parse every `Set-Cookie` value, skipping the ones that do not parse.
 */
export function parseSetCookies(headers: readonly string[]): CookieRecord[] {
  const records: CookieRecord[] = [];
  for (const header of headers) {
    const record = parseSetCookie(header);
    if (record) records.push(record);
  }
  return records;
}
