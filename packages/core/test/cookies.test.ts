import { describe, expect, test } from 'vitest';
import { parseSetCookie, parseSetCookies } from '../src/cookies';

describe('parseSetCookie', () => {
  test('parses name, value, path and HttpOnly', () => {
    expect(parseSetCookie('sid=1; Path=/; HttpOnly')).toEqual({
      name: 'sid',
      value: '1',
      path: '/',
      httpOnly: true,
      secure: false,
      raw: 'sid=1; Path=/; HttpOnly'
    });
  });

  test('parses domain, expiry, Secure and SameSite', () => {
    const cookie = parseSetCookie(
      'theme=dark; Domain=.example.com; Expires=Wed, 01 Jan 2031 00:00:00 GMT; Secure; SameSite=Lax'
    );

    expect(cookie?.domain).toBe('example.com');
    expect(cookie?.expires).toEqual(new Date(Date.UTC(2031, 0, 1)));
    expect(cookie?.secure).toBe(true);
    expect(cookie?.httpOnly).toBe(false);
    expect(cookie?.sameSite).toBe('lax');
  });

  test('omits an unparsable expiry', () => {
    const cookie = parseSetCookie('a=b; Expires=not-a-date');

    expect(cookie?.name).toBe('a');
    expect(cookie?.expires).toBeUndefined();
  });

  test('ignores unknown attributes', () => {
    expect(parseSetCookie('a=b; Priority=High')).toMatchObject({ name: 'a', value: 'b' });
  });

  test('rejects values without name=value', () => {
    expect(parseSetCookie('novalue')).toBeUndefined();
  });
});

describe('parseSetCookies', () => {
  test('skips entries that do not parse', () => {
    const cookies = parseSetCookies(['a=1', 'broken', 'b=2; Path=/api']);

    expect(cookies.map((c) => `${c.name}=${c.value}`)).toEqual(['a=1', 'b=2']);
    expect(cookies[1]?.path).toBe('/api');
  });
});
