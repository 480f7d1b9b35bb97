import { describe, expect, test } from 'vitest';
import { createExecutor } from '../src/engine/executor';
import { decodeBody, getCharset } from '../src/engine/response';
import { parse } from '../src/parser';
import { createVariableResolver } from '../src/resolver/variable-resolver';
import type { EngineEvent } from '../src/runtime/types';
import type { RequestDefinition } from '../src/types';
import { createStubTransport, hangUntilAborted, sentHeaders } from './utils/fetch-mock';

const CHAINED = [
  '@baseUrl = https://api.example.com',
  '',
  '# @name login',
  'POST {{baseUrl}}/login',
  'Content-Type: application/json',
  '',
  '{"user": "{{user}}"}',
  '',
  '###',
  'GET {{baseUrl}}/users/{{login.response.body.id}}',
  'X-Trace: {{login.response.headers.X-Trace}}'
].join('\n');

function request(overrides: Partial<RequestDefinition> = {}): RequestDefinition {
  return {
    method: 'GET',
    url: 'https://api.example.com/items',
    headers: {},
    variables: {},
    startLine: 1,
    endLine: 1,
    ...overrides
  };
}

function connectionRefused(): TypeError {
  const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9'), {
    code: 'ECONNREFUSED'
  });
  return new TypeError('fetch failed', { cause });
}

describe('createExecutor', () => {
  test('chains a stored response into the next request', async () => {
    const transport = createStubTransport((_url, _init, call) =>
      call === 0
        ? new Response('{"id":42}', {
            status: 200,
            headers: { 'Content-Type': 'application/json', 'X-Trace': 'abc123' }
          })
        : new Response('{"name":"test-user"}', { status: 200 })
    );
    const resolver = createVariableResolver();
    resolver.setVariable('user', 'test-user');
    const executor = createExecutor({ transport, resolver });

    const results = await executor.executeDocument(CHAINED);

    expect(results).toHaveLength(2);
    expect(results[0]?.request.body).toBe('{"user": "test-user"}');
    expect(results[1]?.request.url).toBe('https://api.example.com/users/42');
    expect(results[1]?.request.headers).toEqual({ 'X-Trace': 'abc123' });
    expect(transport.calls[1]?.url).toBe('https://api.example.com/users/42');
    expect(executor.session.getStoredNames()).toEqual(['login']);
  });

  test('captures status, headers and body', async () => {
    const transport = createStubTransport(
      () =>
        new Response('hello', {
          status: 201,
          statusText: 'Created',
          headers: { 'Content-Type': 'text/plain; charset=utf-8', 'X-Request-Id': 'r-1' }
        })
    );
    const executor = createExecutor({ transport });

    const result = await executor.execute(request());

    expect(result.success).toBe(true);
    expect(result.error).toBeUndefined();
    expect(result.response?.status).toBe(201);
    expect(result.response?.statusText).toBe('Created');
    expect(result.response?.headers['x-request-id']).toBe('r-1');
    expect(result.response?.contentType).toBe('text/plain; charset=utf-8');
    expect(result.response?.body).toBe('hello');
    expect(result.response?.sizeBytes).toBe(5);
    expect(result.response?.bodyBytes).toEqual(new TextEncoder().encode('hello'));
    expect(result.timing.total).toBeGreaterThanOrEqual(result.timing.ttfb);
    expect(result.timing.dns).toBe(0);
    expect(result.timing.connect).toBe(0);
    expect(result.timing.tls).toBe(0);
  });

  test('parses Set-Cookie headers into cookie records', async () => {
    const transport = createStubTransport(
      () =>
        new Response('', {
          headers: new Headers([
            ['Set-Cookie', 'sid=1; Path=/; HttpOnly'],
            ['Set-Cookie', 'broken']
          ])
        })
    );

    const result = await createExecutor({ transport }).execute(request());

    expect(result.response?.cookies).toEqual([
      {
        name: 'sid',
        value: '1',
        path: '/',
        httpOnly: true,
        secure: false,
        raw: 'sid=1; Path=/; HttpOnly'
      }
    ]);
  });

  test('sends content headers only with a body', async () => {
    const transport = createStubTransport(() => new Response(''));
    const executor = createExecutor({ transport });
    const headers = { 'Content-Type': 'application/json', 'Content-Length': '999', Accept: '*/*' };

    const get = await executor.execute(request({ headers }));
    await executor.execute(request({ method: 'POST', headers, body: '{"a":1}' }));

    expect(sentHeaders(transport.calls[0])).toEqual({ Accept: '*/*' });
    expect(get.request.headers).toEqual(headers);
    expect(sentHeaders(transport.calls[1])).toEqual({
      Accept: '*/*',
      'Content-Type': 'application/json'
    });
    expect(transport.calls[1]?.init.body).toBe('{"a":1}');
  });

  test('applies header defaults unless the request overrides them', async () => {
    const transport = createStubTransport(() => new Response(''));
    const executor = createExecutor({
      transport,
      headerDefaults: { 'User-Agent': 'reqchain-test', Accept: '*/*' }
    });

    await executor.execute(request({ headers: { accept: 'application/json' } }));

    expect(sentHeaders(transport.calls[0])).toEqual({
      'User-Agent': 'reqchain-test',
      accept: 'application/json'
    });
  });

  test('classifies connection failures as transport errors', async () => {
    const transport = createStubTransport(() => {
      throw connectionRefused();
    });

    const result = await createExecutor({ transport }).execute(request());

    expect(result.success).toBe(false);
    expect(result.response).toBeUndefined();
    expect(result.error).toEqual({
      kind: 'transport',
      message: 'Transport error: fetch failed (connect ECONNREFUSED 127.0.0.1:9)'
    });
    expect(result.timing.total).toBeGreaterThanOrEqual(0);
  });

  test('classifies an elapsed timeout', async () => {
    const transport = createStubTransport((_url, init) => hangUntilAborted(init));

    const result = await createExecutor({ transport, timeoutMs: 20 }).execute(request());

    expect(result.error).toEqual({ kind: 'timeout', message: 'Request timed out after 20ms' });
  });

  test('classifies caller cancellation', async () => {
    const transport = createStubTransport((_url, init) => hangUntilAborted(init));
    const controller = new AbortController();

    const pending = createExecutor({ transport }).execute(request(), {}, controller.signal);
    controller.abort();
    const result = await pending;

    expect(result.error).toEqual({ kind: 'cancelled', message: 'Request was cancelled' });
  });

  test('reports an unresolved URL without sending anything', async () => {
    const transport = createStubTransport(() => new Response(''));

    const result = await createExecutor({ transport }).execute(
      request({ url: '{{baseUrl}}/items' })
    );

    expect(result.success).toBe(false);
    expect(result.error?.kind).toBe('unknown');
    expect(result.request.url).toBe('{{baseUrl}}/items');
    expect(transport.calls).toHaveLength(0);
  });

  test('emits events in order', async () => {
    const events: EngineEvent[] = [];
    const transport = createStubTransport((_url, _init, call) =>
      call === 0
        ? new Response(null, { status: 302, headers: { Location: '/final' } })
        : new Response('{}')
    );
    const executor = createExecutor({ transport, onEvent: (e) => events.push(e) });

    await executor.execute(request({ name: 'items' }));

    expect(events.map((e) => e.type)).toEqual([
      'resolveStarted',
      'resolveFinished',
      'fetchStarted',
      'redirectFollowed',
      'fetchFinished',
      'responseStored'
    ]);
    expect(events[5]).toEqual({ type: 'responseStored', name: 'items', status: 200 });
  });
});

describe('executeDocument', () => {
  const doc = [
    '# @name first',
    'GET https://api.example.com/1',
    '',
    '###',
    '# @name second',
    'GET https://api.example.com/2'
  ].join('\n');

  test('selects a request by name', async () => {
    const transport = createStubTransport(() => new Response(''));

    const results = await createExecutor({ transport }).executeDocument(doc, { name: 'SECOND' });

    expect(results.map((r) => r.request.url)).toEqual(['https://api.example.com/2']);
  });

  test('selects a request by line', async () => {
    const transport = createStubTransport(() => new Response(''));

    const results = await createExecutor({ transport }).executeDocument(doc, { line: 2 });

    expect(results.map((r) => r.request.url)).toEqual(['https://api.example.com/1']);
  });

  test('stops at the first failure when asked', async () => {
    const transport = createStubTransport(() => {
      throw connectionRefused();
    });

    const results = await createExecutor({ transport }).executeDocument(doc, {
      stopOnFailure: true
    });

    expect(results).toHaveLength(1);
  });

  test('sends a request whose header block has a malformed line', async () => {
    const transport = createStubTransport(() => new Response(''));

    const results = await createExecutor({ transport }).executeDocument(
      'GET https://api.example.com/items\nX Bad: 1\nAccept: */*'
    );

    expect(results[0]?.success).toBe(true);
    expect(sentHeaders(transport.calls[0])).toEqual({ Accept: '*/*' });
  });

  test('runs every request of the parsed document in order', async () => {
    const transport = createStubTransport(() => new Response(''));

    const results = await createExecutor({ transport }).executeDocument(doc);

    expect(results).toHaveLength(parse(doc).requests.length);
    expect(transport.calls.map((c) => c.url)).toEqual([
      'https://api.example.com/1',
      'https://api.example.com/2'
    ]);
  });
});

describe('decodeBody', () => {
  const latin1 = new Uint8Array([0x63, 0x61, 0x66, 0xe9]);

  test('reads the charset parameter', () => {
    expect(getCharset('text/plain; charset="ISO-8859-1"')).toBe('ISO-8859-1');
    expect(getCharset('application/json')).toBeUndefined();
  });

  test('decodes with the declared charset', () => {
    expect(decodeBody(latin1, 'text/plain; charset=iso-8859-1')).toBe('café');
  });

  test('falls back to UTF-8 for unknown charsets', () => {
    const utf8 = new TextEncoder().encode('café');
    expect(decodeBody(utf8, 'text/plain; charset=x-unknown')).toBe('café');
    expect(decodeBody(utf8, undefined)).toBe('café');
  });
});
