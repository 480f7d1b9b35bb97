import { describe, expect, test } from 'vitest';
import { EnvironmentError } from '../src/errors';
import {
  normalizeEnvironmentDocument,
  parseEnvironmentDocument,
  selectEnvironment
} from '../src/resolver/environment';
import { createVariableResolver } from '../src/resolver/variable-resolver';
import type { EngineEvent } from '../src/runtime/types';
import { withTempDir } from './utils/tmpdir';

const ENVIRONMENTS = {
  $shared: { baseUrl: 'https://shared.example.com', region: 'eu' },
  dev: { baseUrl: 'https://dev.example.com' },
  prod: { BASEURL: 'https://prod.example.com', token: 'test-secret' }
};

function createResolver(variables?: Record<string, string>) {
  const resolver = createVariableResolver({
    now: () => new Date(Date.UTC(2024, 0, 1)),
    random: () => 0,
    processEnv: {},
    ...(variables ? { variables } : {})
  });
  resolver.loadEnvironmentDocument(ENVIRONMENTS);
  return resolver;
}

describe('environment documents', () => {
  test('drops non-string values', () => {
    expect(parseEnvironmentDocument('{"dev": {"a": "1", "n": 2, "b": true}}')).toEqual({
      dev: { a: '1' }
    });
  });

  test('accepts comments and trailing commas', () => {
    const doc = parseEnvironmentDocument('{\n  // local\n  "dev": { "a": "1", },\n}');
    expect(doc).toEqual({ dev: { a: '1' } });
  });

  test('rejects malformed documents', () => {
    expect(() => parseEnvironmentDocument('not json')).toThrow(EnvironmentError);
    expect(() => normalizeEnvironmentDocument({ dev: 'x' })).toThrow(EnvironmentError);
    expect(() => normalizeEnvironmentDocument([])).toThrow(EnvironmentError);
  });

  test('$shared fills only the keys the environment lacks', () => {
    const doc = normalizeEnvironmentDocument(ENVIRONMENTS);

    expect(selectEnvironment(doc, 'dev')).toEqual({
      baseUrl: 'https://dev.example.com',
      region: 'eu'
    });
    expect(selectEnvironment(doc, 'prod')).toEqual({
      BASEURL: 'https://prod.example.com',
      token: 'test-secret',
      region: 'eu'
    });
    expect(selectEnvironment(doc, 'missing')).toEqual({
      baseUrl: 'https://shared.example.com',
      region: 'eu'
    });
  });
});

describe('createVariableResolver', () => {
  test('resolves file-scope variables', () => {
    expect(createResolver().resolve('id={{token}}', undefined, { token: '1' })).toBe('id=1');
  });

  test('request-local variables shadow file-scope ones', () => {
    const resolver = createResolver();
    expect(resolver.resolve('{{token}}', { token: '2' }, { token: '1' })).toBe('2');
    expect(resolver.resolve('{{token}}', undefined, { token: '1' })).toBe('1');
  });

  test('leaves unknown placeholders unchanged', () => {
    expect(createResolver().resolve('{{missing}}')).toBe('{{missing}}');
  });

  test('compares variable names ignoring case', () => {
    expect(createResolver().resolve('{{TOKEN}}', { token: '2' })).toBe('2');
  });

  test('uses the selected environment with $shared fallback', () => {
    const resolver = createResolver();
    expect(resolver.getEnvironment()).toBe('dev');
    expect(resolver.resolve('{{baseUrl}}/{{region}}')).toBe('https://dev.example.com/eu');

    resolver.setEnvironment('prod');
    expect(resolver.resolve('{{baseUrl}}?t={{token}}')).toBe(
      'https://prod.example.com?t=test-secret'
    );
  });

  test('setVariable overrides environment entries', () => {
    const resolver = createResolver();
    resolver.setVariable('BaseUrl', 'https://override.example.com');

    expect(resolver.resolve('{{baseUrl}}')).toBe('https://override.example.com');
    expect(resolver.resolve('{{baseUrl}}', { baseUrl: 'https://local.example.com' })).toBe(
      'https://local.example.com'
    );
  });

  test('config variables sit below every environment entry', () => {
    const resolver = createResolver({ region: 'us', apiVersion: 'v1' });
    expect(resolver.resolve('{{region}}-{{apiVersion}}')).toBe('eu-v1');
  });

  test('resolves built-ins', () => {
    expect(createResolver().resolve('{{$timestamp}}')).toBe('1704067200');
  });

  test('resolves in a single pass', () => {
    const out = createResolver().resolve('{{a}}', undefined, { a: '{{b}}', b: 'x' });
    expect(out).toBe('{{b}}');
  });

  test('does not mutate its inputs', () => {
    const local = { token: '2' };
    const file = { token: '1' };
    createResolver().resolve('{{token}}', local, file);
    expect(local).toEqual({ token: '2' });
    expect(file).toEqual({ token: '1' });
  });

  test('lists environments and effective variables', () => {
    const resolver = createResolver();
    expect(resolver.getEnvironmentNames()).toEqual(['dev', 'prod']);
    expect(resolver.getEnvironmentVariables()).toEqual({
      baseUrl: 'https://dev.example.com',
      region: 'eu'
    });
  });
});

describe('loadEnvironment', () => {
  test('loads a JSONC file and reports it', async () => {
    await withTempDir(async (tmp) => {
      await tmp.writeFile(
        'http-client.env.json',
        '{\n  // local stack\n  "dev": { "baseUrl": "http://localhost:8080" }\n}'
      );
      const events: EngineEvent[] = [];
      const resolver = createVariableResolver({ onEvent: (e) => events.push(e) });

      await resolver.loadEnvironment(tmp.join('http-client.env.json'));

      expect(resolver.resolve('{{baseUrl}}/health')).toBe('http://localhost:8080/health');
      expect(events).toEqual([
        {
          type: 'environmentLoaded',
          path: tmp.join('http-client.env.json'),
          environments: ['dev']
        }
      ]);
    });
  });

  test('a missing file yields an empty environment', async () => {
    await withTempDir(async (tmp) => {
      const resolver = createVariableResolver();
      resolver.loadEnvironmentDocument(ENVIRONMENTS);

      await resolver.loadEnvironment(tmp.join('absent.json'));

      expect(resolver.getEnvironmentNames()).toEqual([]);
      expect(resolver.resolve('{{baseUrl}}')).toBe('{{baseUrl}}');
    });
  });

  test('an invalid file empties the environment and emits an error', async () => {
    await withTempDir(async (tmp) => {
      await tmp.writeFile('env.json', '{ "dev": "not-an-object" }');
      const events: EngineEvent[] = [];
      const resolver = createVariableResolver({ onEvent: (e) => events.push(e) });
      resolver.loadEnvironmentDocument(ENVIRONMENTS);

      await resolver.loadEnvironment(tmp.join('env.json'));

      expect(resolver.resolve('{{baseUrl}}')).toBe('{{baseUrl}}');
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ type: 'error', stage: 'environment' });
    });
  });
});
