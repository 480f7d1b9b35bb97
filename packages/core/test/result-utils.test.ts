import { describe, expect, test } from 'vitest';
import {
  bodyKind,
  formatDuration,
  formatSize,
  isSuccessStatus
} from '../src/engine/result-utils';

describe('formatDuration', () => {
  test('formats milliseconds and seconds', () => {
    expect(formatDuration(250.4)).toBe('250ms');
    expect(formatDuration(1530)).toBe('1.5s');
    expect(formatDuration(undefined, { emptyValue: '-' })).toBe('-');
  });
});

describe('formatSize', () => {
  test('formats bytes with binary units', () => {
    expect(formatSize(512)).toBe('512 B');
    expect(formatSize(1536)).toBe('1.5 KB');
    expect(formatSize(2 * 1024 * 1024)).toBe('2.0 MB');
  });
});

describe('isSuccessStatus', () => {
  test('accepts only 2xx', () => {
    expect(isSuccessStatus(204)).toBe(true);
    expect(isSuccessStatus(302)).toBe(false);
    expect(isSuccessStatus(500)).toBe(false);
  });
});

describe('bodyKind', () => {
  test('uses the content type', () => {
    expect(bodyKind('application/json; charset=utf-8')).toBe('json');
    expect(bodyKind('application/problem+json')).toBe('json');
    expect(bodyKind('text/html')).toBe('html');
    expect(bodyKind('application/xml')).toBe('xml');
    expect(bodyKind('text/plain', '{"a":1}')).toBe('text');
  });

  test('sniffs the body without a content type', () => {
    expect(bodyKind(undefined, '  [1, 2]')).toBe('json');
    expect(bodyKind(undefined, '<!DOCTYPE html><html></html>')).toBe('html');
    expect(bodyKind(undefined, '<note/>')).toBe('xml');
    expect(bodyKind(undefined, 'plain')).toBe('text');
  });
});
