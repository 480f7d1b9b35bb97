import { JSONPath } from 'jsonpath-plus';
import {
  isLosslessNumber,
  parse as parseLossless,
  stringify as stringifyLossless
} from 'lossless-json';
import type { JsonValue } from '../types';

/**
 * One dot-separated step of a body path: an optional property name followed
 * by zero or more `[n]` array indexes, e.g. `items[2]` or `[0]`.
 */
export type PathSegment = {
  property?: string;
  indexes: number[];
};

const SEGMENT_PATTERN = /^([^[\]]*)((?:\[\d+\])*)$/;

/**
 * Parse `a.b[1].c` into segments. Returns `undefined` for malformed paths
 * (empty segments, non-numeric or unbalanced brackets).
 */
export function parseBodyPath(path: string): PathSegment[] | undefined {
  const segments: PathSegment[] = [];

  for (const part of path.split('.')) {
    const match = part.match(SEGMENT_PATTERN);
    if (!match) return undefined;

    const property = match[1] ?? '';
    const indexes = [...(match[2] ?? '').matchAll(/\[(\d+)\]/g)].map((m) => Number(m[1]));
    if (!property && indexes.length === 0) return undefined;

    segments.push(property ? { property, indexes } : { indexes });
  }

  return segments;
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return (
    value !== null && typeof value === 'object' && !Array.isArray(value) && !isLosslessNumber(value)
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || isLosslessNumber(value)) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    default:
      break;
  }
  if (Array.isArray(value)) return value.every(isJsonValue);
  return isRecord(value) && Object.values(value).every(isJsonValue);
}

/**
 * Parse a response body as JSON, keeping every number's source text so
 * integers beyond 2^53 survive chaining. `undefined` when the body is not JSON.
 */
export function parseJsonBody(body: string): JsonValue | undefined {
  if (!body.trim()) return undefined;
  let parsed: unknown;
  try {
    parsed = parseLossless(body);
  } catch {
    // Duplicate keys are rejected by the lossless parser but valid JSON.
    try {
      parsed = JSON.parse(body);
    } catch {
      return undefined;
    }
  }
  return isJsonValue(parsed) ? parsed : undefined;
}

/**
 * Walk `root` along `path`. Returns `undefined` when a property is missing,
 * an index is out of range, or a step targets the wrong kind of node.
 */
export function navigateBodyPath(root: JsonValue, path: string): JsonValue | undefined {
  const segments = parseBodyPath(path);
  if (!segments) return undefined;

  let current: JsonValue = root;
  for (const segment of segments) {
    if (segment.property !== undefined) {
      if (!isJsonObject(current)) return undefined;
      if (!Object.prototype.hasOwnProperty.call(current, segment.property)) return undefined;
      const next: JsonValue | undefined = current[segment.property];
      if (next === undefined) return undefined;
      current = next;
    }

    for (const index of segment.indexes) {
      if (!Array.isArray(current)) return undefined;
      const next: JsonValue | undefined = current[index];
      if (next === undefined) return undefined;
      current = next;
    }
  }

  return current;
}

/**
 * Evaluate a JSONPath query (`$.items[0].id`, `$..id`) and return the first
 * match, or `undefined` when nothing matches or the query is invalid.
 */
export function queryJsonPath(root: JsonValue, query: string): unknown {
  let matches: unknown;
  try {
    matches = JSONPath({ path: query, json: root, wrap: true });
  } catch {
    return undefined;
  }
  return Array.isArray(matches) ? matches[0] : undefined;
}

/**
 * Render a navigated value as text. Numbers keep their source text; objects
 * and arrays become compact JSON.
 */
export function stringifyLeaf(value: unknown): string {
  if (typeof value === 'string') return value;
  if (isLosslessNumber(value)) return value.value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value === null) return 'null';
  return stringifyLossless(value) ?? '';
}
