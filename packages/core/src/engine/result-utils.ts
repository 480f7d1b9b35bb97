// Helpers for presenting execution results.

export type BodyKind = 'json' | 'xml' | 'html' | 'text';

export interface FormatDurationOptions {
  precision?: number;
  emptyValue?: string;
}

/**
 * Format a duration in milliseconds to a human-readable string.
 */
export function formatDuration(ms?: number, opts?: FormatDurationOptions): string {
  const { precision = 1, emptyValue = '' } = opts ?? {};
  if (ms === undefined) return emptyValue;
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(precision)}s`;
}

/**
 * Format a byte count as `512 B`, `1.5 KB`, `2.0 MB`.
 */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ['KB', 'MB', 'GB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}

/** 2xx */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Classify a body for display from its Content-Type, falling back to a look
 * at the first non-blank character.
 */
export function bodyKind(contentType: string | undefined, body = ''): BodyKind {
  const type = contentType?.split(';')[0]?.trim().toLowerCase() ?? '';
  if (type === 'application/json' || type.endsWith('+json')) return 'json';
  if (type === 'text/html') return 'html';
  if (type === 'application/xml' || type === 'text/xml' || type.endsWith('+xml')) return 'xml';
  if (type) return 'text';

  const trimmed = body.trimStart();
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) return 'json';
  if (/^<!doctype html|^<html/i.test(trimmed)) return 'html';
  if (trimmed.startsWith('<')) return 'xml';
  return 'text';
}
