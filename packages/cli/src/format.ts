import {
  bodyKind,
  type EngineEvent,
  type ExecutionResult,
  formatDuration,
  formatSize,
  type RequestDefinition
} from '@reqchain/core';

// ============================================================================
// Text output
// ============================================================================

export function formatHeaders(headers: Readonly<Record<string, string>>): string {
  return Object.entries(headers)
    .map(([name, value]) => `  ${name}: ${value}`)
    .join('\n');
}

/**
 * Pretty-print JSON bodies; everything else is returned as-is.
 */
export function formatResponseBody(contentType: string | undefined, body: string): string {
  if (!body) return '';
  if (bodyKind(contentType, body) === 'json') {
    try {
      return JSON.stringify(JSON.parse(body), null, 2);
    } catch {
      return body;
    }
  }
  return body;
}

/**
 * One-line summary: `GET https://... -> 200 OK (12ms, 1.2 KB)`.
 */
export function formatSummary(result: ExecutionResult): string {
  const target = `${result.request.method} ${result.request.url}`;
  const duration = formatDuration(result.timing.total);
  if (!result.response) {
    return `${target} -> failed after ${duration}`;
  }
  const { status, statusText, sizeBytes } = result.response;
  const statusLine = statusText ? `${status} ${statusText}` : String(status);
  return `${target} -> ${statusLine} (${duration}, ${formatSize(sizeBytes)})`;
}

export function formatResult(result: ExecutionResult): string {
  if (!result.response) {
    const error = result.error;
    return error ? `Request failed [${error.kind}]: ${error.message}` : 'Request failed';
  }

  const { response } = result;
  const lines = [`HTTP ${response.status} ${response.statusText}`.trimEnd()];
  const headers = formatHeaders(response.headers);
  if (headers) lines.push(headers);
  lines.push('');

  const body = formatResponseBody(response.contentType, response.body);
  if (body) lines.push(body);
  return lines.join('\n');
}

export function formatRequestLine(index: number, request: RequestDefinition): string {
  const name = request.name ?? '(unnamed)';
  const span = `lines ${request.startLine}-${request.endLine}`;
  return `  [${index}] ${name}: ${request.method} ${request.url} (${span})`;
}

export function formatEvent(event: EngineEvent): string {
  const { type, ...rest } = event;
  return `[${type}] ${JSON.stringify(rest)}`;
}

// ============================================================================
// JSON output
// ============================================================================

function parseJsonBody(contentType: string | undefined, body: string): unknown {
  if (bodyKind(contentType, body) !== 'json') return body;
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    return body;
  }
}

/**
 * Serializable view of a result. Raw body bytes are left out; JSON bodies
 * are embedded as values.
 */
export function resultToJson(result: ExecutionResult): Record<string, unknown> {
  const output: Record<string, unknown> = {
    success: result.success,
    executedAt: result.executedAt.toISOString(),
    request: result.request,
    timing: result.timing
  };

  if (result.response) {
    const { response } = result;
    output.response = {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
      cookies: response.cookies.map((cookie) => ({
        ...cookie,
        expires: cookie.expires?.toISOString()
      })),
      contentType: response.contentType,
      sizeBytes: response.sizeBytes,
      body: parseJsonBody(response.contentType, response.body)
    };
  }

  if (result.error) {
    output.error = result.error;
  }

  return output;
}
