import { findKey } from '../utils/case-insensitive';

/**
 * Headers that describe the body rather than the message. They travel with
 * the body and are dropped when no body is sent.
 */
const CONTENT_HEADERS = new Set([
  'content-type',
  'content-length',
  'content-encoding',
  'content-language',
  'content-location',
  'content-disposition',
  'content-md5',
  'content-range',
  'expires',
  'last-modified',
  'allow'
]);

export function isContentHeader(name: string): boolean {
  return CONTENT_HEADERS.has(name.toLowerCase());
}

export type PartitionedHeaders = {
  message: Record<string, string>;
  content: Record<string, string>;
};

export function partitionHeaders(headers: Readonly<Record<string, string>>): PartitionedHeaders {
  const message: Record<string, string> = {};
  const content: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (isContentHeader(name)) content[name] = value;
    else message[name] = value;
  }
  return { message, content };
}

/**
 * Headers actually sent: message headers always, content headers only with
 * a body. `Content-Length` is left to the transport, which measures the body.
 */
export function buildOutgoingHeaders(
  headers: Readonly<Record<string, string>>,
  withBody: boolean
): Record<string, string> {
  const { message, content } = partitionHeaders(headers);
  if (!withBody) return message;

  const outgoing = { ...message };
  for (const [name, value] of Object.entries(content)) {
    if (name.toLowerCase() !== 'content-length') outgoing[name] = value;
  }
  return outgoing;
}

/**
 * Defaults first, then request headers; a request header replaces a default
 * of the same name in any casing.
 */
export function mergeHeaderDefaults(
  defaults: Readonly<Record<string, string>> | undefined,
  headers: Readonly<Record<string, string>>
): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const [name, value] of Object.entries(defaults ?? {})) {
    if (findKey(headers, name) === undefined) merged[name] = value;
  }
  return { ...merged, ...headers };
}

/**
 * Response headers keyed by lower-cased name. Repeated headers are joined
 * with `, `.
 */
export function extractResponseHeaders(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, name) => {
    const key = name.toLowerCase();
    const existing = result[key];
    result[key] = existing === undefined ? value : `${existing}, ${value}`;
  });
  return result;
}
