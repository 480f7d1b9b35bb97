import { createNodeIO } from './runtime/node-io';
import type { IO } from './runtime/types';
import type { ParsedDocument, RequestDefinition } from './types';
import { getIgnoreCase, setIgnoreCase } from './utils/case-insensitive';
import { setOptional } from './utils/optional';

const DELIMITER_PATTERN = /^###/;
const NAME_DIRECTIVE_PATTERN = /^(?:#|\/\/)\s*@name\s+(\S+)\s*$/i;
const VARIABLE_PATTERN = /^@([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;
const COMMENT_PATTERN = /^\s*(?:#|\/\/)/;
const REQUEST_LINE_PATTERN = /^(GET|POST|PUT|DELETE|PATCH|HEAD|OPTIONS|TRACE|CONNECT)\s+(.+)$/i;
const HTTP_VERSION_SUFFIX = /\s+HTTP\/[\d.]+$/i;
// Header names are RFC 9110 tokens; other lines in the header block are skipped.
const HEADER_PATTERN = /^\s*([!#$%&'*+.^_`|~0-9A-Za-z-]+)\s*:\s*(.*)$/;

// ============================================================================
// Line classification
// ============================================================================

export type ClassifiedLine =
  | { kind: 'delimiter' }
  | { kind: 'name'; name: string }
  | { kind: 'variable'; name: string; value: string }
  | { kind: 'comment' }
  | { kind: 'blank'; raw: string }
  | { kind: 'request'; method: string; url: string; raw: string }
  | { kind: 'text'; raw: string };

/**
 * Classify a single line. Directives take priority over the request line,
 * which is why a body line such as `# note` never reaches the body buffer.
 */
export function classifyLine(line: string): ClassifiedLine {
  if (DELIMITER_PATTERN.test(line)) return { kind: 'delimiter' };

  const nameMatch = line.match(NAME_DIRECTIVE_PATTERN);
  if (nameMatch?.[1]) return { kind: 'name', name: nameMatch[1] };

  const variableMatch = line.match(VARIABLE_PATTERN);
  if (variableMatch?.[1] !== undefined) {
    return { kind: 'variable', name: variableMatch[1], value: (variableMatch[2] ?? '').trim() };
  }

  if (COMMENT_PATTERN.test(line)) return { kind: 'comment' };

  if (line.trim() === '') return { kind: 'blank', raw: line };

  const requestMatch = line.match(REQUEST_LINE_PATTERN);
  if (requestMatch?.[1] && requestMatch[2]) {
    const url = requestMatch[2].trim().replace(HTTP_VERSION_SUFFIX, '');
    return { kind: 'request', method: requestMatch[1].toUpperCase(), url, raw: line };
  }

  return { kind: 'text', raw: line };
}

// ============================================================================
// State machine
// ============================================================================

export type RequestDraft = {
  name?: string;
  method: string;
  url: string;
  headers: Record<string, string>;
  variables: Record<string, string>;
  bodyLines: string[];
  startLine: number;
};

export type ParserState =
  | { kind: 'seeking'; pendingName?: string }
  | { kind: 'headers'; draft: RequestDraft }
  | { kind: 'body'; draft: RequestDraft };

/** Mutable output the state machine writes into while walking the document. */
export type ParseSink = {
  requests: RequestDefinition[];
  fileVariables: Record<string, string>;
};

export const INITIAL_STATE: ParserState = { kind: 'seeking' };

/**
 * Turn a draft into a request definition, or `undefined` when no URL was set.
 */
export function finalizeDraft(draft: RequestDraft, endLine: number): RequestDefinition | undefined {
  if (!draft.url) return undefined;

  const bodyLines = [...draft.bodyLines];
  while (bodyLines.length > 0 && bodyLines[bodyLines.length - 1]?.trim() === '') {
    bodyLines.pop();
  }
  const body = bodyLines.length > 0 ? bodyLines.join('\n') : undefined;

  return setOptional<RequestDefinition>({
    method: draft.method,
    url: draft.url,
    headers: { ...draft.headers },
    variables: { ...draft.variables },
    startLine: draft.startLine,
    endLine
  })
    .ifDefined('name', draft.name)
    .ifDefined('body', body)
    .build();
}

function close(state: ParserState, endLine: number, sink: ParseSink): void {
  if (state.kind === 'seeking') return;
  const request = finalizeDraft(state.draft, endLine);
  if (request) sink.requests.push(request);
}

/**
 * Advance the parser by one line.
 *
 * @param lineNumber - 1-indexed number of `line`
 */
export function step(
  state: ParserState,
  line: string,
  lineNumber: number,
  sink: ParseSink
): ParserState {
  const classified = classifyLine(line);

  switch (classified.kind) {
    case 'delimiter':
      close(state, lineNumber - 1, sink);
      return { kind: 'seeking' };

    case 'name':
      // Only meaningful before a request line; a delimiter clears it anyway.
      return state.kind === 'seeking' ? { kind: 'seeking', pendingName: classified.name } : state;

    case 'variable':
      if (state.kind === 'seeking') {
        setIgnoreCase(sink.fileVariables, classified.name, classified.value);
      } else {
        setIgnoreCase(state.draft.variables, classified.name, classified.value);
      }
      return state;

    case 'comment':
      return state;

    default:
      break;
  }

  switch (state.kind) {
    case 'seeking': {
      if (classified.kind !== 'request') return state;
      const draft = setOptional<RequestDraft>({
        method: classified.method,
        url: classified.url,
        headers: {},
        variables: {},
        bodyLines: [],
        startLine: lineNumber
      })
        .ifDefined('name', state.pendingName)
        .build();
      return { kind: 'headers', draft };
    }

    case 'headers': {
      if (classified.kind === 'blank') return { kind: 'body', draft: state.draft };
      const headerMatch = classified.raw.match(HEADER_PATTERN);
      const headerName = headerMatch?.[1];
      if (headerMatch && headerName) {
        setIgnoreCase(state.draft.headers, headerName, (headerMatch[2] ?? '').trim());
      }
      return state;
    }

    case 'body':
      state.draft.bodyLines.push(classified.raw);
      return state;
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse `.http` content into request definitions and file-scoped variables.
 *
 * Malformed lines are skipped; a document without requests parses to an
 * empty result.
 */
export function parse(content: string): ParsedDocument {
  const lines = content.split(/\r\n|\r|\n/);
  const sink: ParseSink = { requests: [], fileVariables: {} };

  let state: ParserState = INITIAL_STATE;
  for (let i = 0; i < lines.length; i++) {
    state = step(state, lines[i] ?? '', i + 1, sink);
  }
  close(state, lines.length, sink);

  return { requests: sink.requests, fileVariables: sink.fileVariables };
}

/**
 * Find the request whose line span contains `line` (1-indexed).
 */
export function findRequestAt(content: string, line: number): RequestDefinition | undefined {
  return parse(content).requests.find((r) => line >= r.startLine && line <= r.endLine);
}

/**
 * Find a request by its `@name`, ignoring case.
 */
export function findRequestByName(
  document: ParsedDocument,
  name: string
): RequestDefinition | undefined {
  const lower = name.toLowerCase();
  return document.requests.find((r) => r.name?.toLowerCase() === lower);
}

/**
 * Look up a header template on a request, ignoring case.
 */
export function getRequestHeader(request: RequestDefinition, name: string): string | undefined {
  return getIgnoreCase(request.headers, name);
}

/**
 * Parse a `.http` file through an IO adapter (Node fs by default).
 */
export async function parseFile(path: string, io: IO = createNodeIO()): Promise<ParsedDocument> {
  const content = await io.readText(path);
  return parse(content);
}
