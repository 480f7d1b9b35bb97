import {
  DEFAULT_MAX_REDIRECTS,
  DEFAULT_TIMEOUT_MS,
  executeWithTransport,
  shouldAttachBody
} from '../execute';
import { findRequestByName, parse } from '../parser';
import {
  createVariableResolver,
  type VariableMap,
  type VariableResolver
} from '../resolver/variable-resolver';
import { createFetchTransport } from '../runtime/fetch-transport';
import type { EngineEvent } from '../runtime/types';
import { type ChainSession, createChainSession } from '../session/chain-session';
import type {
  ExecuteDocumentOptions,
  ExecuteRequest,
  ExecutionResult,
  ExecutorConfig,
  RequestDefinition,
  ResolvedRequest,
  TimingInfo,
  VariableResolverConfig
} from '../types';
import { setOptional } from '../utils/optional';
import { classifyError, createExecutionSignal } from './execution-signal';
import { buildOutgoingHeaders, mergeHeaderDefaults } from './headers';
import { readResponse } from './response';

export type Executor = {
  /**
   * Resolve and send one request. Never throws: failures are reported in
   * `result.error`.
   */
  execute: (
    request: RequestDefinition,
    fileVariables?: VariableMap,
    signal?: AbortSignal
  ) => Promise<ExecutionResult>;

  /**
   * Parse `content` and run its requests in order, so later requests can
   * reference earlier ones. `name` or `line` select a single request.
   */
  executeDocument: (content: string, options?: ExecuteDocumentOptions) => Promise<ExecutionResult[]>;

  readonly session: ChainSession;
  readonly resolver: VariableResolver;
};

function elapsedSince(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}

function emptyTiming(total: number): TimingInfo {
  return { total, ttfb: 0, download: 0, dns: 0, connect: 0, tls: 0 };
}

export function createExecutor(config: ExecutorConfig = {}): Executor {
  const session = config.session ?? createChainSession();
  const resolver =
    config.resolver ??
    createVariableResolver(
      setOptional<VariableResolverConfig>({}).ifDefined('onEvent', config.onEvent).build()
    );
  const transport = config.transport ?? createFetchTransport();
  const onEvent = config.onEvent;
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const followRedirects = config.followRedirects ?? true;
  const maxRedirects = config.maxRedirects ?? DEFAULT_MAX_REDIRECTS;

  function emit(event: EngineEvent): void {
    onEvent?.(event);
  }

  function resolveRequest(request: RequestDefinition, fileVariables?: VariableMap): ResolvedRequest {
    const resolveField = (template: string) =>
      resolver.resolve(session.resolveChainReferences(template), request.variables, fileVariables);

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(
      mergeHeaderDefaults(config.headerDefaults, request.headers)
    )) {
      headers[name] = resolveField(value);
    }

    return setOptional<ResolvedRequest>({
      method: request.method,
      url: resolveField(request.url),
      headers
    })
      .ifDefined('body', request.body === undefined ? undefined : resolveField(request.body))
      .build();
  }

  async function execute(
    request: RequestDefinition,
    fileVariables?: VariableMap,
    signal?: AbortSignal
  ): Promise<ExecutionResult> {
    const executedAt = new Date();
    const start = performance.now();

    emit({ type: 'resolveStarted', method: request.method, url: request.url });
    const resolved = resolveRequest(request, fileVariables);
    emit({ type: 'resolveFinished', method: resolved.method, url: resolved.url });

    const execution = createExecutionSignal(signal, timeoutMs);
    let ttfb = 0;

    try {
      const withBody = shouldAttachBody(resolved.method, resolved.body);
      // Rejects relative and malformed URLs before anything goes on the wire.
      new URL(resolved.url);

      emit({ type: 'fetchStarted', method: resolved.method, url: resolved.url });
      const response = await executeWithTransport(
        setOptional<ExecuteRequest>({
          method: resolved.method,
          url: resolved.url,
          headers: buildOutgoingHeaders(resolved.headers, withBody)
        })
          .ifDefined('body', withBody ? resolved.body : undefined)
          .build(),
        {
          signal: execution.signal,
          timeoutMs,
          followRedirects,
          maxRedirects,
          onRedirect: (hop) => emit({ type: 'redirectFollowed', ...hop })
        },
        transport
      );
      ttfb = elapsedSince(start);
      emit({
        type: 'fetchFinished',
        method: resolved.method,
        url: resolved.url,
        status: response.status,
        ttfb
      });

      const executionResponse = await readResponse(response);
      const total = elapsedSince(start);

      if (request.name) {
        session.storeResponse(request.name, {
          status: executionResponse.status,
          headers: executionResponse.headers,
          body: executionResponse.body
        });
        emit({ type: 'responseStored', name: request.name, status: executionResponse.status });
      }

      return {
        success: true,
        request: resolved,
        response: executionResponse,
        timing: {
          ...emptyTiming(total),
          ttfb,
          download: Math.max(0, Math.round((total - ttfb) * 100) / 100)
        },
        executedAt
      };
    } catch (err) {
      const error = classifyError(err, {
        cancelled: execution.cancelled(),
        timedOut: execution.timedOut(),
        timeoutMs
      });
      emit({ type: 'error', stage: 'execute', message: error.message });
      return {
        success: false,
        request: resolved,
        timing: { ...emptyTiming(elapsedSince(start)), ttfb },
        executedAt,
        error
      };
    } finally {
      execution.cleanup();
    }
  }

  async function executeDocument(
    content: string,
    options: ExecuteDocumentOptions = {}
  ): Promise<ExecutionResult[]> {
    const document = parse(content);

    let selected: readonly RequestDefinition[] = document.requests;
    if (options.name !== undefined) {
      const match = findRequestByName(document, options.name);
      selected = match ? [match] : [];
    } else if (options.line !== undefined) {
      const line = options.line;
      selected = document.requests.filter((r) => line >= r.startLine && line <= r.endLine);
    }

    const results: ExecutionResult[] = [];
    for (const request of selected) {
      const result = await execute(request, document.fileVariables, options.signal);
      results.push(result);
      if (options.stopOnFailure && !result.success) break;
    }
    return results;
  }

  return { execute, executeDocument, session, resolver };
}
