/**
 * Request execution engine.
 *
 * Validates a chat request, resolves its alias against the live route table,
 * calls the provider client and writes exactly one ledger record per
 * request, whatever the outcome. Nothing here knows about HTTP: the route
 * handler turns an ExecutionResult into a JSON body or an SSE stream.
 */

import { classifyError, describeForLedger, type ClassifiedError } from '../classification/classifier.js';
import { InternalServerError } from '../providers/errors.js';
import { resolveProviderName, UNKNOWN_PROVIDER } from '../providers/infer.js';
import type {
  CompletionParams,
  CompletionResult,
  CompletionStream,
  CostableResponse,
  ProviderClient,
} from '../providers/types.js';
import { parseChatRequest } from '../routing/request-schema.js';
import { resolveRoute, serializeResolved, type RouteTableStore } from '../routing/route-table.js';
import type { ResolvedRequest } from '../routing/types.js';
import { buildErrorResponse } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { OpenAIError, Usage } from '../shared/types.js';
import { StreamAccumulator } from './accumulator.js';
import type { EngineOptions, ExecutionResult, LedgerWriter, StreamSink } from './types.js';

const DONE_FRAME = '[DONE]';
const UNKNOWN_MODEL = 'unknown';

/** Request fields never written to the ledger for unresolved requests. */
const SECRET_KEYS = ['api_key', 'api_base'];

export interface ExecutorDeps {
  routes: RouteTableStore;
  client: ProviderClient;
  ledger: LedgerWriter;
  options: EngineOptions;
}

/** Per-request bookkeeping shared by every outcome. */
interface RequestContext {
  alias: string;
  provider: string;
  requestData: Record<string, unknown>;
  startedAt: number;
}

export class Executor {
  private readonly now: () => number;
  private readonly clock: () => Date;

  constructor(private readonly deps: ExecutorDeps) {
    this.now = deps.options.now ?? (() => performance.now());
    this.clock = deps.options.clock ?? (() => new Date());
  }

  /**
   * Execute one chat completion request.
   * Never rejects: every failure becomes a `failed` result with an
   * OpenAI-compatible body, after its ledger row has been written.
   */
  async execute(body: unknown): Promise<ExecutionResult> {
    const ctx = initialContext(body, this.now());

    let resolved: ResolvedRequest;
    try {
      const request = parseChatRequest(body);
      resolved = resolveRoute(this.deps.routes.current, request, this.deps.options.defaults, this.deps.options.env);
    } catch (error) {
      return this.fail(ctx, error);
    }

    ctx.provider = resolved.provider;
    ctx.requestData = serializeResolved(resolved);

    logger.info(
      { alias: resolved.alias, model: resolved.model, provider: resolved.provider, stream: resolved.stream },
      `Chat completion request (model="${resolved.alias}" -> "${resolved.model}"${resolved.stream ? ', streaming' : ''})`,
    );

    const params = toCompletionParams(resolved);
    return resolved.stream ? this.executeStream(ctx, resolved, params) : this.executeCompletion(ctx, resolved, params);
  }

  /**
   * Record and shape a request that never reached validation, such as a
   * body that is not JSON.
   */
  reject(error: unknown, body: unknown = null): ExecutionResult {
    return this.fail(initialContext(body, this.now()), error);
  }

  private async executeCompletion(
    ctx: RequestContext,
    resolved: ResolvedRequest,
    params: CompletionParams,
  ): Promise<ExecutionResult> {
    let result: CompletionResult;
    let usage: Usage | undefined;
    try {
      result = await this.deps.client.completion(params);
      if (!isObject(result.response)) {
        throw new InternalServerError(resolved.provider, resolved.model, 'Malformed response: expected a JSON object');
      }
      usage = isObject(result.response.usage) ? result.response.usage : undefined;
    } catch (error) {
      return this.fail(ctx, error);
    }

    const provider = resolveProviderName(resolved.model, result.provider);
    const durationMs = this.now() - ctx.startedAt;

    this.record({
      ...ctx,
      provider,
      durationMs,
      promptTokens: usage?.prompt_tokens ?? 0,
      completionTokens: usage?.completion_tokens ?? 0,
      totalTokens: usage?.total_tokens ?? 0,
      cost: this.costOf({ model: resolved.model, usage }, resolved),
      responseData: result.response,
      error: null,
    });

    logger.info(
      { alias: resolved.alias, provider, durationMs: Math.round(durationMs), totalTokens: usage?.total_tokens ?? 0 },
      'Chat completion succeeded',
    );

    return { kind: 'completed', provider, response: result.response };
  }

  private async executeStream(
    ctx: RequestContext,
    resolved: ResolvedRequest,
    params: CompletionParams,
  ): Promise<ExecutionResult> {
    // Open before the first byte goes out, so an upstream refusal is still a JSON error
    let stream: CompletionStream;
    try {
      stream = await this.deps.client.completionStream(params);
    } catch (error) {
      return this.fail(ctx, error);
    }

    const provider = resolveProviderName(resolved.model, stream.provider);
    return {
      kind: 'streaming',
      provider,
      pipe: (sink) => this.pipeStream({ ...ctx, provider }, resolved, stream, sink),
    };
  }

  /**
   * Forward chunks to the sink while accumulating them. Resolves once the
   * stream is finished, abandoned or failed; the ledger row is written on
   * the way out in every case.
   */
  private async pipeStream(
    ctx: RequestContext,
    resolved: ResolvedRequest,
    stream: CompletionStream,
    sink: StreamSink,
  ): Promise<void> {
    const accumulator = new StreamAccumulator(resolved.model, Math.floor(this.clock().getTime() / 1000));
    const drain = this.deps.options.drainOnDisconnect;
    let disconnected = false;
    let failure: ClassifiedError | null = null;

    try {
      for await (const chunk of stream.chunks) {
        if (!disconnected && !sink.isOpen) {
          disconnected = true;
          logger.info(
            { alias: resolved.alias, chunks: accumulator.chunks, drain },
            'Client disconnected mid-stream',
          );
          if (!drain) break;
        }

        accumulator.add(chunk);

        if (!disconnected && !(await sink.send(JSON.stringify(chunk)))) {
          disconnected = true;
          logger.info({ alias: resolved.alias, chunks: accumulator.chunks, drain }, 'Client stopped accepting frames');
          if (!drain) break;
        }
      }
    } catch (error) {
      failure = classifyError(error);
      accumulator.fail(toOpenAIError(failure));
      logger.warn(
        { alias: resolved.alias, provider: ctx.provider, kind: failure.kind, chunks: accumulator.chunks },
        `Stream failed: ${failure.message}`,
      );
      if (!disconnected) {
        await sink.send(JSON.stringify(buildErrorResponse(failure.type, failure.message, failure.code)));
      }
    } finally {
      if (!disconnected && sink.isOpen) {
        await sink.send(DONE_FRAME);
      }

      const response = accumulator.toResponse();
      const usage = response.usage;
      const durationMs = this.now() - ctx.startedAt;

      this.record({
        ...ctx,
        durationMs,
        promptTokens: usage?.prompt_tokens ?? 0,
        completionTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
        cost: failure ? 0 : this.costOf({ model: resolved.model, usage }, resolved),
        responseData: response,
        error: failure ? describeForLedger(failure) : null,
      });

      if (!failure) {
        logger.info(
          {
            alias: resolved.alias,
            provider: ctx.provider,
            durationMs: Math.round(durationMs),
            chunks: accumulator.chunks,
            totalTokens: usage?.total_tokens ?? 0,
            disconnected,
          },
          'Stream completed',
        );
      }
    }
  }

  /** Classify, record and shape a failure that happened before any byte went out. */
  private fail(ctx: RequestContext, error: unknown): ExecutionResult {
    const classified = classifyError(error);
    const durationMs = this.now() - ctx.startedAt;

    this.record({
      ...ctx,
      durationMs,
      promptTokens: 0,
      completionTokens: 0,
      totalTokens: 0,
      cost: 0,
      responseData: null,
      error: describeForLedger(classified),
    });

    logger.warn(
      { alias: ctx.alias, provider: ctx.provider, kind: classified.kind, status: classified.status },
      `Chat completion failed: ${classified.message}`,
    );

    return {
      kind: 'failed',
      status: classified.status,
      body: buildErrorResponse(classified.type, classified.message, classified.code),
    };
  }

  /** Zero when the model has no known price; a missing price never fails a request. */
  private costOf(response: CostableResponse, resolved: ResolvedRequest): number {
    try {
      return this.deps.client.completionCost(response, resolved.pricing);
    } catch (error) {
      logger.debug(
        { model: resolved.model, error: error instanceof Error ? error.message : String(error) },
        'Cost unavailable, recording 0',
      );
      return 0;
    }
  }

  private record(
    entry: RequestContext & {
      durationMs: number;
      promptTokens: number;
      completionTokens: number;
      totalTokens: number;
      cost: number;
      responseData: unknown;
      error: string | null;
    },
  ): void {
    try {
      this.deps.ledger.logRequest({
        timestamp: this.clock(),
        model: entry.alias,
        provider: entry.provider,
        promptTokens: entry.promptTokens,
        completionTokens: entry.completionTokens,
        totalTokens: entry.totalTokens,
        cost: entry.cost,
        durationMs: entry.durationMs,
        requestData: entry.requestData,
        responseData: entry.responseData,
        error: entry.error,
      });
    } catch (logError) {
      logger.error(
        { alias: entry.alias, error: logError instanceof Error ? logError.message : String(logError) },
        'Failed to write ledger record',
      );
    }
  }
}

function initialContext(body: unknown, startedAt: number): RequestContext {
  if (!isObject(body)) {
    return { alias: UNKNOWN_MODEL, provider: UNKNOWN_PROVIDER, requestData: { body: body ?? null }, startedAt };
  }

  const requestData: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    if (!SECRET_KEYS.includes(key)) {
      requestData[key] = value;
    }
  }

  const model = body['model'];
  return {
    alias: typeof model === 'string' && model.length > 0 ? model : UNKNOWN_MODEL,
    provider: UNKNOWN_PROVIDER,
    requestData,
    startedAt,
  };
}

function toCompletionParams(resolved: ResolvedRequest): CompletionParams {
  return {
    model: resolved.model,
    apiKey: resolved.apiKey,
    apiBase: resolved.apiBase,
    timeout: resolved.timeout,
    numRetries: resolved.numRetries,
    body: resolved.params,
  };
}

function toOpenAIError(classified: ClassifiedError): OpenAIError {
  return buildErrorResponse(classified.type, classified.message, classified.code).error;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
