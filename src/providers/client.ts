/**
 * LlmClient: the ProviderClient implementation.
 * Routes a provider-prefixed model id to an OpenAI-compatible adapter and
 * owns per-attempt timeouts and retries. Retries only happen before a
 * response (or the first stream byte) has been handed to the caller.
 */

import { logger } from '../shared/logger.js';
import type { ChatCompletionChunk } from '../shared/types.js';
import { readSSEData } from '../streaming/sse-parser.js';
import {
  APIConnectionError,
  InternalServerError,
  ProviderError,
  RateLimitError,
  RequestTimeoutError,
  errorFromPayload,
  isRetryable,
} from './errors.js';
import { inferProviderFromModel, stripProviderPrefix, UNKNOWN_PROVIDER } from './infer.js';
import { estimateCost, loadCatalog, lookupPricing, type PriceCatalog } from './pricing.js';
import { createAdapter } from './registry.js';
import type {
  CompletionParams,
  CompletionResult,
  CompletionStream,
  CostableResponse,
  ModelPricing,
  PricingOverride,
  ProviderAdapter,
  ProviderClient,
} from './types.js';

const BASE_BACKOFF_MS = 500;
const MAX_BACKOFF_MS = 8000;

export interface LlmClientOptions {
  catalog?: PriceCatalog;
  /** Injected so tests do not wait out real backoff. */
  sleep?: (ms: number) => Promise<void>;
}

interface Target {
  provider: string;
  upstreamModel: string;
  adapter: ProviderAdapter;
}

export class LlmClient implements ProviderClient {
  private readonly catalog: PriceCatalog;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: LlmClientOptions = {}) {
    this.catalog = options.catalog ?? loadCatalog();
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async completion(params: CompletionParams): Promise<CompletionResult> {
    const target = this.resolveTarget(params);

    const response = await this.withRetries(params, target, async () => {
      const signal = AbortSignal.timeout(params.timeout * 1000);
      try {
        return await target.adapter.chatCompletion(target.upstreamModel, params.body, {
          apiKey: params.apiKey,
          signal,
        });
      } catch (error) {
        throw this.normalizeError(error, params, target);
      }
    });

    return { response, provider: target.provider };
  }

  async completionStream(params: CompletionParams): Promise<CompletionStream> {
    const target = this.resolveTarget(params);

    const response = await this.withRetries(params, target, async () => {
      // The timeout covers opening the stream only; a long generation is not cut off
      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, params.timeout * 1000);

      try {
        return await target.adapter.chatCompletionStream(target.upstreamModel, params.body, {
          apiKey: params.apiKey,
          signal: controller.signal,
        });
      } catch (error) {
        if (timedOut) {
          throw new RequestTimeoutError(target.provider, params.model, params.timeout);
        }
        throw this.normalizeError(error, params, target);
      } finally {
        clearTimeout(timer);
      }
    });

    if (!response.body) {
      throw new InternalServerError(target.provider, params.model, 'Streaming response has no body');
    }

    return {
      provider: target.provider,
      chunks: iterateChunks(response.body, target.provider, params.model),
    };
  }

  completionCost(response: CostableResponse, override?: PricingOverride): number {
    return estimateCost(this.catalog, response, override);
  }

  getModelPricing(model: string): ModelPricing | null {
    return lookupPricing(this.catalog, model);
  }

  private resolveTarget(params: CompletionParams): Target {
    let provider = inferProviderFromModel(params.model);
    if (provider === UNKNOWN_PROVIDER && params.apiBase) {
      provider = 'custom';
    }

    const upstreamModel = stripProviderPrefix(params.model, provider);
    const adapter = createAdapter(provider, params.model, params.apiBase);
    return { provider, upstreamModel, adapter };
  }

  private async withRetries<T>(
    params: CompletionParams,
    target: Target,
    attempt: () => Promise<T>,
  ): Promise<T> {
    for (let attemptNumber = 0; ; attemptNumber++) {
      try {
        return await attempt();
      } catch (error) {
        if (attemptNumber >= params.numRetries || !isRetryable(error)) {
          throw error;
        }

        const delayMs = backoffDelay(attemptNumber, error);
        logger.warn(
          {
            provider: target.provider,
            model: params.model,
            attempt: attemptNumber + 1,
            delayMs,
            error: error instanceof Error ? error.message : String(error),
          },
          'Retrying provider call',
        );
        await this.sleep(delayMs);
      }
    }
  }

  private normalizeError(error: unknown, params: CompletionParams, target: Target): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    if (error instanceof DOMException && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return new RequestTimeoutError(target.provider, params.model, params.timeout);
    }
    if (error instanceof TypeError) {
      const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
      return new APIConnectionError(target.provider, params.model, `${error.message}${cause}`);
    }
    if (error instanceof SyntaxError) {
      return new InternalServerError(target.provider, params.model, `Invalid JSON from provider: ${error.message}`);
    }
    return new InternalServerError(
      target.provider,
      params.model,
      error instanceof Error ? error.message : String(error),
    );
  }
}

function backoffDelay(attemptNumber: number, error: unknown): number {
  const exponential = Math.min(2 ** attemptNumber * BASE_BACKOFF_MS, MAX_BACKOFF_MS);
  if (error instanceof RateLimitError && error.retryAfterMs !== undefined) {
    return Math.min(Math.max(error.retryAfterMs, exponential), MAX_BACKOFF_MS);
  }
  return exponential;
}

/**
 * Decode SSE data payloads into chunks.
 * A payload carrying an `error` object is raised as a provider error.
 */
async function* iterateChunks(
  body: ReadableStream<Uint8Array>,
  provider: string,
  model: string,
): AsyncGenerator<ChatCompletionChunk> {
  try {
    for await (const data of readSSEData(body)) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(data);
      } catch {
        throw new InternalServerError(provider, model, `Malformed stream chunk: ${data}`);
      }

      if (!isObject(parsed)) {
        throw new InternalServerError(provider, model, `Malformed stream chunk: ${data}`);
      }

      const inBand = errorFromPayload(provider, model, parsed, data);
      if (inBand) {
        throw inBand;
      }

      yield parsed as ChatCompletionChunk;
    }
  } catch (error) {
    if (error instanceof ProviderError) {
      throw error;
    }
    if (error instanceof TypeError) {
      throw new APIConnectionError(provider, model, `Stream interrupted: ${error.message}`);
    }
    throw error;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
