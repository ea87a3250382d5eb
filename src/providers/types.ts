/**
 * Core provider client types.
 * The execution engine talks to upstream models exclusively through the
 * ProviderClient interface; adapters and the pricing catalog sit behind it.
 */

import type { ChatCompletionChunk, ChatCompletionResponse } from '../shared/types.js';

/** Parameters for one upstream call, after alias resolution. */
export interface CompletionParams {
  /** Provider-prefixed model id, e.g. `openai/gpt-4.1-mini`. */
  model: string;
  /** Resolved secret; absent means the call goes out without credentials. */
  apiKey?: string;
  /** Endpoint override for OpenAI-compatible servers. */
  apiBase?: string;
  /** Per-attempt timeout in seconds. */
  timeout: number;
  /** Additional attempts after the first on retryable failures. */
  numRetries: number;
  /** Messages and every pass-through parameter, in wire keys. */
  body: Record<string, unknown>;
}

/** Result of a non-streaming call. */
export interface CompletionResult {
  response: ChatCompletionResponse;
  /** Provider tag the client actually used (response metadata). */
  provider: string;
}

/** An opened upstream stream. */
export interface CompletionStream {
  /** Provider tag the client actually used. */
  provider: string;
  /** Incremental chunks; breaking out of the loop cancels the upstream body. */
  chunks: AsyncIterable<ChatCompletionChunk>;
}

/** Per-token prices for one model. */
export interface ModelPricing {
  inputCostPerToken: number;
  outputCostPerToken: number;
  provider?: string;
}

/** Per-million-token override configured on a route. */
export interface PricingOverride {
  inputCostPerMillion?: number;
  outputCostPerMillion?: number;
}

/** Response shape the cost function needs. */
export interface CostableResponse {
  model: string;
  usage?: { prompt_tokens?: number; completion_tokens?: number } | null;
}

/**
 * Provider-abstraction client: one call surface for every upstream.
 */
export interface ProviderClient {
  /**
   * Send a non-streaming chat completion request.
   * @throws ProviderError subclasses on upstream failure.
   */
  completion(params: CompletionParams): Promise<CompletionResult>;

  /**
   * Open a streaming chat completion. Resolves once upstream headers arrive;
   * failures before that point are thrown here, later ones from the iterator.
   */
  completionStream(params: CompletionParams): Promise<CompletionStream>;

  /**
   * Estimate the cost of a response from its usage block.
   * @throws Error when the model has no known pricing.
   */
  completionCost(response: CostableResponse, override?: PricingOverride): number;

  /** Look up catalog pricing for a model id (with or without provider prefix). */
  getModelPricing(model: string): ModelPricing | null;
}

/**
 * An OpenAI-compatible upstream endpoint.
 */
export interface ProviderAdapter {
  /** Provider tag (e.g., 'openai', 'groq', 'openrouter'). */
  readonly providerType: string;
  /** API base URL for this provider. */
  readonly baseUrl: string;

  /**
   * Send a non-streaming chat completion request.
   * @param model - The model id as the provider knows it (prefix stripped).
   * @throws ProviderError subclasses on non-OK responses.
   */
  chatCompletion(
    model: string,
    body: Record<string, unknown>,
    options: AdapterCallOptions,
  ): Promise<ChatCompletionResponse>;

  /**
   * Send a streaming chat completion request.
   * Returns the raw fetch Response so the caller can read the SSE body.
   * @throws ProviderError subclasses on non-OK responses (before the stream starts).
   */
  chatCompletionStream(
    model: string,
    body: Record<string, unknown>,
    options: AdapterCallOptions,
  ): Promise<Response>;

  /** Provider-specific headers to include with every request. */
  getExtraHeaders(): Record<string, string>;
}

/** Per-call options for an adapter. */
export interface AdapterCallOptions {
  apiKey?: string;
  signal?: AbortSignal;
}
