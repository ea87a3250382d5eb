/**
 * Abstract base adapter with shared HTTP request logic.
 * Concrete adapters extend this and supply provider-specific headers or
 * body preparation.
 */

import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { errorFromPayload, errorFromStatus, InternalServerError } from './errors.js';
import type { ChatCompletionResponse } from '../shared/types.js';
import type { AdapterCallOptions, ProviderAdapter } from './types.js';

/** The parts of a completion body the proxy reads; everything else passes through. */
const CompletionBodySchema = z.looseObject({
  choices: z.array(z.looseObject({})),
  usage: z
    .looseObject({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .nullish(),
});

export abstract class BaseAdapter implements ProviderAdapter {
  public readonly providerType: string;
  public readonly baseUrl: string;

  constructor(providerType: string, baseUrl: string) {
    this.providerType = providerType;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /**
   * Send a non-streaming chat completion request to the provider.
   * Handles URL construction, headers, and error mapping.
   */
  async chatCompletion(
    model: string,
    body: Record<string, unknown>,
    options: AdapterCallOptions,
  ): Promise<ChatCompletionResponse> {
    const url = `${this.baseUrl}/chat/completions`;
    const requestBody = this.prepareRequestBody(model, body, false);

    logger.debug({ provider: this.providerType, model, url }, 'Sending chat completion request');

    const start = performance.now();
    const response = await fetch(url, {
      method: 'POST',
      headers: this.buildHeaders(options.apiKey),
      body: JSON.stringify(requestBody),
      signal: options.signal,
    });
    const latencyMs = Math.round(performance.now() - start);

    if (!response.ok) {
      await this.throwForStatus(model, response, latencyMs);
    }

    const text = await response.text();
    const parsed: unknown = JSON.parse(text);

    const inBand = errorFromPayload(this.providerType, model, parsed, text);
    if (inBand) {
      logger.warn({ provider: this.providerType, model, latencyMs }, 'Provider returned an error payload');
      throw inBand;
    }

    const validated = CompletionBodySchema.safeParse(parsed);
    if (!validated.success) {
      throw new InternalServerError(
        this.providerType,
        model,
        `Malformed response: ${z.prettifyError(validated.error)}`,
      );
    }
    const responseBody = parsed as ChatCompletionResponse;

    logger.debug(
      { provider: this.providerType, model, status: response.status, latencyMs },
      'Chat completion succeeded',
    );

    return responseBody;
  }

  /**
   * Send a streaming chat completion request to the provider.
   * Returns the raw Response with ReadableStream body for SSE parsing.
   */
  async chatCompletionStream(
    model: string,
    body: Record<string, unknown>,
    options: AdapterCallOptions,
  ): Promise<Response> {
    const url = `${this.baseUrl}/chat/completions`;
    const requestBody = this.prepareRequestBody(model, body, true);

    logger.debug({ provider: this.providerType, model, url }, 'Starting streaming request');

    const response = await fetch(url, {
      method: 'POST',
      headers: this.buildHeaders(options.apiKey),
      body: JSON.stringify(requestBody),
      signal: options.signal,
    });

    if (!response.ok) {
      await this.throwForStatus(model, response);
    }

    return response;
  }

  /**
   * Prepare the request body for the provider.
   * Default: merge model into body and set the stream flag; streaming calls
   * ask for a trailing usage chunk unless the client chose otherwise.
   */
  protected prepareRequestBody(
    model: string,
    body: Record<string, unknown>,
    stream: boolean,
  ): Record<string, unknown> {
    const prepared: Record<string, unknown> = { ...body, model, stream };
    if (stream && prepared['stream_options'] === undefined) {
      prepared['stream_options'] = { include_usage: true };
    }
    return prepared;
  }

  /**
   * Get provider-specific headers.
   * Default: no extra headers. Override in adapters that need them.
   */
  getExtraHeaders(): Record<string, string> {
    return {};
  }

  private buildHeaders(apiKey: string | undefined): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {}),
      ...this.getExtraHeaders(),
    };
  }

  private async throwForStatus(model: string, response: Response, latencyMs?: number): Promise<never> {
    const errorText = await response.text();
    const retryAfter = response.headers.get('retry-after');
    const retryAfterSeconds = retryAfter !== null ? parseFloat(retryAfter) : NaN;

    logger.warn(
      { provider: this.providerType, model, status: response.status, latencyMs },
      'Provider returned error',
    );

    throw errorFromStatus(
      this.providerType,
      model,
      response.status,
      errorText,
      isNaN(retryAfterSeconds) ? undefined : Math.round(retryAfterSeconds * 1000),
    );
  }
}
