/**
 * Provider registry: maps provider tags to their OpenAI-compatible endpoints
 * and builds the adapter for one call.
 */

import { BadRequestError } from './errors.js';
import type { ProviderAdapter } from './types.js';
import { OpenRouterAdapter } from './adapters/openrouter.js';
import { GenericOpenAIAdapter } from './adapters/generic-openai.js';

/** Default base URL per provider tag. */
export const PROVIDER_BASE_URLS: Readonly<Record<string, string>> = Object.freeze({
  openai: 'https://api.openai.com/v1',
  anthropic: 'https://api.anthropic.com/v1',
  gemini: 'https://generativelanguage.googleapis.com/v1beta/openai',
  mistral: 'https://api.mistral.ai/v1',
  groq: 'https://api.groq.com/openai/v1',
  cerebras: 'https://api.cerebras.ai/v1',
  deepseek: 'https://api.deepseek.com/v1',
  openrouter: 'https://openrouter.ai/api/v1',
});

/** Provider tags the client can reach without an explicit apiBase. */
export function knownProviders(): string[] {
  return Object.keys(PROVIDER_BASE_URLS);
}

/**
 * Create the adapter for a provider tag.
 * An explicit apiBase always wins, so any OpenAI-compatible server is
 * reachable under any tag.
 *
 * @throws BadRequestError when the tag is unknown and no apiBase was given.
 */
export function createAdapter(provider: string, model: string, apiBase?: string): ProviderAdapter {
  if (provider === 'openrouter') {
    return new OpenRouterAdapter(apiBase);
  }

  const baseUrl = apiBase ?? PROVIDER_BASE_URLS[provider];
  if (!baseUrl) {
    throw new BadRequestError(
      provider,
      model,
      `LLM Provider NOT provided or unsupported for model '${model}'. ` +
        `Prefix the model with one of: ${knownProviders().join(', ')}, or set api_base.`,
    );
  }

  return new GenericOpenAIAdapter(provider, baseUrl);
}
