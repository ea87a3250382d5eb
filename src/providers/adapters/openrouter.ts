/**
 * OpenRouter adapter.
 * Adds the HTTP-Referer and X-Title headers OpenRouter uses to attribute
 * traffic to an application.
 */

import { BaseAdapter } from '../base-adapter.js';

const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';

export class OpenRouterAdapter extends BaseAdapter {
  constructor(baseUrl?: string) {
    super('openrouter', baseUrl ?? DEFAULT_BASE_URL);
  }

  override getExtraHeaders(): Record<string, string> {
    return {
      'HTTP-Referer': 'llm-tally',
      'X-Title': 'llm-tally',
    };
  }
}
