/**
 * Generic OpenAI-compatible adapter.
 * For providers that follow the OpenAI API shape without special headers:
 * the hosted vendors' compatibility endpoints and self-hosted servers
 * reached through a route's apiBase.
 */

import { BaseAdapter } from '../base-adapter.js';

export class GenericOpenAIAdapter extends BaseAdapter {
  constructor(providerType: string, baseUrl: string) {
    super(providerType, baseUrl);
  }
}
