/**
 * Rebuilds a full chat completion from streamed chunks.
 * Only used for the ledger (tokens, cost, stored response); the client
 * already received the chunks themselves.
 */

import type { ChatCompletionChunk, OpenAIError, Usage } from '../shared/types.js';

/** The synthetic response stored for a streamed call. */
export interface SyntheticResponse {
  id: string | null;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: { role: 'assistant'; content: string };
    finish_reason: string | null;
  }>;
  usage: Usage | null;
  error?: OpenAIError;
}

export class StreamAccumulator {
  private id: string | null = null;
  private model: string;
  private created: number;
  private content = '';
  private finishReason: string | null = null;
  private usage: Usage | null = null;
  private error: OpenAIError | undefined;
  private chunkCount = 0;

  constructor(model: string, created: number = Math.floor(Date.now() / 1000)) {
    this.model = model;
    this.created = created;
  }

  get chunks(): number {
    return this.chunkCount;
  }

  add(chunk: ChatCompletionChunk): void {
    this.chunkCount++;

    if (chunk.id) {
      this.id = chunk.id;
    }
    if (chunk.model) {
      this.model = chunk.model;
    }
    if (typeof chunk.created === 'number') {
      this.created = chunk.created;
    }
    if (chunk.usage) {
      this.usage = chunk.usage;
    }

    // Usage-only trailing chunks carry an empty (or missing) choices array
    const choices = Array.isArray(chunk.choices) ? chunk.choices : [];
    for (const choice of choices) {
      if (choice.index !== 0 && choices.length > 1) continue;
      const text = choice.delta?.content;
      if (typeof text === 'string') {
        this.content += text;
      }
      if (choice.finish_reason) {
        this.finishReason = choice.finish_reason;
      }
    }
  }

  /** Put a classified error into the error slot. */
  fail(error: OpenAIError): void {
    this.error = error;
  }

  toResponse(): SyntheticResponse {
    return {
      id: this.id,
      object: 'chat.completion',
      created: this.created,
      model: this.model,
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content: this.content },
          finish_reason: this.finishReason,
        },
      ],
      usage: this.usage,
      ...(this.error ? { error: this.error } : {}),
    };
  }
}
