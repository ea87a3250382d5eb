/**
 * OpenAI-compatible request/response type definitions.
 * These types define the wire contract between the proxy and its clients.
 */

/** A single message in a chat conversation. */
export interface ChatMessage {
  role: string;
  content?: unknown;
  [key: string]: unknown;
}

/** A tool call within an assistant message. */
export interface ToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

/**
 * Chat completion request body as accepted from clients.
 * Known fields are typed; anything else is passed through to the provider untouched.
 */
export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  stream?: boolean | null;
  temperature?: number | null;
  max_tokens?: number | null;
  timeout?: number | null;
  num_retries?: number | null;
  [key: string]: unknown;
}

/** Token usage statistics. */
export interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  [key: string]: unknown;
}

/** A single choice in a chat completion response. */
export interface ChatCompletionChoice {
  index: number;
  message: {
    role: string;
    content: string | null;
    tool_calls?: ToolCall[];
    [key: string]: unknown;
  };
  finish_reason: string | null;
  [key: string]: unknown;
}

/** OpenAI-compatible chat completion response. */
export interface ChatCompletionResponse {
  id: string | null;
  object: string;
  created: number;
  model: string;
  choices: ChatCompletionChoice[];
  usage?: Usage | null;
  system_fingerprint?: string | null;
  [key: string]: unknown;
}

/** A single choice in a streaming chunk. */
export interface ChatCompletionChunkChoice {
  index: number;
  delta: {
    role?: string;
    content?: string | null;
    tool_calls?: unknown[];
    [key: string]: unknown;
  };
  finish_reason?: string | null;
  [key: string]: unknown;
}

/** OpenAI-compatible streaming chunk (one SSE data payload). */
export interface ChatCompletionChunk {
  id?: string | null;
  object?: string;
  created?: number;
  model?: string;
  choices: ChatCompletionChunkChoice[];
  usage?: Usage | null;
  [key: string]: unknown;
}

/** Body of an OpenAI-compatible error. `code` is omitted when there is none. */
export interface OpenAIError {
  message: string;
  type: string;
  code?: string;
}

/** OpenAI-compatible error response. */
export interface OpenAIErrorResponse {
  error: OpenAIError;
}

/** OpenAI-compatible models list response. */
export interface ModelsResponse {
  object: 'list';
  data: ModelInfo[];
}

/** A single model entry in the models list. */
export interface ModelInfo {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
}
