import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Executor } from '../executor.js';
import { buildRouteTable, RouteTableStore } from '../../routing/route-table.js';
import { LlmClient } from '../../providers/client.js';
import { APIConnectionError, AuthenticationError, RateLimitError } from '../../providers/errors.js';
import { parseCatalog } from '../../providers/pricing.js';
import type { ModelConfig } from '../../config/types.js';
import type { LedgerRecord } from '../../persistence/request-logger.js';
import type { CompletionStream, CostableResponse, ProviderClient } from '../../providers/types.js';
import type { ChatCompletionChunk, ChatCompletionResponse } from '../../shared/types.js';
import type { EngineOptions, StreamSink } from '../types.js';

const MODELS: ModelConfig[] = [
  {
    alias: 'gpt',
    model: 'openai/gpt-4.1-mini',
    apiKey: 'env:OPENAI_API_KEY',
    enabled: true,
    temperature: 0.7,
    timeout: 30,
    params: {},
  },
  { alias: 'off', model: 'openai/gpt-4.1', enabled: false, params: {} },
];

const MESSAGES = [{ role: 'user', content: 'Hi' }];

const RESPONSE: ChatCompletionResponse = {
  id: 'chatcmpl-1',
  object: 'chat.completion',
  created: 1740830000,
  model: 'gpt-4.1-mini-2025-04-14',
  choices: [{ index: 0, message: { role: 'assistant', content: 'Hello' }, finish_reason: 'stop' }],
  usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
};

const CHUNKS: ChatCompletionChunk[] = [
  { id: 'c1', model: 'gpt-4.1-mini', choices: [{ index: 0, delta: { role: 'assistant', content: 'Hel' } }] },
  { id: 'c1', choices: [{ index: 0, delta: { content: 'lo' }, finish_reason: 'stop' }] },
  { id: 'c1', choices: [], usage: { prompt_tokens: 4, completion_tokens: 2, total_tokens: 6 } },
];

// 2025-03-01T12:00:00Z
const CREATED = 1740830400;

function upstream(chunks: ChatCompletionChunk[], failWith?: Error) {
  const state = { yielded: 0, closed: false };
  async function* generate(): AsyncGenerator<ChatCompletionChunk> {
    try {
      for (const chunk of chunks) {
        state.yielded++;
        yield chunk;
      }
      if (failWith) {
        throw failWith;
      }
    } finally {
      state.closed = true;
    }
  }
  const stream: CompletionStream = { provider: 'openai', chunks: generate() };
  return { stream, state };
}

function fakeClient(overrides: Partial<ProviderClient> = {}): ProviderClient {
  return {
    completion: vi.fn(async () => ({ response: RESPONSE, provider: 'openai' })),
    completionStream: vi.fn(async () => upstream(CHUNKS).stream),
    completionCost: vi.fn((response: CostableResponse) => (response.usage ? 0.0012 : 0)),
    getModelPricing: vi.fn(() => null),
    ...overrides,
  };
}

/** A sink that reports itself closed once `closeAfter` frames were written. */
function recordingSink(closeAfter = Number.POSITIVE_INFINITY) {
  const frames: string[] = [];
  const sink: StreamSink = {
    get isOpen() {
      return frames.length < closeAfter;
    },
    async send(data: string) {
      if (frames.length >= closeAfter) {
        return false;
      }
      frames.push(data);
      return true;
    },
  };
  return { frames, sink };
}

function setup(client: ProviderClient, options: Partial<EngineOptions> = {}) {
  const records: LedgerRecord[] = [];
  let tick = 0;
  const executor = new Executor({
    routes: new RouteTableStore(buildRouteTable(MODELS)),
    client,
    ledger: {
      logRequest: (entry) => {
        records.push(entry);
      },
    },
    options: {
      defaults: { timeout: 120, numRetries: 3 },
      drainOnDisconnect: true,
      env: { OPENAI_API_KEY: 'test-secret' },
      now: () => (tick += 100),
      clock: () => new Date('2025-03-01T12:00:00Z'),
      ...options,
    },
  });
  return { executor, records };
}

describe('Executor non-streaming', () => {
  it('returns the response and records one success row', async () => {
    const client = fakeClient();
    const { executor, records } = setup(client);

    const result = await executor.execute({ model: 'gpt', messages: MESSAGES });

    expect(result).toEqual({ kind: 'completed', provider: 'openai', response: RESPONSE });
    expect(client.completion).toHaveBeenCalledWith({
      model: 'openai/gpt-4.1-mini',
      apiKey: 'test-secret',
      timeout: 30,
      numRetries: 3,
      body: { messages: MESSAGES, temperature: 0.7 },
    });
    expect(records).toHaveLength(1);
    expect(records[0]).toEqual({
      timestamp: new Date('2025-03-01T12:00:00Z'),
      model: 'gpt',
      provider: 'openai',
      promptTokens: 10,
      completionTokens: 5,
      totalTokens: 15,
      cost: 0.0012,
      durationMs: 100,
      requestData: {
        model: 'openai/gpt-4.1-mini',
        provider: 'openai',
        stream: false,
        timeout: 30,
        num_retries: 3,
        messages: MESSAGES,
        temperature: 0.7,
      },
      responseData: RESPONSE,
      error: null,
    });
  });

  it('prices the configured model, not the dated upstream name', async () => {
    const client = fakeClient();
    const { executor } = setup(client);

    await executor.execute({ model: 'gpt', messages: MESSAGES });

    expect(client.completionCost).toHaveBeenCalledWith(
      { model: 'openai/gpt-4.1-mini', usage: RESPONSE.usage },
      undefined,
    );
  });

  it('records cost 0 when pricing is unknown', async () => {
    const client = fakeClient({
      completionCost: vi.fn(() => {
        throw new Error("This model isn't mapped yet. model=openai/gpt-4.1-mini");
      }),
    });
    const { executor, records } = setup(client);

    const result = await executor.execute({ model: 'gpt', messages: MESSAGES });

    expect(result.kind).toBe('completed');
    expect(records[0]?.cost).toBe(0);
    expect(records[0]?.error).toBeNull();
  });

  it('maps a provider error and records it', async () => {
    const client = fakeClient({
      completion: vi.fn(async () => {
        throw new RateLimitError('openai', 'openai/gpt-4.1-mini', '{"error":{"message":"Slow down"}}');
      }),
    });
    const { executor, records } = setup(client);

    const result = await executor.execute({ model: 'gpt', messages: MESSAGES });

    expect(result).toEqual({
      kind: 'failed',
      status: 429,
      body: { error: { message: 'Slow down', type: 'rate_limit_error', code: 'rate_limit_exceeded' } },
    });
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      model: 'gpt',
      provider: 'openai',
      promptTokens: 0,
      cost: 0,
      responseData: null,
      error: 'RateLimitError: Slow down',
    });
  });

  it('records a failure when the client hands back a non-object response', async () => {
    const client = fakeClient({
      completion: vi.fn(async () => ({ response: JSON.parse('null'), provider: 'openai' })),
    });
    const { executor, records } = setup(client);

    const result = await executor.execute({ model: 'gpt', messages: MESSAGES });

    expect(result).toEqual({
      kind: 'failed',
      status: 503,
      body: {
        error: {
          message: 'Malformed response: expected a JSON object',
          type: 'service_unavailable',
          code: 'service_unavailable',
        },
      },
    });
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      totalTokens: 0,
      cost: 0,
      responseData: null,
      error: 'ProviderError: Malformed response: expected a JSON object',
    });
  });

  it('still completes when the ledger write fails', async () => {
    const client = fakeClient();
    const executor = new Executor({
      routes: new RouteTableStore(buildRouteTable(MODELS)),
      client,
      ledger: {
        logRequest: () => {
          throw new Error('database is locked');
        },
      },
      options: { defaults: { timeout: 120, numRetries: 3 }, drainOnDisconnect: false, env: {} },
    });

    const result = await executor.execute({ model: 'gpt', messages: MESSAGES });

    expect(result.kind).toBe('completed');
  });
});

describe('Executor over the provider client', () => {
  let fetchMock: ReturnType<typeof vi.fn>;
  let client: LlmClient;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    client = new LlmClient({ catalog: parseCatalog({}), sleep: vi.fn().mockResolvedValue(undefined) });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('records a failure when the provider answers 200 with null', async () => {
    fetchMock.mockImplementation(() => Promise.resolve(new Response('null', { status: 200 })));
    const { executor, records } = setup(client);

    const result = await executor.execute({ model: 'gpt', messages: MESSAGES });

    expect(result).toMatchObject({
      kind: 'failed',
      status: 503,
      body: { error: { type: 'service_unavailable', code: 'service_unavailable' } },
    });
    if (result.kind === 'failed') {
      expect(result.body.error.message).toMatch(/^Malformed response:/);
    }
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ model: 'gpt', provider: 'openai', totalTokens: 0, cost: 0, responseData: null });
    expect(records[0]?.error).toMatch(/^ProviderError: Malformed response:/);
  });

  it('records an error payload sent with a 200 status as a failure', async () => {
    fetchMock.mockImplementation(() =>
      Promise.resolve(new Response('{"error":{"message":"upstream overloaded","code":502}}', { status: 200 })),
    );
    const { executor, records } = setup(client);

    const result = await executor.execute({ model: 'gpt', messages: MESSAGES });

    expect(result).toEqual({
      kind: 'failed',
      status: 503,
      body: { error: { message: 'upstream overloaded', type: 'service_unavailable', code: 'service_unavailable' } },
    });
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ totalTokens: 0, cost: 0, error: 'ProviderError: upstream overloaded' });
  });
});

describe('Executor resolution failures', () => {
  it('rejects an unknown alias with a hint and logs provider unknown', async () => {
    const client = fakeClient();
    const { executor, records } = setup(client);

    const result = await executor.execute({ model: 'nope', messages: MESSAGES, api_key: 'test-secret' });

    expect(result).toEqual({
      kind: 'failed',
      status: 404,
      body: {
        error: {
          message: "Model 'nope' not found in configuration. Available models: gpt",
          type: 'invalid_request_error',
          code: 'model_not_found',
        },
      },
    });
    expect(client.completion).not.toHaveBeenCalled();
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      model: 'nope',
      provider: 'unknown',
      requestData: { model: 'nope', messages: MESSAGES },
      error: "ModelNotFoundError: Model 'nope' not found in configuration. Available models: gpt",
    });
    expect(records[0]?.requestData).not.toHaveProperty('api_key');
  });

  it('rejects a disabled alias with 403', async () => {
    const { executor, records } = setup(fakeClient());

    const result = await executor.execute({ model: 'off', messages: MESSAGES });

    expect(result).toMatchObject({ kind: 'failed', status: 403 });
    expect(records[0]?.error).toBe("ModelDisabledError: Model 'off' is disabled. Available models: gpt");
  });

  it('rejects an invalid body with 400 before resolution', async () => {
    const { executor, records } = setup(fakeClient());

    const result = await executor.execute({ model: 'gpt', messages: [] });

    expect(result.kind).toBe('failed');
    if (result.kind === 'failed') {
      expect(result.status).toBe(400);
      expect(result.body.error.type).toBe('invalid_request_error');
      expect(result.body.error.code).toBe('invalid_request');
    }
    expect(records).toHaveLength(1);
    expect(records[0]?.model).toBe('gpt');
    expect(records[0]?.error).toMatch(/^RequestValidationError: Invalid request:/);
  });

  it('records a non-object body under the unknown alias', async () => {
    const { executor, records } = setup(fakeClient());

    await executor.execute(null);

    expect(records[0]).toMatchObject({ model: 'unknown', provider: 'unknown', requestData: { body: null } });
  });
});

describe('Executor streaming', () => {
  async function runStream(
    client: ProviderClient,
    sinkOptions: { closeAfter?: number } = {},
    options: Partial<EngineOptions> = {},
  ) {
    const { executor, records } = setup(client, options);
    const result = await executor.execute({ model: 'gpt', messages: MESSAGES, stream: true });
    const { frames, sink } = recordingSink(sinkOptions.closeAfter);
    if (result.kind === 'streaming') {
      await result.pipe(sink);
    }
    return { result, frames, records };
  }

  it('forwards every chunk, ends with [DONE] and records the accumulated response', async () => {
    const client = fakeClient();
    const { result, frames, records } = await runStream(client);

    expect(result.kind).toBe('streaming');
    expect(frames).toEqual([...CHUNKS.map((chunk) => JSON.stringify(chunk)), '[DONE]']);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      model: 'gpt',
      provider: 'openai',
      promptTokens: 4,
      completionTokens: 2,
      totalTokens: 6,
      cost: 0.0012,
      error: null,
      requestData: { stream: true },
    });
    expect(records[0]?.responseData).toEqual({
      id: 'c1',
      object: 'chat.completion',
      created: CREATED,
      model: 'gpt-4.1-mini',
      choices: [{ index: 0, message: { role: 'assistant', content: 'Hello' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 4, completion_tokens: 2, total_tokens: 6 },
    });
  });

  it('stops consuming upstream on disconnect when draining is switched off', async () => {
    const { stream, state } = upstream(CHUNKS);
    const client = fakeClient({ completionStream: vi.fn(async () => stream) });

    const { frames, records } = await runStream(client, { closeAfter: 1 }, { drainOnDisconnect: false });

    expect(frames).toEqual([JSON.stringify(CHUNKS[0])]);
    expect(state.yielded).toBe(2);
    expect(state.closed).toBe(true);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ totalTokens: 0, cost: 0, error: null });
    expect(records[0]?.responseData).toMatchObject({
      choices: [{ index: 0, message: { role: 'assistant', content: 'Hel' }, finish_reason: null }],
      usage: null,
    });
  });

  it('keeps reading upstream after a disconnect so the record carries final usage', async () => {
    const { stream, state } = upstream(CHUNKS);
    const client = fakeClient({ completionStream: vi.fn(async () => stream) });

    const { frames, records } = await runStream(client, { closeAfter: 1 });

    expect(frames).toEqual([JSON.stringify(CHUNKS[0])]);
    expect(state.yielded).toBe(3);
    expect(state.closed).toBe(true);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ totalTokens: 6, cost: 0.0012, error: null });
  });

  it('sends an error frame and [DONE] on a mid-stream failure', async () => {
    const failure = new APIConnectionError('openai', 'openai/gpt-4.1-mini', 'Stream interrupted: terminated');
    const client = fakeClient({ completionStream: vi.fn(async () => upstream([CHUNKS[0]], failure).stream) });

    const { frames, records } = await runStream(client);

    const errorBody = {
      error: { message: 'Stream interrupted: terminated', type: 'connection_error', code: 'connection_error' },
    };
    expect(frames).toEqual([JSON.stringify(CHUNKS[0]), JSON.stringify(errorBody), '[DONE]']);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      cost: 0,
      error: 'APIConnectionError: Stream interrupted: terminated',
    });
    expect(records[0]?.responseData).toMatchObject({
      choices: [{ message: { content: 'Hel' } }],
      error: errorBody.error,
    });
  });

  it('returns a JSON failure when the stream cannot be opened', async () => {
    const client = fakeClient({
      completionStream: vi.fn(async () => {
        throw new AuthenticationError('openai', 'openai/gpt-4.1-mini', '{"error":{"message":"Invalid key"}}');
      }),
    });
    const { executor, records } = setup(client);

    const result = await executor.execute({ model: 'gpt', messages: MESSAGES, stream: true });

    expect(result).toEqual({
      kind: 'failed',
      status: 401,
      body: { error: { message: 'Invalid key', type: 'authentication_error', code: 'invalid_api_key' } },
    });
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ provider: 'openai', error: 'AuthenticationError: Invalid key' });
  });
});
