import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { createApp } from '../app.js';
import { Executor } from '../../engine/executor.js';
import { initializeDatabase } from '../../persistence/db.js';
import { migrateSchema } from '../../persistence/schema.js';
import { RequestLogger } from '../../persistence/request-logger.js';
import { UsageAggregator } from '../../persistence/aggregator.js';
import { buildRouteTable, RouteTableStore } from '../../routing/route-table.js';
import { ConfigError } from '../../shared/errors.js';
import type { ModelConfig } from '../../config/types.js';
import type { ProviderClient } from '../../providers/types.js';
import type { DateRange, HourlyStats, RequestPage, UsageStats } from '../../persistence/aggregator.js';
import type { RouteListing, RouteTable } from '../../routing/types.js';
import type {
  ChatCompletionChunk,
  ChatCompletionResponse,
  ModelsResponse,
  OpenAIErrorResponse,
} from '../../shared/types.js';

const MODELS: ModelConfig[] = [
  { alias: 'gpt', model: 'openai/gpt-4.1-mini', apiKey: 'env:OPENAI_API_KEY', enabled: true, params: {} },
  { alias: 'off', model: 'openai/gpt-4.1', enabled: false, params: {} },
];

const MESSAGES = [{ role: 'user', content: 'Hi' }];

const RESPONSE: ChatCompletionResponse = {
  id: 'chatcmpl-1',
  object: 'chat.completion',
  created: 1740830000,
  model: 'gpt-4.1-mini',
  choices: [{ index: 0, message: { role: 'assistant', content: 'Hello' }, finish_reason: 'stop' }],
  usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
};

const CHUNKS: ChatCompletionChunk[] = [
  { id: 'c1', choices: [{ index: 0, delta: { role: 'assistant', content: 'Hel' } }] },
  { id: 'c1', choices: [{ index: 0, delta: { content: 'lo' }, finish_reason: 'stop' }] },
  { id: 'c1', choices: [], usage: { prompt_tokens: 4, completion_tokens: 2, total_tokens: 6 } },
];

async function* streamOf(chunks: ChatCompletionChunk[]): AsyncGenerator<ChatCompletionChunk> {
  for (const chunk of chunks) {
    yield chunk;
  }
}

function fakeClient(): ProviderClient {
  return {
    completion: vi.fn(async () => ({ response: RESPONSE, provider: 'openai' })),
    completionStream: vi.fn(async () => ({ provider: 'openai', chunks: streamOf(CHUNKS) })),
    completionCost: vi.fn(() => 0.0012),
    getModelPricing: vi.fn(() => ({ inputCostPerToken: 4e-7, outputCostPerToken: 1.6e-6 })),
  };
}

async function read<T>(res: Response | Promise<Response>): Promise<T> {
  return (await (await res).json()) as T;
}

function postChat(body: unknown) {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  };
}

describe('HTTP API', () => {
  let db: Database.Database;
  let loadTable: () => RouteTable;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    db = initializeDatabase(':memory:');
    migrateSchema(db);
    const requestLogger = new RequestLogger(db);
    const client = fakeClient();
    loadTable = () => buildRouteTable(MODELS);
    const routes = new RouteTableStore(buildRouteTable(MODELS), () => loadTable());

    const executor = new Executor({
      routes,
      client,
      ledger: requestLogger,
      options: {
        defaults: { timeout: 120, numRetries: 3 },
        drainOnDisconnect: true,
        env: { OPENAI_API_KEY: 'test-secret' },
        clock: () => new Date('2025-03-01T12:00:00Z'),
      },
    });

    app = createApp({
      executor,
      routes,
      client,
      aggregator: new UsageAggregator(db),
      requestLogger,
      stats: { now: () => new Date('2025-03-01T18:00:00Z') },
    });
  });

  afterEach(() => {
    db.close();
  });

  describe('POST /v1/chat/completions', () => {
    it('returns the provider response and records it', async () => {
      const res = await app.request('/v1/chat/completions', postChat({ model: 'gpt', messages: MESSAGES }));

      expect(res.status).toBe(200);
      expect(res.headers.get('X-Tally-Provider')).toBe('openai');
      expect(await res.json()).toEqual(RESPONSE);

      const page = await read<RequestPage>(app.request('/requests'));
      expect(page.total).toBe(1);
      expect(page.requests[0]).toMatchObject({ model: 'gpt', provider: 'openai', totalTokens: 15, cost: 0.0012 });
    });

    it('is also served without the /v1 prefix', async () => {
      const res = await app.request('/chat/completions', postChat({ model: 'gpt', messages: MESSAGES }));

      expect(res.status).toBe(200);
    });

    it('returns 404 with available aliases for an unknown model', async () => {
      const res = await app.request('/v1/chat/completions', postChat({ model: 'nope', messages: MESSAGES }));

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: {
          message: "Model 'nope' not found in configuration. Available models: gpt",
          type: 'invalid_request_error',
          code: 'model_not_found',
        },
      });

      const stats = await read<UsageStats>(app.request('/stats'));
      expect(stats.totals.requests).toBe(0);
      expect(stats.recentErrors).toHaveLength(1);
      expect(stats.recentErrors[0]?.model).toBe('nope');
    });

    it('rejects a body that is not JSON with 400 and records it', async () => {
      const res = await app.request('/v1/chat/completions', postChat('{not json'));

      expect(res.status).toBe(400);
      const body = await read<OpenAIErrorResponse>(res);
      expect(body.error.type).toBe('invalid_request_error');
      expect(body.error.code).toBe('invalid_request');

      const deleted = await read<{ deleted: number }>(app.request('/errors', { method: 'DELETE' }));
      expect(deleted).toEqual({ deleted: 1 });
    });

    it('streams chunks as SSE frames ending in [DONE]', async () => {
      const res = await app.request(
        '/v1/chat/completions',
        postChat({ model: 'gpt', messages: MESSAGES, stream: true }),
      );

      expect(res.status).toBe(200);
      expect(res.headers.get('Content-Type')).toContain('text/event-stream');

      const expected = [...CHUNKS.map((chunk) => JSON.stringify(chunk)), '[DONE]']
        .map((data) => `data: ${data}\n\n`)
        .join('');
      expect(await res.text()).toBe(expected);

      const page = await read<RequestPage>(app.request('/requests'));
      expect(page.total).toBe(1);
      expect(page.requests[0]).toMatchObject({ model: 'gpt', totalTokens: 6 });
      const stored: unknown = JSON.parse(page.requests[0]?.responseData ?? 'null');
      expect(stored).toMatchObject({ choices: [{ message: { role: 'assistant', content: 'Hello' } }] });
    });
  });

  describe('model listings', () => {
    it('lists enabled aliases in OpenAI format', async () => {
      const body = await read<ModelsResponse>(app.request('/v1/models'));

      expect(body.object).toBe('list');
      expect(body.data).toHaveLength(1);
      expect(body.data[0]).toMatchObject({ id: 'gpt', object: 'model', owned_by: 'openai' });
    });

    it('lists every alias with per-million pricing', async () => {
      const body = await read<{ models: RouteListing[] }>(app.request('/models'));

      expect(body.models).toHaveLength(2);
      expect(body.models[0]).toEqual({
        name: 'gpt',
        model: 'openai/gpt-4.1-mini',
        provider: 'openai',
        enabled: true,
        input_cost_per_million: 0.4,
        output_cost_per_million: 1.6,
      });
    });
  });

  describe('stats', () => {
    beforeEach(async () => {
      await app.request('/v1/chat/completions', postChat({ model: 'gpt', messages: MESSAGES }));
    });

    it('reports the date range of recorded data', async () => {
      const body = await read<DateRange>(app.request('/stats/date-range'));

      expect(body).toEqual({ startDate: '2025-03-01', endDate: '2025-03-01' });
    });

    it('returns a dense hourly series', async () => {
      const body = await read<HourlyStats>(app.request('/stats/hourly?date=2025-03-01'));

      expect(body.hourly).toHaveLength(24);
      expect(body.hourly[12]?.requests).toBe(1);
      expect(body.totalRequests).toBe(1);
    });

    it('filters requests by a relative hour window', async () => {
      const recent = await read<RequestPage>(app.request('/requests?hours=12'));
      const older = await read<RequestPage>(app.request('/requests?hours=1'));

      expect(recent.total).toBe(1);
      expect(older.total).toBe(0);
    });

    it('treats empty query values as absent', async () => {
      const body = await read<RequestPage>(app.request('/requests?provider=&limit='));

      expect(body.total).toBe(1);
      expect(body.limit).toBe(50);
    });

    it('clamps a negative offset to the first page', async () => {
      const body = await read<RequestPage>(app.request('/requests?offset=-5'));

      expect(body.offset).toBe(0);
      expect(body.requests).toHaveLength(1);
    });

    it('rejects a malformed date with 400', async () => {
      const res = await app.request('/stats/daily?start_date=bad');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          message: "Invalid date 'bad': expected YYYY-MM-DD",
          type: 'invalid_request_error',
          code: 'invalid_request',
        },
      });
    });

    it('rejects a non-numeric limit with 400', async () => {
      const res = await app.request('/requests?limit=abc');

      expect(res.status).toBe(400);
      const body = await read<OpenAIErrorResponse>(res);
      expect(body.error.message).toMatch(/^Invalid query:/);
    });

    it('requires a date for the hourly rollup', async () => {
      const res = await app.request('/stats/hourly');

      expect(res.status).toBe(400);
    });

    it('rejects an out-of-range timezone offset', async () => {
      const res = await app.request('/stats/daily?timezone_offset=900');

      expect(res.status).toBe(400);
    });
  });

  describe('CORS', () => {
    it('allows any origin on ledger endpoints', async () => {
      const res = await app.request('/stats', { headers: { Origin: 'http://dashboard.test' } });

      expect(res.status).toBe(200);
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    });

    it('answers a preflight for the chat endpoint', async () => {
      const res = await app.request('/v1/chat/completions', {
        method: 'OPTIONS',
        headers: {
          Origin: 'http://dashboard.test',
          'Access-Control-Request-Method': 'POST',
          'Access-Control-Request-Headers': 'content-type',
        },
      });

      expect(res.status).toBe(204);
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
      expect(res.headers.get('Access-Control-Allow-Methods')).toContain('POST');
      expect(res.headers.get('Access-Control-Allow-Headers')).toBe('content-type');
    });
  });

  describe('POST /admin/reload', () => {
    it('swaps in the reloaded table', async () => {
      loadTable = () =>
        buildRouteTable([...MODELS, { alias: 'mini', model: 'openai/gpt-4.1-nano', enabled: true, params: {} }]);

      const res = await app.request('/admin/reload', { method: 'POST' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ reloaded: true, models: 3, enabled: ['gpt', 'mini'] });

      const models = await read<ModelsResponse>(app.request('/v1/models'));
      expect(models.data.map((entry) => entry.id)).toEqual(['gpt', 'mini']);
    });

    it('keeps the previous table when the config is invalid', async () => {
      loadTable = () => {
        throw new ConfigError('Config validation failed: duplicate alias');
      };

      const res = await app.request('/admin/reload', { method: 'POST' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          message: 'Config validation failed: duplicate alias',
          type: 'invalid_request_error',
          code: 'config_invalid',
        },
      });

      const health = await read<Record<string, unknown>>(app.request('/health'));
      expect(health).toMatchObject({ status: 'ok', models: 2, enabled: 1 });
    });
  });
});
