/**
 * POST /chat/completions handler.
 * Hands the decoded body to the execution engine and turns its result into
 * a JSON response or an SSE stream.
 */

import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { logger } from '../../shared/logger.js';
import { RequestValidationError } from '../../shared/errors.js';
import { createSSESink } from '../../streaming/sse-sink.js';
import type { Executor } from '../../engine/executor.js';
import type { ExecutionResult } from '../../engine/types.js';

/** Response header naming the provider that served the call. */
export const PROVIDER_HEADER = 'X-Tally-Provider';

/**
 * Create chat completion routes.
 * Mounted under both `/v1` and `/` so either base URL works for clients.
 */
export function createChatRoutes(executor: Executor) {
  const app = new Hono();

  app.post('/chat/completions', async (c) => {
    let result: ExecutionResult;
    try {
      const body: unknown = await c.req.json();
      result = await executor.execute(body);
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw error;
      }
      result = executor.reject(new RequestValidationError(`Invalid request: body is not valid JSON (${error.message})`));
    }

    if (result.kind === 'failed') {
      return c.json(result.body, result.status);
    }

    c.header(PROVIDER_HEADER, result.provider);

    if (result.kind === 'completed') {
      return c.json(result.response);
    }

    const { pipe, provider } = result;
    return streamSSE(c, async (stream) => {
      stream.onAbort(() => {
        logger.debug({ provider }, 'Client disconnected from stream');
      });
      await pipe(createSSESink(stream));
    });
  });

  return app;
}
