/**
 * StreamSink over a Hono SSE stream.
 */

import type { SSEStreamingApi } from 'hono/streaming';
import type { StreamSink } from '../engine/types.js';
import { logger } from '../shared/logger.js';

export function createSSESink(stream: SSEStreamingApi): StreamSink {
  return {
    get isOpen() {
      return !stream.aborted && !stream.closed;
    },

    async send(data: string): Promise<boolean> {
      if (stream.aborted || stream.closed) {
        return false;
      }
      try {
        await stream.writeSSE({ data });
        return true;
      } catch (error) {
        logger.debug({ error: error instanceof Error ? error.message : String(error) }, 'SSE write failed');
        return false;
      }
    },
  };
}
