/**
 * SSE stream parser for OpenAI-compatible streaming responses.
 * Handles buffering of partial chunks across TCP reads.
 */

/** Result of parsing an SSE chunk. */
export interface SSEParseResult {
  /** Complete SSE data payloads (JSON strings, NOT including [DONE]). */
  events: string[];
  /** True if [DONE] marker was encountered. */
  done: boolean;
}

export interface SSEParser {
  parse(chunk: string): SSEParseResult;
  /** Parse whatever is left in the buffer once the body has ended. */
  flush(): SSEParseResult;
}

/**
 * Create a stateful SSE parser that handles partial chunks.
 * Call parse() for each decoded chunk read from the body, then flush() once.
 */
export function createSSEParser(): SSEParser {
  let buffer = '';

  function parseEvents(parts: string[]): SSEParseResult {
    const events: string[] = [];
    let done = false;

    for (const part of parts) {
      const trimmed = part.trim();
      if (!trimmed) continue;
      if (trimmed.startsWith(':')) continue; // keepalive

      // Multi-line data fields join with '\n'; event:, id: and retry: are unused
      const dataLines: string[] = [];
      for (const line of trimmed.split('\n')) {
        if (line.startsWith('data:')) {
          dataLines.push(line.slice(5).replace(/^ /, ''));
        }
      }
      if (dataLines.length === 0) continue;

      const data = dataLines.join('\n');
      if (data === '[DONE]') {
        done = true;
        break;
      }
      events.push(data);
    }

    return { events, done };
  }

  return {
    parse(chunk: string): SSEParseResult {
      buffer += chunk.replace(/\r\n?/g, '\n');
      const parts = buffer.split('\n\n');
      buffer = parts.pop() ?? '';
      return parseEvents(parts);
    },

    flush(): SSEParseResult {
      const rest = buffer;
      buffer = '';
      return parseEvents([rest]);
    },
  };
}

/**
 * Iterate the data payloads of an SSE response body.
 * Stops at [DONE] or end of body; returning early cancels the reader.
 */
export async function* readSSEData(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const parser = createSSEParser();
  let finished = false;

  try {
    while (!finished) {
      const { done, value } = await reader.read();
      const result = done ? parser.flush() : parser.parse(decoder.decode(value, { stream: true }));

      for (const event of result.events) {
        yield event;
      }
      finished = done || result.done;
    }
  } finally {
    if (finished) {
      reader.releaseLock();
    } else {
      await reader.cancel();
    }
  }
}
