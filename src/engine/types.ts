/**
 * Execution engine types.
 */

import type { ErrorStatus } from '../classification/classifier.js';
import type { LedgerRecord } from '../persistence/request-logger.js';
import type { RouteDefaults } from '../routing/types.js';
import type { ChatCompletionResponse, OpenAIErrorResponse } from '../shared/types.js';

/**
 * Where streamed frames go. `send` never throws: it resolves false when the
 * frame could not be delivered.
 */
export interface StreamSink {
  readonly isOpen: boolean;
  send(data: string): Promise<boolean>;
}

/** Outcome of `execute`, decided before any byte reaches the client. */
export type ExecutionResult =
  | { kind: 'completed'; provider: string; response: ChatCompletionResponse }
  | { kind: 'streaming'; provider: string; pipe(sink: StreamSink): Promise<void> }
  | { kind: 'failed'; status: ErrorStatus; body: OpenAIErrorResponse };

/** The part of the request logger the engine writes through. */
export interface LedgerWriter {
  logRequest(entry: LedgerRecord): void;
}

export interface EngineOptions {
  defaults: RouteDefaults;
  /** Keep consuming a stream after the client leaves so the record gets final usage. */
  drainOnDisconnect: boolean;
  /** Environment for `env:` key references; read on every request. */
  env?: Readonly<Record<string, string | undefined>>;
  /** Monotonic milliseconds, for durations. */
  now?: () => number;
  /** Wall clock, for ledger timestamps. */
  clock?: () => Date;
}
