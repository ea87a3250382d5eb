/**
 * Write side of the usage ledger.
 * One row per client-visible request attempt; rows are never updated.
 */

import type Database from 'better-sqlite3';
import { formatUtcTimestamp } from './time-window.js';

/**
 * A ledger entry as the engine hands it over.
 * On error rows tokens and cost are zero and `responseData` is usually null.
 */
export interface LedgerRecord {
  timestamp: Date;
  /** Client-visible alias. */
  model: string;
  provider: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  cost: number;
  durationMs: number;
  requestData: unknown;
  responseData: unknown;
  error: string | null;
}

/**
 * RequestLogger handles insertion of ledger rows into SQLite.
 * Uses prepared statements for efficient writes.
 */
export class RequestLogger {
  private insertStmt: Database.Statement;
  private clearErrorsStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare(`
      INSERT INTO requests (
        timestamp,
        model,
        provider,
        prompt_tokens,
        completion_tokens,
        total_tokens,
        cost,
        duration_ms,
        request_data,
        response_data,
        error
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.clearErrorsStmt = db.prepare('DELETE FROM requests WHERE error IS NOT NULL');
  }

  /** Append one record. */
  logRequest(entry: LedgerRecord): void {
    const failed = entry.error !== null;
    this.insertStmt.run(
      formatUtcTimestamp(entry.timestamp),
      entry.model,
      entry.provider,
      failed ? 0 : entry.promptTokens,
      failed ? 0 : entry.completionTokens,
      failed ? 0 : entry.totalTokens,
      failed ? 0 : entry.cost,
      Math.round(entry.durationMs),
      JSON.stringify(entry.requestData),
      entry.responseData === null || entry.responseData === undefined ? null : JSON.stringify(entry.responseData),
      entry.error,
    );
  }

  /** Delete every errored row. */
  clearErrors(): number {
    return this.clearErrorsStmt.run().changes;
  }
}
