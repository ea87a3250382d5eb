/**
 * Database schema migration system using PRAGMA user_version.
 * Manages schema evolution with idempotent migrations.
 */

import type Database from 'better-sqlite3';
import { logger } from '../shared/logger.js';

/**
 * Run schema migrations to bring database to current version.
 * @param db - Database instance to migrate
 */
export function migrateSchema(db: Database.Database): void {
  const currentVersion = db.pragma('user_version', { simple: true }) as number;
  logger.debug({ currentVersion }, 'Database schema version check');

  const migrations = [
    // 1: the append-only requests ledger
    () => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS requests (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          timestamp TEXT NOT NULL,
          model TEXT NOT NULL,
          provider TEXT,
          prompt_tokens INTEGER NOT NULL DEFAULT 0,
          completion_tokens INTEGER NOT NULL DEFAULT 0,
          total_tokens INTEGER NOT NULL DEFAULT 0,
          cost REAL NOT NULL DEFAULT 0,
          duration_ms INTEGER NOT NULL DEFAULT 0,
          request_data TEXT,
          response_data TEXT,
          error TEXT
        );

        CREATE INDEX IF NOT EXISTS idx_requests_timestamp ON requests(timestamp);
      `);
    },
    // 2: partial indexes for the dashboard's success-only reads
    () => {
      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_requests_date_provider
          ON requests(DATE(timestamp), provider)
          WHERE error IS NULL;

        CREATE INDEX IF NOT EXISTS idx_requests_cost
          ON requests(cost)
          WHERE error IS NULL;

        CREATE INDEX IF NOT EXISTS idx_requests_errors
          ON requests(timestamp)
          WHERE error IS NOT NULL;
      `);
    },
  ];

  for (let i = currentVersion; i < migrations.length; i++) {
    const targetVersion = i + 1;
    logger.info({ from: currentVersion, to: targetVersion }, 'Running database migration');
    db.transaction(() => {
      migrations[i]();
      db.pragma(`user_version = ${targetVersion}`);
    })();
  }

  if (currentVersion < migrations.length) {
    logger.info({ version: migrations.length }, 'Database migrations complete');
  }
}

/** Schema version this build migrates to. */
export const SCHEMA_VERSION = 2;
