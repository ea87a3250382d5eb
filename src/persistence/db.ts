/**
 * Database initialization for the SQLite usage ledger.
 * Sets up connection with WAL mode and performance pragmas.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../shared/logger.js';

/**
 * Initialize SQLite database with WAL mode and performance pragmas.
 * `:memory:` skips directory creation and stays in its default journal mode.
 *
 * @param dbPath - Path to SQLite database file
 * @returns Database instance ready for use
 */
export function initializeDatabase(dbPath: string): Database.Database {
  const inMemory = dbPath === ':memory:';
  if (!inMemory) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('synchronous = NORMAL');
  db.pragma('cache_size = -64000');
  db.pragma('temp_store = MEMORY');
  // Readers wait for a checkpoint instead of failing immediately
  db.pragma('busy_timeout = 5000');

  logger.info({ dbPath, journalMode: inMemory ? 'memory' : 'WAL' }, 'SQLite database initialized');

  return db;
}
