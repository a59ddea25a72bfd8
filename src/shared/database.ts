/**
 * SQLite connection setup shared by the audit store.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import pino from 'pino';

const logger = pino({ name: 'leakguard:database', level: process.env['LOG_LEVEL'] ?? 'info' });

export const IN_MEMORY = ':memory:';

export interface DatabaseConfig {
  dbPath: string;
}

/**
 * Opens (creating if needed) a database with the pragmas the store
 * expects. `:memory:` skips directory creation and WAL.
 */
export function openDatabase(config: DatabaseConfig): Database.Database {
  const inMemory = config.dbPath === IN_MEMORY;

  if (!inMemory) {
    const dir = dirname(config.dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(config.dbPath);

  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');
  db.pragma('synchronous = NORMAL');
  db.pragma('temp_store = MEMORY');

  logger.debug({ dbPath: config.dbPath }, 'Database opened');
  return db;
}
