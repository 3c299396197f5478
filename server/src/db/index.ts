import Database, { Database as DatabaseType } from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import { componentLogger } from '../utils/logger';
import { runMigrations } from './migrate';

/**
 * Open the snapshot database and bring its schema up to date.
 * `:memory:` opens a private in-memory database.
 */
export function openDatabase(dbPath: string, logger: Logger = componentLogger('db')): DatabaseType {
  if (dbPath !== ':memory:') {
    mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath);

  // Enable WAL mode for concurrent reads while the tracker writes
  db.pragma('journal_mode = WAL');

  const applied = runMigrations(db, logger);
  logger.info({ path: dbPath, migrationsApplied: applied }, 'database initialized');
  return db;
}

export function closeDatabase(db: DatabaseType, logger: Logger = componentLogger('db')): void {
  if (db.open) {
    db.close();
    logger.info('database connection closed');
  }
}

export { runMigrations, getMigrationStatus, rollbackMigration } from './migrate';
export type { ServiceStateRow, StateTransitionRow } from './types';
