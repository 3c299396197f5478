import { Database } from 'better-sqlite3';
import type { Logger } from 'pino';
import { componentLogger } from '../utils/logger';
import * as migration001 from './migrations/001_state_snapshot';
import * as migration002 from './migrations/002_check_stats';

interface Migration {
  id: string;
  name: string;
  up: (db: Database) => void;
  down: (db: Database) => void;
}

const migrations: Migration[] = [
  {
    id: '001',
    name: 'state_snapshot',
    up: migration001.up,
    down: migration001.down,
  },
  {
    id: '002',
    name: 'check_stats',
    up: migration002.up,
    down: migration002.down,
  },
];

function ensureMigrationsTable(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

function getAppliedMigrations(db: Database): Set<string> {
  const rows = db.prepare<[], { id: string }>('SELECT id FROM _migrations').all();
  return new Set(rows.map(row => row.id));
}

export function runMigrations(db: Database, logger: Logger = componentLogger('migrate')): number {
  ensureMigrationsTable(db);
  const applied = getAppliedMigrations(db);
  let count = 0;

  for (const migration of migrations) {
    if (applied.has(migration.id)) continue;

    logger.info({ id: migration.id, name: migration.name }, 'running migration');
    db.transaction(() => {
      migration.up(db);
      db.prepare('INSERT INTO _migrations (id, name) VALUES (?, ?)').run(migration.id, migration.name);
    })();
    count++;
  }

  return count;
}

export function rollbackMigration(db: Database, targetId?: string, logger: Logger = componentLogger('migrate')): void {
  ensureMigrationsTable(db);
  const applied = getAppliedMigrations(db);

  const toRollback = [...migrations]
    .reverse()
    .filter(m => applied.has(m.id))
    .filter(m => !targetId || m.id >= targetId);

  for (const migration of toRollback) {
    logger.info({ id: migration.id, name: migration.name }, 'rolling back migration');

    db.transaction(() => {
      migration.down(db);
      db.prepare('DELETE FROM _migrations WHERE id = ?').run(migration.id);
    })();

    if (targetId && migration.id === targetId) {
      break;
    }
  }
}

export function getMigrationStatus(db: Database): { id: string; name: string; applied: boolean }[] {
  ensureMigrationsTable(db);
  const applied = getAppliedMigrations(db);

  return migrations.map(m => ({
    id: m.id,
    name: m.name,
    applied: applied.has(m.id),
  }));
}
