import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import pino from 'pino';
import { closeDatabase, getMigrationStatus, openDatabase, rollbackMigration, runMigrations } from './index';

const silent = pino({ level: 'silent' });

describe('Database', () => {
  it('should create the snapshot tables', () => {
    const db = openDatabase(':memory:', silent);

    const tables = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'")
      .all()
      .map(t => t.name)
      .sort();

    expect(tables).toEqual(['_migrations', 'service_states', 'state_transitions']);
    closeDatabase(db, silent);
    expect(db.open).toBe(false);
  });

  it('should apply each migration once', () => {
    const db = openDatabase(':memory:', silent);

    expect(runMigrations(db, silent)).toBe(0);
    expect(getMigrationStatus(db)).toEqual([
      { id: '001', name: 'state_snapshot', applied: true },
      { id: '002', name: 'check_stats', applied: true },
    ]);
    closeDatabase(db, silent);
  });

  it('should roll migrations back', () => {
    const db = openDatabase(':memory:', silent);

    rollbackMigration(db, undefined, silent);

    expect(getMigrationStatus(db)).toEqual([
      { id: '001', name: 'state_snapshot', applied: false },
      { id: '002', name: 'check_stats', applied: false },
    ]);
    const remaining = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name = 'service_states'")
      .all();
    expect(remaining).toEqual([]);
    closeDatabase(db, silent);
  });

  it('should create the parent directory of a file database', () => {
    const dir = mkdtempSync(join(tmpdir(), 'healthwatch-db-'));
    try {
      const db = openDatabase(join(dir, 'nested', 'state.db'), silent);
      expect(db.open).toBe(true);
      closeDatabase(db, silent);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
