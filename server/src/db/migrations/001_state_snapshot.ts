import { Database } from 'better-sqlite3';

export function up(db: Database): void {
  db.exec(`
    CREATE TABLE service_states (
      service TEXT PRIMARY KEY,
      kind TEXT NOT NULL,
      status TEXT,
      last_transition_at TEXT,
      last_outcome TEXT,
      consecutive_failures INTEGER NOT NULL DEFAULT 0,
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE state_transitions (
      id TEXT PRIMARY KEY,
      service TEXT NOT NULL,
      kind TEXT NOT NULL,
      old_state TEXT,
      new_state TEXT NOT NULL,
      timestamp TEXT NOT NULL,
      latency_ms REAL NOT NULL,
      error TEXT,
      metadata TEXT NOT NULL DEFAULT '{}'
    );
    CREATE INDEX idx_state_transitions_time ON state_transitions(timestamp);
    CREATE INDEX idx_state_transitions_service ON state_transitions(service, timestamp);
  `);
}

export function down(db: Database): void {
  db.exec(`
    DROP TABLE IF EXISTS state_transitions;
    DROP TABLE IF EXISTS service_states;
  `);
}
