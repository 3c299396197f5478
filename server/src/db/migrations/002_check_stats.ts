import { Database } from 'better-sqlite3';

export function up(db: Database): void {
  db.exec(`
    ALTER TABLE service_states ADD COLUMN stats TEXT NOT NULL DEFAULT '{}';
  `);
}

export function down(db: Database): void {
  db.exec(`
    ALTER TABLE service_states DROP COLUMN stats;
  `);
}
