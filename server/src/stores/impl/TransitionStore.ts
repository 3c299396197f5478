import { Database } from 'better-sqlite3';
import type { StateTransitionRow } from '../../db/types';
import { isHealthFlag, type StateTransition } from '../../services/monitoring/types';
import type { ITransitionStore } from '../interfaces/ITransitionStore';
import { parseMetadata } from './ServiceStateStore';

function toTransition(row: StateTransitionRow): StateTransition | null {
  if (!isHealthFlag(row.new_state)) return null;

  const transition: StateTransition = {
    id: row.id,
    service: row.service,
    kind: row.kind,
    oldState: isHealthFlag(row.old_state) ? row.old_state : null,
    newState: row.new_state,
    timestamp: row.timestamp,
    latencyMs: row.latency_ms,
    metadata: parseMetadata(row.metadata),
  };
  if (row.error !== null) transition.error = row.error;
  return transition;
}

export class TransitionStore implements ITransitionStore {
  constructor(private db: Database) {}

  record(transition: StateTransition): void {
    this.db
      .prepare(`
        INSERT INTO state_transitions (id, service, kind, old_state, new_state, timestamp, latency_ms, error, metadata)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        transition.id,
        transition.service,
        transition.kind,
        transition.oldState,
        transition.newState,
        transition.timestamp,
        transition.latencyMs,
        transition.error ?? null,
        JSON.stringify(transition.metadata),
      );
  }

  getRecent(limit: number, service?: string): StateTransition[] {
    const rows = service === undefined
      ? this.db
        .prepare<[number], StateTransitionRow>('SELECT * FROM state_transitions ORDER BY timestamp DESC, rowid DESC LIMIT ?')
        .all(limit)
      : this.db
        .prepare<[string, number], StateTransitionRow>(`
          SELECT * FROM state_transitions
          WHERE service = ?
          ORDER BY timestamp DESC, rowid DESC
          LIMIT ?
        `)
        .all(service, limit);

    return rows.flatMap(row => {
      const transition = toTransition(row);
      return transition ? [transition] : [];
    });
  }

  deleteOlderThan(timestamp: string): number {
    const result = this.db.prepare('DELETE FROM state_transitions WHERE timestamp < ?').run(timestamp);
    return result.changes;
  }
}
