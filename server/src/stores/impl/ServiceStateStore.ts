import { Database } from 'better-sqlite3';
import type { ServiceStateRow } from '../../db/types';
import {
  emptyCheckStats,
  isHealthFlag,
  type CheckOutcome,
  type CheckStats,
  type Metadata,
  type ServiceState,
} from '../../services/monitoring/types';
import { isNumber, isPlainObject } from '../../utils/validation';
import type { IServiceStateStore } from '../interfaces/IServiceStateStore';

export function parseMetadata(json: string | null): Metadata {
  if (!json) return {};
  try {
    const value: unknown = JSON.parse(json);
    return isPlainObject(value) ? value : {};
  } catch {
    return {};
  }
}

/**
 * Rebuild a stored outcome. Rows that no longer match the outcome shape
 * come back as null rather than failing the whole restore.
 */
export function parseOutcome(json: string | null): CheckOutcome | null {
  if (!json) return null;

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return null;
  }
  if (!isPlainObject(value)) return null;

  const { service, kind, status, latencyMs, error, metadata, timestamp } = value;
  if (typeof service !== 'string' || typeof kind !== 'string' || typeof timestamp !== 'string') return null;
  if (!isHealthFlag(status) || !isNumber(latencyMs)) return null;

  const outcome: CheckOutcome = {
    service,
    kind,
    status,
    latencyMs,
    metadata: isPlainObject(metadata) ? metadata : {},
    timestamp,
  };
  if (typeof error === 'string') outcome.error = error;
  return outcome;
}

/** Counters missing from the stored JSON read as zero. */
export function parseCheckStats(json: string | null): CheckStats {
  const stats = emptyCheckStats();
  if (!json) return stats;

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return stats;
  }
  if (!isPlainObject(value)) return stats;
  const stored = value;

  const read = (key: keyof CheckStats): number => {
    const field = stored[key];
    return isNumber(field) && field >= 0 ? field : 0;
  };
  return {
    totalChecks: read('totalChecks'),
    upChecks: read('upChecks'),
    degradedChecks: read('degradedChecks'),
    downChecks: read('downChecks'),
    totalLatencyMs: read('totalLatencyMs'),
    transitions: read('transitions'),
  };
}

export class ServiceStateStore implements IServiceStateStore {
  constructor(private db: Database) {}

  save(state: ServiceState): void {
    this.db
      .prepare(`
        INSERT INTO service_states (service, kind, status, last_transition_at, last_outcome, consecutive_failures, stats, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(service) DO UPDATE SET
          kind = excluded.kind,
          status = excluded.status,
          last_transition_at = excluded.last_transition_at,
          last_outcome = excluded.last_outcome,
          consecutive_failures = excluded.consecutive_failures,
          stats = excluded.stats,
          updated_at = excluded.updated_at
      `)
      .run(
        state.service,
        state.kind,
        state.status,
        state.lastTransitionAt,
        state.lastOutcome ? JSON.stringify(state.lastOutcome) : null,
        state.consecutiveFailures,
        JSON.stringify(state.stats),
        new Date().toISOString(),
      );
  }

  loadAll(): ServiceState[] {
    return this.db
      .prepare<[], ServiceStateRow>('SELECT * FROM service_states ORDER BY service ASC')
      .all()
      .map(row => ({
        service: row.service,
        kind: row.kind,
        status: isHealthFlag(row.status) ? row.status : null,
        lastTransitionAt: row.last_transition_at,
        lastOutcome: parseOutcome(row.last_outcome),
        consecutiveFailures: row.consecutive_failures,
        stats: parseCheckStats(row.stats),
      }));
  }

  delete(service: string): boolean {
    const result = this.db.prepare('DELETE FROM service_states WHERE service = ?').run(service);
    return result.changes > 0;
  }
}
