import type Database from 'better-sqlite3';
import type { HotReloader } from '../config/HotReloader';
import type { AlertDispatcher } from '../services/alerts/AlertDispatcher';
import type { Scheduler } from '../services/monitoring/Scheduler';
import type { StateTracker } from '../services/monitoring/StateTracker';

/**
 * Live components the operator API reads from and acts on.
 */
export interface MonitorContext {
  scheduler: Scheduler;
  stateTracker: StateTracker;
  dispatcher: AlertDispatcher;
  reloader: HotReloader;
  /** Present when the state snapshot is persisted. */
  db?: Database.Database | null;
}
