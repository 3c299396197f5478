import type { StateTransition } from '../../services/monitoring/types';

export interface ITransitionStore {
  record(transition: StateTransition): void;

  /** Most recent first. */
  getRecent(limit: number, service?: string): StateTransition[];

  deleteOlderThan(timestamp: string): number;
}
