import type { ServiceState } from '../../services/monitoring/types';

/**
 * Advisory snapshot of the latest state per service. Loaded at start-up
 * so a restart does not begin from "unknown".
 */
export interface IServiceStateStore {
  save(state: ServiceState): void;

  loadAll(): ServiceState[];

  delete(service: string): boolean;
}
