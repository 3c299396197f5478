import { Database } from 'better-sqlite3';

import type { IServiceStateStore } from './interfaces/IServiceStateStore';
import type { ITransitionStore } from './interfaces/ITransitionStore';

import { ServiceStateStore } from './impl/ServiceStateStore';
import { TransitionStore } from './impl/TransitionStore';

/**
 * The stores backed by one snapshot database.
 */
export class StoreRegistry {
  public readonly serviceStates: IServiceStateStore;
  public readonly transitions: ITransitionStore;

  private constructor(database: Database) {
    this.serviceStates = new ServiceStateStore(database);
    this.transitions = new TransitionStore(database);
  }

  static create(database: Database): StoreRegistry {
    return new StoreRegistry(database);
  }
}

export type { IServiceStateStore, ITransitionStore } from './interfaces';
export { ServiceStateStore } from './impl/ServiceStateStore';
export { TransitionStore } from './impl/TransitionStore';
