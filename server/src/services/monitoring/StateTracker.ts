import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { componentLogger } from '../../utils/logger';
import { RingBuffer } from '../../utils/RingBuffer';
import type { IServiceStateStore, ITransitionStore } from '../../stores/interfaces';
import { DEFAULT_GLOBAL_SETTINGS } from '../../config/types';
import { emptyCheckStats, type CheckOutcome, type CheckStats, type ServiceState, type StateTransition } from './types';

export interface StateTrackerOptions {
  historySize?: number;
  failureThreshold?: number;
  stateStore?: IServiceStateStore;
  transitionStore?: ITransitionStore;
  logger?: Logger;
}

export interface HistoryQuery {
  service?: string;
  limit?: number;
}

/**
 * Keeps the current health flag per service and a bounded log of
 * transitions. `update` is synchronous, so concurrent probe completions
 * are applied one at a time in arrival order.
 */
export class StateTracker {
  private states = new Map<string, ServiceState>();
  private history: RingBuffer<StateTransition>;
  private failureThreshold: number;
  private readonly stateStore?: IServiceStateStore;
  private readonly transitionStore?: ITransitionStore;
  private readonly log: Logger;

  constructor(options: StateTrackerOptions = {}) {
    this.history = new RingBuffer(options.historySize ?? DEFAULT_GLOBAL_SETTINGS.historySize);
    this.failureThreshold = StateTracker.checkThreshold(
      options.failureThreshold ?? DEFAULT_GLOBAL_SETTINGS.failureThreshold,
    );
    this.stateStore = options.stateStore;
    this.transitionStore = options.transitionStore;
    this.log = options.logger ?? componentLogger('state-tracker');
  }

  /**
   * Record an outcome. Returns the transition it caused, or null when the
   * service's state did not change.
   *
   * The first outcome for a service only produces a transition when it is
   * not UP. While UP, fewer than `failureThreshold` consecutive failures
   * leave the state alone.
   */
  update(outcome: CheckOutcome): StateTransition | null {
    const current = this.states.get(outcome.service);
    const previous = current?.status ?? null;
    const consecutiveFailures = outcome.status === 'UP' ? 0 : (current?.consecutiveFailures ?? 0) + 1;

    let changed: boolean;
    if (previous === null) {
      changed = true;
    } else if (outcome.status === previous) {
      changed = false;
    } else if (previous === 'UP') {
      changed = consecutiveFailures >= this.failureThreshold;
    } else {
      changed = true;
    }

    const transition = changed && !(previous === null && outcome.status === 'UP')
      ? this.buildTransition(outcome, previous)
      : null;

    const next: ServiceState = {
      service: outcome.service,
      kind: outcome.kind,
      status: changed ? outcome.status : previous,
      lastTransitionAt: changed ? outcome.timestamp : current?.lastTransitionAt ?? null,
      lastOutcome: outcome,
      consecutiveFailures,
      stats: StateTracker.countCheck(current?.stats ?? emptyCheckStats(), outcome, transition !== null),
    };
    this.states.set(outcome.service, next);

    this.persist(next, transition);

    if (transition) {
      this.history.push(transition);
      this.log.info(
        { service: transition.service, from: transition.oldState, to: transition.newState },
        'service state changed',
      );
    } else if (previous === 'UP' && outcome.status !== 'UP') {
      this.log.debug(
        { service: outcome.service, consecutiveFailures, threshold: this.failureThreshold },
        'failure below threshold',
      );
    }

    return transition;
  }

  getCurrentState(service: string): ServiceState | undefined {
    const state = this.states.get(service);
    return state ? { ...state, stats: { ...state.stats } } : undefined;
  }

  getAllStates(): ServiceState[] {
    return [...this.states.values()]
      .map(state => ({ ...state, stats: { ...state.stats } }))
      .sort((a, b) => a.service.localeCompare(b.service));
  }

  /** Most recent first. */
  getHistory(query: HistoryQuery = {}): StateTransition[] {
    const { service, limit } = query;
    return this.history.recent(limit, service === undefined ? undefined : t => t.service === service);
  }

  /**
   * Forget a service's state. History entries are kept.
   */
  clear(service: string): boolean {
    const existed = this.states.delete(service);
    if (this.stateStore) {
      try {
        this.stateStore.delete(service);
      } catch (err) {
        this.log.error({ err, service }, 'failed to delete persisted state');
      }
    }
    return existed;
  }

  setHistorySize(size: number): void {
    this.history.resize(size);
  }

  setFailureThreshold(threshold: number): void {
    this.failureThreshold = StateTracker.checkThreshold(threshold);
  }

  /**
   * Load the last persisted snapshot. Returns the number of services
   * restored.
   */
  restore(): number {
    if (this.transitionStore) {
      const recent = this.transitionStore.getRecent(this.history.maxSize);
      for (const transition of recent.reverse()) {
        this.history.push(transition);
      }
    }

    if (!this.stateStore) return 0;

    const saved = this.stateStore.loadAll();
    for (const state of saved) {
      this.states.set(state.service, state);
    }
    this.log.info({ count: saved.length }, 'restored persisted service states');
    return saved.length;
  }

  private buildTransition(outcome: CheckOutcome, oldState: ServiceState['status']): StateTransition {
    const transition: StateTransition = {
      id: randomUUID(),
      service: outcome.service,
      kind: outcome.kind,
      oldState,
      newState: outcome.status,
      timestamp: outcome.timestamp,
      latencyMs: outcome.latencyMs,
      metadata: { ...outcome.metadata },
    };
    if (outcome.error !== undefined) {
      transition.error = outcome.error;
    }
    return transition;
  }

  private persist(state: ServiceState, transition: StateTransition | null): void {
    try {
      this.stateStore?.save(state);
      if (transition) this.transitionStore?.record(transition);
    } catch (err) {
      this.log.error({ err, service: state.service }, 'failed to persist service state');
    }
  }

  private static countCheck(stats: CheckStats, outcome: CheckOutcome, transitioned: boolean): CheckStats {
    return {
      totalChecks: stats.totalChecks + 1,
      upChecks: stats.upChecks + (outcome.status === 'UP' ? 1 : 0),
      degradedChecks: stats.degradedChecks + (outcome.status === 'DEGRADED' ? 1 : 0),
      downChecks: stats.downChecks + (outcome.status === 'DOWN' ? 1 : 0),
      totalLatencyMs: stats.totalLatencyMs + outcome.latencyMs,
      transitions: stats.transitions + (transitioned ? 1 : 0),
    };
  }

  private static checkThreshold(threshold: number): number {
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new RangeError(`Failure threshold must be a positive integer, got ${threshold}`);
    }
    return threshold;
  }
}
