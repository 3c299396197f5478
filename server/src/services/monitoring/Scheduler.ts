import { EventEmitter } from 'events';
import { performance } from 'perf_hooks';
import type { Logger } from 'pino';
import { componentLogger } from '../../utils/logger';
import {
  ConflictError,
  DuplicateServiceError,
  ProbeInProgressError,
  ServiceNotScheduledError,
  errorMessage,
} from '../../utils/errors';
import { runWithDeadline, settleWithin } from '../../utils/async';
import { DEFAULT_GLOBAL_SETTINGS, type ServiceSpec } from '../../config/types';
import type { Prober, ProberRegistry, ProbeResult } from '../probes/types';
import { ConcurrencyLimiter } from './ConcurrencyLimiter';
import type { StateTracker } from './StateTracker';
import {
  SchedulerEventType,
  type CheckOutcome,
  type ScheduledServiceInfo,
  type TickDeferredEvent,
  type TickSkippedEvent,
} from './types';

interface ScheduledTask {
  spec: ServiceSpec;
  prober: Prober;
  timer: NodeJS.Timeout;
  /** Outstanding probe of this task, if any. */
  inFlight: Promise<CheckOutcome | null> | null;
  controller: AbortController | null;
  deferred: boolean;
  lastProbeStartedAt: string | null;
}

export interface SchedulerOptions {
  stateTracker: StateTracker;
  probers: ProberRegistry;
  maxConcurrentProbes?: number;
  logger?: Logger;
}

/**
 * Drives one interval timer per service. Probes share a global ceiling;
 * ticks that find it full wait in a FIFO (one entry per service) and run
 * as slots free up. A service never has two probes outstanding.
 *
 * A task is replaced, never mutated, on reschedule. Results are only
 * recorded while the task that produced them is still the registered
 * one, so outcomes of removed or replaced configurations are dropped.
 */
export class Scheduler extends EventEmitter {
  private tasks: Map<string, ScheduledTask> = new Map();
  private deferredQueue: string[] = [];
  private running: Map<AbortController, Promise<CheckOutcome | null>> = new Map();
  private limiter: ConcurrencyLimiter;
  private readonly stateTracker: StateTracker;
  private readonly probers: ProberRegistry;
  private readonly log: Logger;
  private isShuttingDown = false;

  constructor(options: SchedulerOptions) {
    super();
    this.stateTracker = options.stateTracker;
    this.probers = options.probers;
    this.limiter = new ConcurrencyLimiter(options.maxConcurrentProbes ?? DEFAULT_GLOBAL_SETTINGS.maxConcurrentProbes);
    this.log = options.logger ?? componentLogger('scheduler');
  }

  /**
   * Start probing a service. The first tick runs immediately.
   */
  schedule(spec: ServiceSpec): void {
    this.assertRunning();
    if (this.tasks.has(spec.name)) {
      throw new DuplicateServiceError(spec.name);
    }

    const task = this.createTask(spec);
    this.tasks.set(spec.name, task);
    this.log.info({ service: spec.name, kind: spec.kind, intervalMs: spec.intervalMs }, 'service scheduled');
    this.emit(SchedulerEventType.SERVICE_SCHEDULED, this.describe(task));
    this.tick(spec.name);
  }

  /**
   * Stop probing a service. Resolves once its outstanding probe, which is
   * aborted and whose result is dropped, has settled. The service's state
   * is left with the State Tracker.
   */
  async unschedule(name: string): Promise<boolean> {
    const task = this.tasks.get(name);
    if (!task) return false;

    this.tasks.delete(name);
    const pending = this.retire(task, 'unscheduled');
    this.log.info({ service: name }, 'service unscheduled');
    this.emit(SchedulerEventType.SERVICE_UNSCHEDULED, { name });

    if (pending) await pending;
    return true;
  }

  /**
   * Swap a service's cadence and probe configuration in one step. An
   * outstanding probe of the old configuration is aborted and its result
   * dropped; the new configuration's first tick waits until that probe
   * has settled. Recorded state is not touched.
   */
  reschedule(spec: ServiceSpec): void {
    this.assertRunning();
    const previous = this.tasks.get(spec.name);
    if (!previous) {
      throw new ServiceNotScheduledError(spec.name);
    }

    // Built before anything is torn down so a failing prober leaves the old task running.
    const task = this.createTask(spec);
    this.tasks.set(spec.name, task);
    const outstanding = this.retire(previous, 'rescheduled');

    this.log.info({ service: spec.name, intervalMs: spec.intervalMs, timeoutMs: spec.timeoutMs }, 'service rescheduled');
    this.emit(SchedulerEventType.SERVICE_RESCHEDULED, this.describe(task));

    if (!outstanding) {
      this.tick(spec.name);
      return;
    }

    // The retired probe still counts as this service's outstanding probe.
    task.inFlight = outstanding;
    void outstanding.then(() => {
      if (task.inFlight === outstanding) task.inFlight = null;
      if (this.tasks.get(spec.name) === task) this.tick(spec.name);
    });
  }

  /**
   * Run one tick for a service: probe now if a slot is free, queue the
   * tick otherwise. Skipped when the previous probe is still outstanding.
   */
  tick(name: string): void {
    if (this.isShuttingDown) return;
    const task = this.tasks.get(name);
    if (!task) return;

    if (task.inFlight) {
      const event: TickSkippedEvent = { service: name, reason: 'probe-in-flight' };
      this.log.warn(event, 'tick skipped, previous probe still running');
      this.emit(SchedulerEventType.TICK_SKIPPED, event);
      return;
    }

    if (task.deferred) return;

    if (!this.limiter.tryAcquire()) {
      task.deferred = true;
      this.deferredQueue.push(name);
      const event: TickDeferredEvent = { service: name, inFlight: this.limiter.active, limit: this.limiter.limit };
      this.log.debug(event, 'tick deferred, probe limit reached');
      this.emit(SchedulerEventType.TICK_DEFERRED, event);
      return;
    }

    void this.launch(task);
  }

  /**
   * Probe a service right away, outside its cadence. Waits for a global
   * slot if none is free.
   */
  async checkNow(name: string): Promise<CheckOutcome> {
    this.assertRunning();
    const task = this.requireTask(name);
    if (task.inFlight) {
      throw new ProbeInProgressError(name);
    }

    if (!this.limiter.tryAcquire()) {
      const acquired = await this.limiter.acquire();
      const current = this.tasks.get(name);
      if (!acquired || current !== task || task.inFlight || this.isShuttingDown) {
        if (acquired) this.limiter.release();
        if (current !== task) throw new ServiceNotScheduledError(name);
        throw new ProbeInProgressError(name);
      }
    }

    if (task.deferred) {
      task.deferred = false;
    }

    const outcome = await this.launch(task);
    if (!outcome) {
      throw new ServiceNotScheduledError(name);
    }
    return outcome;
  }

  setMaxConcurrentProbes(limit: number): void {
    this.limiter.setLimit(limit);
    this.drainDeferred();
  }

  getScheduledServices(): ScheduledServiceInfo[] {
    return Array.from(this.tasks.values())
      .map(task => this.describe(task))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  getScheduledService(name: string): ScheduledServiceInfo | undefined {
    const task = this.tasks.get(name);
    return task ? this.describe(task) : undefined;
  }

  isScheduled(name: string): boolean {
    return this.tasks.has(name);
  }

  getInFlightCount(): number {
    return this.running.size;
  }

  /**
   * Stop all timers and queued ticks, give outstanding probes `graceMs`
   * to finish, then abort whatever is left.
   */
  async shutdown(graceMs: number = DEFAULT_GLOBAL_SETTINGS.shutdownGraceMs): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    for (const task of this.tasks.values()) {
      clearInterval(task.timer);
      task.deferred = false;
    }
    this.deferredQueue = [];

    const settled = await settleWithin(this.running.values(), graceMs);

    this.tasks.clear();
    if (!settled) {
      this.log.warn({ remaining: this.running.size, graceMs }, 'aborting probes still running after grace period');
      for (const controller of this.running.keys()) {
        controller.abort(new Error('shutdown'));
      }
    }
    this.removeAllListeners();
    this.log.info('scheduler stopped');
  }

  private createTask(spec: ServiceSpec): ScheduledTask {
    const prober = this.probers.create(spec);
    const timer = setInterval(() => this.tick(spec.name), spec.intervalMs);
    return {
      spec,
      prober,
      timer,
      inFlight: null,
      controller: null,
      deferred: false,
      lastProbeStartedAt: null,
    };
  }

  /** Stop a task that is no longer registered. Returns its outstanding probe. */
  private retire(task: ScheduledTask, reason: string): Promise<CheckOutcome | null> | null {
    clearInterval(task.timer);
    task.deferred = false;
    task.controller?.abort(new Error(reason));
    return task.inFlight;
  }

  /**
   * Run a probe for `task`. The caller must already hold a limiter slot.
   * Never rejects; resolves null when the result was dropped.
   */
  private launch(task: ScheduledTask): Promise<CheckOutcome | null> {
    const controller = new AbortController();
    task.controller = controller;
    task.lastProbeStartedAt = new Date().toISOString();

    const run = this.runProbe(task, controller.signal).then(
      outcome => {
        this.finish(task, controller);
        return outcome;
      },
      (err: unknown) => {
        this.finish(task, controller);
        this.log.error({ err, service: task.spec.name }, 'probe run failed');
        return null;
      },
    );

    task.inFlight = run;
    this.running.set(controller, run);
    return run;
  }

  private finish(task: ScheduledTask, controller: AbortController): void {
    this.running.delete(controller);
    if (task.controller === controller) {
      task.controller = null;
      task.inFlight = null;
    }
    this.limiter.release();
    this.drainDeferred();
  }

  private async runProbe(task: ScheduledTask, signal: AbortSignal): Promise<CheckOutcome | null> {
    const { spec, prober } = task;
    const startedAt = performance.now();

    let result: ProbeResult;
    try {
      const deadline = await runWithDeadline(probeSignal => prober.probe(probeSignal), spec.timeoutMs, signal);
      result = deadline.timedOut ? { status: 'DOWN', error: 'timeout' } : deadline.value;
    } catch (err) {
      result = { status: 'DOWN', error: errorMessage(err) };
    }

    if (this.tasks.get(spec.name) !== task) {
      this.log.debug({ service: spec.name }, 'discarding result of retired probe');
      return null;
    }

    const outcome: CheckOutcome = {
      service: spec.name,
      kind: spec.kind,
      status: result.status,
      latencyMs: result.latencyMs ?? performance.now() - startedAt,
      metadata: { ...result.metadata },
      timestamp: new Date().toISOString(),
    };
    if (result.error !== undefined) {
      outcome.error = result.error;
    }

    this.log.debug(
      { service: outcome.service, status: outcome.status, latencyMs: outcome.latencyMs, error: outcome.error },
      'probe completed',
    );
    this.emit(SchedulerEventType.OUTCOME, outcome);

    const transition = this.stateTracker.update(outcome);
    if (transition) {
      this.emit(SchedulerEventType.TRANSITION, transition);
    }
    return outcome;
  }

  private drainDeferred(): void {
    while (!this.isShuttingDown && this.deferredQueue.length > 0 && this.limiter.hasCapacity) {
      const name = this.deferredQueue.shift();
      if (name === undefined) break;

      const task = this.tasks.get(name);
      if (!task || !task.deferred) continue;
      task.deferred = false;

      if (task.inFlight) continue;
      if (!this.limiter.tryAcquire()) {
        task.deferred = true;
        this.deferredQueue.unshift(name);
        break;
      }
      void this.launch(task);
    }
  }

  private requireTask(name: string): ScheduledTask {
    const task = this.tasks.get(name);
    if (!task) {
      throw new ServiceNotScheduledError(name);
    }
    return task;
  }

  private assertRunning(): void {
    if (this.isShuttingDown) {
      throw new ConflictError('Scheduler is shutting down');
    }
  }

  private describe(task: ScheduledTask): ScheduledServiceInfo {
    return {
      name: task.spec.name,
      kind: task.spec.kind,
      intervalMs: task.spec.intervalMs,
      timeoutMs: task.spec.timeoutMs,
      probing: task.inFlight !== null,
      deferred: task.deferred,
      lastProbeStartedAt: task.lastProbeStartedAt,
    };
  }
}
