import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import { performance } from 'perf_hooks';
import type { Logger } from 'pino';
import { componentLogger } from '../../utils/logger';
import { ConflictError, NotFoundError, errorMessage } from '../../utils/errors';
import { RingBuffer } from '../../utils/RingBuffer';
import { runWithDeadline, settleWithin, sleep as defaultSleep } from '../../utils/async';
import { DEFAULT_GLOBAL_SETTINGS, DEFAULT_SUBJECT_TEMPLATE, type NotifierSpec } from '../../config/types';
import { ConcurrencyLimiter } from '../monitoring/ConcurrencyLimiter';
import { SchedulerEventType, type StateTransition } from '../monitoring/types';
import { CooldownTracker } from './CooldownTracker';
import { KeyedSerialQueue } from './KeyedSerialQueue';
import { RetryState } from './backoff';
import { buildTemplateVariables, isJsonTemplate, renderTemplate, type TemplateVariables } from './TemplateRenderer';
import {
  DispatcherEventType,
  type DeliveryAttempt,
  type DeliveryRecord,
  type DeliveryResult,
  type DeliverySuppressedEvent,
  type Notifier,
  type NotifierRegistry,
  type RenderedMessage,
} from './types';

export const TEST_ALERT_SERVICE = 'healthwatch-test';

/** Synthetic UP -> DOWN transition used to try out a notifier. */
export function buildTestTransition(service: string = TEST_ALERT_SERVICE): StateTransition {
  return {
    id: randomUUID(),
    service,
    kind: 'test',
    oldState: 'UP',
    newState: 'DOWN',
    timestamp: new Date().toISOString(),
    latencyMs: 0,
    error: 'Test alert, no action needed',
    metadata: { test: true },
  };
}

interface ActiveNotifier {
  spec: NotifierSpec;
  notifier: Notifier;
  limiter: ConcurrencyLimiter;
}

export interface AlertDispatcherOptions {
  notifiers: NotifierRegistry;
  cooldownMs?: number;
  deliveryLogSize?: number;
  logger?: Logger;
  /** Waits between attempts; resolves false when `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
}

/**
 * Fans each state transition out to every configured notifier.
 *
 * Transitions of one service are handled in the order they were
 * dispatched; different services proceed concurrently. The notifier set
 * is captured when a transition starts processing, so a notifier replaced
 * or removed mid-delivery finishes with its old configuration.
 */
export class AlertDispatcher extends EventEmitter {
  private notifiers: Map<string, ActiveNotifier> = new Map();
  private queue = new KeyedSerialQueue();
  private cooldown = new CooldownTracker();
  private deliveries: RingBuffer<DeliveryRecord>;
  private cooldownMs: number;
  private abortController = new AbortController();
  private source: EventEmitter | null = null;
  private isShuttingDown = false;
  private readonly registry: NotifierRegistry;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>;
  private readonly log: Logger;

  constructor(options: AlertDispatcherOptions) {
    super();
    this.registry = options.notifiers;
    this.cooldownMs = options.cooldownMs ?? DEFAULT_GLOBAL_SETTINGS.alertCooldownMs;
    this.deliveries = new RingBuffer(options.deliveryLogSize ?? DEFAULT_GLOBAL_SETTINGS.deliveryLogSize);
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? componentLogger('alert-dispatcher');
  }

  /**
   * Add a notifier, or replace the one with the same name.
   */
  setNotifier(spec: NotifierSpec): void {
    const notifier = this.registry.create(spec);
    const replaced = this.notifiers.has(spec.name);
    this.notifiers.set(spec.name, {
      spec,
      notifier,
      limiter: new ConcurrencyLimiter(spec.maxConcurrent ?? Infinity),
    });
    this.log.info({ notifier: spec.name, kind: spec.kind }, replaced ? 'notifier replaced' : 'notifier added');
  }

  removeNotifier(name: string): boolean {
    const removed = this.notifiers.delete(name);
    if (removed) {
      this.log.info({ notifier: name }, 'notifier removed');
    }
    return removed;
  }

  getNotifierNames(): string[] {
    return Array.from(this.notifiers.keys()).sort();
  }

  getRecentDeliveries(limit?: number): DeliveryRecord[] {
    return this.deliveries.recent(limit);
  }

  /** Resolves once every queued delivery has finished. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  setCooldown(cooldownMs: number): void {
    this.cooldownMs = Math.max(0, cooldownMs);
    this.cooldown.prune(this.cooldownMs);
  }

  setDeliveryLogSize(size: number): void {
    this.deliveries.resize(size);
  }

  /**
   * Subscribe to the scheduler's transitions.
   */
  start(scheduler: EventEmitter): void {
    if (this.source) {
      this.source.removeListener(SchedulerEventType.TRANSITION, this.handleTransition);
    }
    this.source = scheduler;
    scheduler.on(SchedulerEventType.TRANSITION, this.handleTransition);
    this.log.info('alert dispatcher started');
  }

  /**
   * Deliver a transition through every notifier. Resolves with one record
   * per notifier once all of them finished, or with no records when the
   * transition was suppressed.
   */
  dispatch(transition: StateTransition): Promise<DeliveryRecord[]> {
    return this.queue.run(transition.service, () => this.process(transition));
  }

  /**
   * Send a test alert through one notifier with its own templates and
   * retry policy. Cooldown and the per-service queue do not apply.
   */
  async sendTest(name: string): Promise<{ transition: StateTransition; delivery: DeliveryRecord }> {
    if (this.isShuttingDown) {
      throw new ConflictError('Alert dispatcher is shutting down');
    }
    const entry = this.notifiers.get(name);
    if (!entry) {
      throw new NotFoundError(`Notifier "${name}"`);
    }

    const transition = buildTestTransition();
    this.log.info({ notifier: name, transitionId: transition.id }, 'sending test alert');
    const delivery = await this.deliver(entry, transition, buildTemplateVariables(transition));
    return { transition, delivery };
  }

  /**
   * Stop accepting transitions from the scheduler, wait up to `graceMs`
   * for queued deliveries, then abort retry waits and running attempts.
   */
  async shutdown(graceMs: number = DEFAULT_GLOBAL_SETTINGS.shutdownGraceMs): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    if (this.source) {
      this.source.removeListener(SchedulerEventType.TRANSITION, this.handleTransition);
      this.source = null;
    }

    const settled = await settleWithin([this.queue.idle()], graceMs);
    if (!settled) {
      this.log.warn({ pending: this.queue.pending, graceMs }, 'aborting deliveries still running after grace period');
      this.abortController.abort(new Error('shutdown'));
    }
    this.cooldown.clear();
    this.log.info('alert dispatcher stopped');
  }

  private handleTransition = (transition: StateTransition): void => {
    this.dispatch(transition).catch(err => {
      this.log.error({ err, service: transition.service, transitionId: transition.id }, 'failed to dispatch transition');
    });
  };

  private async process(transition: StateTransition): Promise<DeliveryRecord[]> {
    if (this.abortController.signal.aborted) {
      this.log.warn({ service: transition.service, transitionId: transition.id }, 'dispatcher stopped, dropping transition');
      return [];
    }

    if (this.cooldown.isSuppressed(transition.service, transition.newState, this.cooldownMs)) {
      const event: DeliverySuppressedEvent = {
        service: transition.service,
        transitionId: transition.id,
        newState: transition.newState,
        cooldownMs: this.cooldownMs,
      };
      this.log.info(event, 'alert suppressed by cooldown');
      this.emit(DispatcherEventType.SUPPRESSED, event);
      return [];
    }
    if (this.cooldownMs > 0) {
      this.cooldown.record(transition.service, transition.newState);
    }

    const snapshot = Array.from(this.notifiers.values());
    if (snapshot.length === 0) {
      this.log.debug({ service: transition.service }, 'no notifiers configured');
      return [];
    }

    const variables = buildTemplateVariables(transition);
    return Promise.all(snapshot.map(entry => this.deliver(entry, transition, variables)));
  }

  private render(spec: NotifierSpec, variables: TemplateVariables): RenderedMessage {
    const { subject, body } = spec.templates;
    return {
      subject: renderTemplate(subject ?? DEFAULT_SUBJECT_TEMPLATE, variables),
      body: renderTemplate(body, variables),
      json: isJsonTemplate(body),
    };
  }

  private async deliver(
    entry: ActiveNotifier,
    transition: StateTransition,
    variables: TemplateVariables,
  ): Promise<DeliveryRecord> {
    const { spec } = entry;
    const message = this.render(spec, variables);
    const signal = this.abortController.signal;
    const retry = new RetryState(spec.retry);

    const acquired = await entry.limiter.acquire(signal);
    if (!acquired) {
      retry.cancel('dispatcher shut down before delivery started');
      return this.complete(spec, transition, retry);
    }

    try {
      while (!retry.finished) {
        if (signal.aborted) {
          retry.cancel('dispatcher shut down');
          break;
        }

        const attempt = retry.begin();
        const startTime = performance.now();
        const result = await this.attempt(entry, message, spec.retry.deliveryTimeoutMs);
        const event: DeliveryAttempt = {
          notifier: spec.name,
          service: transition.service,
          transitionId: transition.id,
          attempt,
          success: result.success,
          durationMs: performance.now() - startTime,
        };
        if (result.error !== undefined) event.error = result.error;
        this.emit(DispatcherEventType.ATTEMPT, event);

        if (result.success) {
          retry.succeed();
          break;
        }

        const delay = retry.fail(result.error ?? 'delivery failed', result.retryAfterMs);
        if (delay === null) break;

        this.log.warn(
          { notifier: spec.name, service: transition.service, attempt, delayMs: delay, error: result.error },
          'delivery attempt failed, retrying',
        );
        const waited = await this.sleep(delay, signal);
        if (!waited) {
          retry.cancel('dispatcher shut down during retry wait');
        }
      }
    } finally {
      entry.limiter.release();
    }

    return this.complete(spec, transition, retry);
  }

  private async attempt(entry: ActiveNotifier, message: RenderedMessage, timeoutMs: number): Promise<DeliveryResult> {
    try {
      const outcome = await runWithDeadline(
        attemptSignal => entry.notifier.deliver(message, attemptSignal),
        timeoutMs,
        this.abortController.signal,
      );
      if (outcome.timedOut) {
        return { success: false, error: `Delivery timed out after ${timeoutMs}ms` };
      }
      return outcome.value;
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
  }

  private complete(spec: NotifierSpec, transition: StateTransition, retry: RetryState): DeliveryRecord {
    const record: DeliveryRecord = {
      notifier: spec.name,
      service: transition.service,
      transitionId: transition.id,
      success: retry.state === 'succeeded',
      attempts: retry.attempts,
      completedAt: new Date().toISOString(),
    };
    if (!record.success && retry.error !== undefined) {
      record.error = retry.error;
    }

    this.deliveries.push(record);
    if (record.success) {
      this.log.info({ notifier: spec.name, service: transition.service, attempts: record.attempts }, 'alert delivered');
    } else {
      this.log.error(
        { notifier: spec.name, service: transition.service, attempts: record.attempts, error: record.error },
        'alert delivery failed',
      );
    }
    this.emit(DispatcherEventType.COMPLETE, record);
    return record;
  }
}
