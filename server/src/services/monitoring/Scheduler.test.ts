import { KindRegistry } from '../../utils/KindRegistry';
import { DuplicateServiceError, ProbeInProgressError, ServiceNotScheduledError } from '../../utils/errors';
import type { ServiceSpec } from '../../config/types';
import type { Prober, ProbeResult } from '../probes/types';
import { Scheduler } from './Scheduler';
import { StateTracker } from './StateTracker';
import { SchedulerEventType, type CheckOutcome, type StateTransition } from './types';

type ProbeFn = jest.Mock<Promise<ProbeResult>, [AbortSignal]>;

function deferred<T>() {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>(resolve => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
}

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

const spec = (name: string, overrides: Partial<ServiceSpec> = {}): ServiceSpec => ({
  name,
  kind: 'fake',
  params: {},
  intervalMs: 1000,
  timeoutMs: 500,
  ...overrides,
});

function createScheduler(maxConcurrentProbes = 10) {
  const handlers = new Map<string, ProbeFn>();
  const probers = new KindRegistry<ServiceSpec, Prober>('probe', [
    {
      kind: 'fake',
      validate: () => [],
      create: (s): Prober => ({
        kind: 'fake',
        probe: signal => {
          const handler = handlers.get(s.name);
          if (!handler) throw new Error(`no handler for ${s.name}`);
          return handler(signal);
        },
      }),
    },
  ]);
  const stateTracker = new StateTracker();
  const scheduler = new Scheduler({ stateTracker, probers, maxConcurrentProbes });

  const handle = (name: string, fn: (signal: AbortSignal) => Promise<ProbeResult>): ProbeFn => {
    const mock: ProbeFn = jest.fn(fn);
    handlers.set(name, mock);
    return mock;
  };

  return { scheduler, stateTracker, handle };
}

describe('Scheduler', () => {
  beforeEach(() => {
    jest.useFakeTimers({ doNotFake: ['setImmediate', 'nextTick'] });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('schedule', () => {
    it('should run the first tick immediately and then on every interval', async () => {
      const { scheduler, stateTracker, handle } = createScheduler();
      const probe = handle('api', async () => ({ status: 'UP' }));

      scheduler.schedule(spec('api'));
      await flush();

      expect(probe).toHaveBeenCalledTimes(1);
      expect(stateTracker.getCurrentState('api')?.status).toBe('UP');

      jest.advanceTimersByTime(1000);
      await flush();
      jest.advanceTimersByTime(1000);
      await flush();

      expect(probe).toHaveBeenCalledTimes(3);
      await scheduler.shutdown(0);
    });

    it('should reject a duplicate name', async () => {
      const { scheduler, handle } = createScheduler();
      handle('api', async () => ({ status: 'UP' }));
      scheduler.schedule(spec('api'));

      expect(() => scheduler.schedule(spec('api'))).toThrow(DuplicateServiceError);
      await scheduler.shutdown(0);
    });

    it('should emit outcome and transition events', async () => {
      const { scheduler, handle } = createScheduler();
      handle('api', async () => ({ status: 'DOWN', error: 'connection refused', metadata: { port: 80 } }));
      const outcomes: CheckOutcome[] = [];
      const transitions: StateTransition[] = [];
      scheduler.on(SchedulerEventType.OUTCOME, (o: CheckOutcome) => outcomes.push(o));
      scheduler.on(SchedulerEventType.TRANSITION, (t: StateTransition) => transitions.push(t));

      scheduler.schedule(spec('api'));
      await flush();

      expect(outcomes).toHaveLength(1);
      expect(outcomes[0]).toMatchObject({
        service: 'api',
        kind: 'fake',
        status: 'DOWN',
        error: 'connection refused',
        metadata: { port: 80 },
      });
      expect(transitions).toHaveLength(1);
      expect(transitions[0]).toMatchObject({ oldState: null, newState: 'DOWN' });
      await scheduler.shutdown(0);
    });

    it('should use the latency reported by the prober when present', async () => {
      const { scheduler, stateTracker, handle } = createScheduler();
      handle('api', async () => ({ status: 'UP', latencyMs: 42 }));

      scheduler.schedule(spec('api'));
      await flush();

      expect(stateTracker.getCurrentState('api')?.lastOutcome?.latencyMs).toBe(42);
      await scheduler.shutdown(0);
    });
  });

  describe('probe failures', () => {
    it('should record DOWN with "timeout" and abort the probe signal', async () => {
      const { scheduler, stateTracker, handle } = createScheduler();
      let seen: AbortSignal | undefined;
      handle('slow', signal => {
        seen = signal;
        return new Promise<ProbeResult>(() => undefined);
      });

      scheduler.schedule(spec('slow', { timeoutMs: 200 }));
      await flush();
      jest.advanceTimersByTime(200);
      await flush();

      const state = stateTracker.getCurrentState('slow');
      expect(state?.status).toBe('DOWN');
      expect(state?.lastOutcome?.error).toBe('timeout');
      expect(seen?.aborted).toBe(true);
      await scheduler.shutdown(0);
    });

    it('should record DOWN with the thrown message verbatim', async () => {
      const { scheduler, stateTracker, handle } = createScheduler();
      handle('api', async () => {
        throw new Error('getaddrinfo ENOTFOUND api.internal');
      });

      scheduler.schedule(spec('api'));
      await flush();

      expect(stateTracker.getCurrentState('api')?.lastOutcome?.error).toBe('getaddrinfo ENOTFOUND api.internal');
      await scheduler.shutdown(0);
    });
  });

  describe('tick', () => {
    it('should skip a tick while the previous probe is outstanding', async () => {
      const { scheduler, handle } = createScheduler();
      const pending = deferred<ProbeResult>();
      const probe = handle('api', () => pending.promise);
      const skipped = jest.fn();
      scheduler.on(SchedulerEventType.TICK_SKIPPED, skipped);

      scheduler.schedule(spec('api', { intervalMs: 100, timeoutMs: 10_000 }));
      jest.advanceTimersByTime(100);

      expect(probe).toHaveBeenCalledTimes(1);
      expect(skipped).toHaveBeenCalledWith({ service: 'api', reason: 'probe-in-flight' });

      pending.resolve({ status: 'UP' });
      await flush();
      jest.advanceTimersByTime(100);
      expect(probe).toHaveBeenCalledTimes(2);
      await scheduler.shutdown(0);
    });

    it('should defer ticks beyond the global limit and run them as slots free', async () => {
      const { scheduler, handle } = createScheduler(1);
      const first = deferred<ProbeResult>();
      const a = handle('a', () => first.promise);
      const b = handle('b', async () => ({ status: 'UP' }));
      const deferredTicks = jest.fn();
      scheduler.on(SchedulerEventType.TICK_DEFERRED, deferredTicks);

      scheduler.schedule(spec('a', { timeoutMs: 10_000 }));
      scheduler.schedule(spec('b'));

      expect(a).toHaveBeenCalledTimes(1);
      expect(b).not.toHaveBeenCalled();
      expect(deferredTicks).toHaveBeenCalledWith({ service: 'b', inFlight: 1, limit: 1 });
      expect(scheduler.getScheduledService('b')?.deferred).toBe(true);

      first.resolve({ status: 'UP' });
      await flush();

      expect(b).toHaveBeenCalledTimes(1);
      expect(scheduler.getInFlightCount()).toBe(0);
      await scheduler.shutdown(0);
    });

    it('should keep at most one deferred entry per service', async () => {
      const { scheduler, handle } = createScheduler(1);
      const first = deferred<ProbeResult>();
      handle('a', () => first.promise);
      const b = handle('b', async () => ({ status: 'UP' }));

      scheduler.schedule(spec('a', { intervalMs: 60_000, timeoutMs: 60_000 }));
      scheduler.schedule(spec('b', { intervalMs: 100 }));
      jest.advanceTimersByTime(300);

      first.resolve({ status: 'UP' });
      await flush();

      expect(b).toHaveBeenCalledTimes(1);
      await scheduler.shutdown(0);
    });

    it('should raise the limit and drain deferred ticks', async () => {
      const { scheduler, handle } = createScheduler(1);
      handle('a', () => new Promise<ProbeResult>(() => undefined));
      const b = handle('b', async () => ({ status: 'UP' }));

      scheduler.schedule(spec('a', { timeoutMs: 60_000 }));
      scheduler.schedule(spec('b'));
      scheduler.setMaxConcurrentProbes(2);

      expect(b).toHaveBeenCalledTimes(1);
      await scheduler.shutdown(0);
    });
  });

  describe('unschedule', () => {
    it('should stop probes and keep the last known state', async () => {
      const { scheduler, stateTracker, handle } = createScheduler();
      const probe = handle('api', async () => ({ status: 'UP' }));
      scheduler.schedule(spec('api'));
      await flush();

      await expect(scheduler.unschedule('api')).resolves.toBe(true);
      jest.advanceTimersByTime(5000);
      await flush();

      expect(probe).toHaveBeenCalledTimes(1);
      expect(scheduler.isScheduled('api')).toBe(false);
      expect(stateTracker.getCurrentState('api')?.status).toBe('UP');
    });

    it('should abort an outstanding probe and drop its result', async () => {
      const { scheduler, stateTracker, handle } = createScheduler();
      const results: ProbeResult[] = [{ status: 'UP' }];
      const late = deferred<ProbeResult>();
      let secondSignal: AbortSignal | undefined;
      handle('api', signal => {
        const next = results.shift();
        if (next) return Promise.resolve(next);
        secondSignal = signal;
        return late.promise;
      });
      scheduler.schedule(spec('api', { timeoutMs: 60_000 }));
      await flush();
      jest.advanceTimersByTime(1000);

      const done = scheduler.unschedule('api');
      late.resolve({ status: 'DOWN', error: 'connection refused' });
      await done;

      expect(secondSignal?.aborted).toBe(true);
      expect(stateTracker.getCurrentState('api')?.status).toBe('UP');
      expect(stateTracker.getHistory()).toEqual([]);
    });

    it('should be idempotent', async () => {
      const { scheduler } = createScheduler();
      await expect(scheduler.unschedule('missing')).resolves.toBe(false);
    });
  });

  describe('reschedule', () => {
    it('should apply the new cadence without touching recorded state', async () => {
      const { scheduler, stateTracker, handle } = createScheduler();
      const probe = handle('api', async () => ({ status: 'DOWN', error: 'boom' }));
      const transitions = jest.fn();
      scheduler.on(SchedulerEventType.TRANSITION, transitions);
      scheduler.schedule(spec('api', { intervalMs: 1000 }));
      await flush();

      scheduler.reschedule(spec('api', { intervalMs: 5000 }));
      await flush();
      jest.advanceTimersByTime(4999);
      await flush();

      expect(probe).toHaveBeenCalledTimes(2);
      expect(transitions).toHaveBeenCalledTimes(1);
      expect(stateTracker.getCurrentState('api')?.status).toBe('DOWN');
      expect(scheduler.getScheduledService('api')?.intervalMs).toBe(5000);

      jest.advanceTimersByTime(1);
      await flush();
      expect(probe).toHaveBeenCalledTimes(3);
      await scheduler.shutdown(0);
    });

    it('should wait for the retired probe before probing with the new configuration', async () => {
      const { scheduler, stateTracker, handle } = createScheduler();
      const release = deferred<ProbeResult>();
      let active = 0;
      let maxActive = 0;
      const probe = handle('api', async () => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        try {
          // Ignores the abort signal.
          return await release.promise;
        } finally {
          active -= 1;
        }
      });

      scheduler.schedule(spec('api', { timeoutMs: 10_000, intervalMs: 20_000 }));
      await flush();
      scheduler.reschedule(spec('api', { timeoutMs: 10_000, intervalMs: 30_000 }));
      await flush();

      expect(probe).toHaveBeenCalledTimes(1);
      expect(scheduler.getScheduledService('api')?.probing).toBe(true);
      await expect(scheduler.checkNow('api')).rejects.toThrow(ProbeInProgressError);

      release.resolve({ status: 'UP' });
      await flush();
      await flush();

      expect(probe).toHaveBeenCalledTimes(2);
      expect(maxActive).toBe(1);
      expect(stateTracker.getCurrentState('api')?.status).toBe('UP');
      await scheduler.shutdown(0);
    });

    it('should throw for a service that is not scheduled', () => {
      const { scheduler } = createScheduler();
      expect(() => scheduler.reschedule(spec('missing'))).toThrow(ServiceNotScheduledError);
    });

    it('should leave the old task running when the new prober cannot be built', async () => {
      const { scheduler, handle } = createScheduler();
      handle('api', async () => ({ status: 'UP' }));
      scheduler.schedule(spec('api'));

      expect(() => scheduler.reschedule(spec('api', { kind: 'unknown' }))).toThrow('Unknown probe kind "unknown"');
      expect(scheduler.getScheduledService('api')?.kind).toBe('fake');
      await scheduler.shutdown(0);
    });
  });

  describe('checkNow', () => {
    it('should probe outside the cadence and return the outcome', async () => {
      const { scheduler, handle } = createScheduler();
      const probe = handle('api', async () => ({ status: 'DEGRADED' }));
      scheduler.schedule(spec('api'));
      await flush();

      const outcome = await scheduler.checkNow('api');

      expect(outcome.status).toBe('DEGRADED');
      expect(probe).toHaveBeenCalledTimes(2);
      await scheduler.shutdown(0);
    });

    it('should refuse while a probe is outstanding', async () => {
      const { scheduler, handle } = createScheduler();
      handle('api', () => new Promise<ProbeResult>(() => undefined));
      scheduler.schedule(spec('api', { timeoutMs: 60_000 }));

      await expect(scheduler.checkNow('api')).rejects.toThrow(ProbeInProgressError);
      await scheduler.shutdown(0);
    });

    it('should throw for an unknown service', async () => {
      const { scheduler } = createScheduler();
      await expect(scheduler.checkNow('missing')).rejects.toThrow(ServiceNotScheduledError);
    });
  });

  describe('shutdown', () => {
    it('should let outstanding probes finish within the grace period', async () => {
      const { scheduler, stateTracker, handle } = createScheduler();
      const pending = deferred<ProbeResult>();
      handle('api', () => pending.promise);
      scheduler.schedule(spec('api', { timeoutMs: 60_000 }));

      const stopped = scheduler.shutdown(1000);
      pending.resolve({ status: 'DOWN' });
      await stopped;

      expect(stateTracker.getCurrentState('api')?.status).toBe('DOWN');
      expect(scheduler.getScheduledServices()).toEqual([]);
    });

    it('should abort probes still running after the grace period', async () => {
      const { scheduler, handle } = createScheduler();
      let seen: AbortSignal | undefined;
      handle('api', signal => {
        seen = signal;
        return new Promise<ProbeResult>(() => undefined);
      });
      scheduler.schedule(spec('api', { timeoutMs: 60_000 }));

      const stopped = scheduler.shutdown(250);
      jest.advanceTimersByTime(250);
      await stopped;

      expect(seen?.aborted).toBe(true);
    });

    it('should refuse new work afterwards', async () => {
      const { scheduler } = createScheduler();
      await scheduler.shutdown(0);

      expect(() => scheduler.schedule(spec('api'))).toThrow('Scheduler is shutting down');
    });
  });
});
