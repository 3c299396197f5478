import type { Database } from 'better-sqlite3';
import type { Logger } from 'pino';
import { ConfigWatcher } from './config/ConfigWatcher';
import { HotReloader, type ReloadResult } from './config/HotReloader';
import type { EnvConfig } from './config/env';
import { closeDatabase, openDatabase } from './db';
import type { MonitorContext } from './routes/types';
import { AlertDispatcher } from './services/alerts/AlertDispatcher';
import { createNotifierRegistry } from './services/alerts/notifiers';
import type { NotifierRegistry } from './services/alerts/types';
import { Scheduler } from './services/monitoring/Scheduler';
import { StateTracker } from './services/monitoring/StateTracker';
import { createProberRegistry } from './services/probes';
import type { ProberRegistry } from './services/probes/types';
import { TransitionRetentionService } from './services/retention/TransitionRetentionService';
import { StoreRegistry } from './stores';
import { componentLogger } from './utils/logger';

export interface MonitorOptions {
  env: EnvConfig;
  logger: Logger;
  /** Defaults to the built-in probe kinds. */
  probers?: ProberRegistry;
  /** Defaults to the built-in notifier kinds. */
  notifiers?: NotifierRegistry;
}

export interface Monitor {
  readonly scheduler: Scheduler;
  readonly stateTracker: StateTracker;
  readonly dispatcher: AlertDispatcher;
  readonly reloader: HotReloader;
  readonly watcher: ConfigWatcher | null;
  readonly retention: TransitionRetentionService | null;
  readonly db: Database | null;
  readonly context: MonitorContext;
  /** Restore the snapshot, load the configuration and start background work. */
  start(): Promise<ReloadResult>;
  /** Stop probing, drain deliveries within the configured grace period and close the snapshot. */
  shutdown(): Promise<void>;
}

/**
 * Wire the monitor's components from the process settings. Nothing runs
 * until `start`.
 */
export function createMonitor(options: MonitorOptions): Monitor {
  const { env, logger } = options;
  const probers = options.probers ?? createProberRegistry();
  const notifiers = options.notifiers ?? createNotifierRegistry();

  const db = env.stateDbPath ? openDatabase(env.stateDbPath, componentLogger('db', logger)) : null;
  const stores = db ? StoreRegistry.create(db) : null;

  const stateTracker = new StateTracker({
    stateStore: stores?.serviceStates,
    transitionStore: stores?.transitions,
    logger: componentLogger('state-tracker', logger),
  });
  const scheduler = new Scheduler({ stateTracker, probers, logger: componentLogger('scheduler', logger) });
  const dispatcher = new AlertDispatcher({ notifiers, logger: componentLogger('alerts', logger) });
  const reloader = new HotReloader({
    scheduler,
    stateTracker,
    dispatcher,
    registries: { probers, notifiers },
    configPath: env.configPath,
    logger: componentLogger('hot-reload', logger),
  });

  const watcher = env.reloadPollMs > 0
    ? new ConfigWatcher({
      path: env.configPath,
      reloader,
      pollIntervalMs: env.reloadPollMs,
      logger: componentLogger('config-watcher', logger),
    })
    : null;

  const retention = stores && env.transitionRetentionDays > 0
    ? new TransitionRetentionService({
      store: stores.transitions,
      retentionDays: env.transitionRetentionDays,
      logger: componentLogger('retention', logger),
    })
    : null;

  let started = false;

  return {
    scheduler,
    stateTracker,
    dispatcher,
    reloader,
    watcher,
    retention,
    db,
    context: { scheduler, stateTracker, dispatcher, reloader, db },

    async start() {
      if (started) {
        throw new Error('Monitor already started');
      }
      started = true;

      stateTracker.restore();
      // Subscribe before the first load so its transitions are delivered
      dispatcher.start(scheduler);
      const result = await reloader.reload();

      watcher?.start();
      retention?.start();
      logger.info(
        { services: reloader.getCurrentConfig().services.size, notifiers: dispatcher.getNotifierNames().length },
        'monitor started',
      );
      return result;
    },

    async shutdown() {
      logger.info('shutting down');
      await watcher?.stop();
      await reloader.idle();
      retention?.stop();

      const { shutdownGraceMs } = reloader.getGlobalSettings();
      await scheduler.shutdown(shutdownGraceMs);
      await dispatcher.shutdown(shutdownGraceMs);

      if (db) {
        closeDatabase(db, componentLogger('db', logger));
      }
      logger.info('monitor stopped');
    },
  };
}
