import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { componentLogger } from '../utils/logger';
import { ConfigValidationError, errorMessage } from '../utils/errors';
import { KeyedSerialQueue } from '../services/alerts/KeyedSerialQueue';
import type { AlertDispatcher } from '../services/alerts/AlertDispatcher';
import type { Scheduler } from '../services/monitoring/Scheduler';
import type { StateTracker } from '../services/monitoring/StateTracker';
import { loadConfigFile, parseConfig } from './ConfigLoader';
import { diffConfig, isEmptyDiff, type ConfigDiff } from './ConfigDiffer';
import type { ValidatorRegistries } from './ConfigValidator';
import { DEFAULT_GLOBAL_SETTINGS, type ConfigIssue, type GlobalSettings, type MonitorConfig } from './types';

// --- Event Types ---

export enum ReloadEventType {
  APPLIED = 'reload:applied',
  REJECTED = 'reload:rejected',
}

export interface ReloadResult {
  /** False when the new source hashed the same as the running one. */
  applied: boolean;
  hash: string;
  diff: ConfigDiff | null;
}

export interface ReloadStatus {
  hash: string | null;
  appliedAt: string | null;
  lastError: string | null;
  lastErrorAt: string | null;
}

export interface HotReloaderOptions {
  scheduler: Scheduler;
  stateTracker: StateTracker;
  dispatcher: AlertDispatcher;
  registries: ValidatorRegistries;
  /** File read by `reload()` when no source text is given. */
  configPath?: string;
  logger?: Logger;
}

const RELOAD_KEY = 'reload';

const EMPTY_CONFIG: MonitorConfig = {
  global: DEFAULT_GLOBAL_SETTINGS,
  services: new Map(),
  notifiers: new Map(),
  hash: '',
};

/**
 * Single mutation path for the running service and notifier sets.
 *
 * Reloads run one at a time. A candidate configuration is fully validated,
 * and every prober and notifier it introduces is built, before anything
 * live is touched; a rejected candidate leaves the running set as it was.
 */
export class HotReloader extends EventEmitter {
  private current: MonitorConfig = EMPTY_CONFIG;
  private queue = new KeyedSerialQueue();
  private status: ReloadStatus = { hash: null, appliedAt: null, lastError: null, lastErrorAt: null };
  private readonly scheduler: Scheduler;
  private readonly stateTracker: StateTracker;
  private readonly dispatcher: AlertDispatcher;
  private readonly registries: ValidatorRegistries;
  private readonly configPath?: string;
  private readonly log: Logger;

  constructor(options: HotReloaderOptions) {
    super();
    this.scheduler = options.scheduler;
    this.stateTracker = options.stateTracker;
    this.dispatcher = options.dispatcher;
    this.registries = options.registries;
    this.configPath = options.configPath;
    this.log = options.logger ?? componentLogger('hot-reload');
  }

  /**
   * Load, validate and apply a configuration. Reads `configPath` when
   * `source` is omitted. Throws `ConfigValidationError` when rejected.
   */
  reload(source?: string): Promise<ReloadResult> {
    return this.queue.run(RELOAD_KEY, async () => {
      let config: MonitorConfig;
      try {
        config = await this.load(source);
      } catch (err) {
        this.reject(err);
        throw err;
      }

      if (config.hash === this.current.hash) {
        this.log.debug({ hash: config.hash }, 'configuration unchanged');
        return { applied: false, hash: config.hash, diff: null };
      }
      return this.applyNow(config);
    });
  }

  /**
   * Apply an already validated configuration.
   */
  apply(config: MonitorConfig): Promise<ReloadResult> {
    return this.queue.run(RELOAD_KEY, () => this.applyNow(config));
  }

  getCurrentConfig(): MonitorConfig {
    return this.current;
  }

  getGlobalSettings(): GlobalSettings {
    return { ...this.current.global };
  }

  getStatus(): ReloadStatus {
    return { ...this.status };
  }

  /** Resolves once no reload is running or queued. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  private async load(source: string | undefined): Promise<MonitorConfig> {
    if (source !== undefined) {
      return parseConfig(source, this.registries, 'reload request', this.log);
    }
    if (!this.configPath) {
      throw new ConfigValidationError([{ severity: 'error', path: '', message: 'No configuration path set' }]);
    }
    return loadConfigFile(this.configPath, this.registries, this.log);
  }

  private async applyNow(config: MonitorConfig): Promise<ReloadResult> {
    const firstLoad = this.current === EMPTY_CONFIG;
    const diff = diffConfig(this.current, config);

    try {
      this.preflight(diff);
    } catch (err) {
      this.reject(err);
      throw err;
    }

    if (isEmptyDiff(diff)) {
      this.current = config;
      this.markApplied(config.hash);
      this.log.info({ hash: config.hash }, 'configuration reloaded with no effective changes');
      return { applied: true, hash: config.hash, diff };
    }

    this.applyGlobal(config.global, diff);

    for (const name of diff.notifiers.toRemove) {
      this.dispatcher.removeNotifier(name);
    }
    for (const spec of [...diff.notifiers.toReplace, ...diff.notifiers.toAdd]) {
      this.dispatcher.setNotifier(spec);
    }

    await Promise.all(diff.services.toRemove.map(name => this.scheduler.unschedule(name)));

    for (const { spec, resetState } of diff.services.toUpdate) {
      this.scheduler.reschedule(spec);
      if (resetState) {
        this.stateTracker.clear(spec.name);
      }
    }
    if (firstLoad) {
      this.dropStaleRestoredStates(config);
    }
    for (const spec of diff.services.toAdd) {
      // State restored at startup carries over to the first load; later additions start fresh
      const restored = firstLoad && this.stateTracker.getCurrentState(spec.name)?.kind === spec.kind;
      if (!restored) {
        this.stateTracker.clear(spec.name);
      }
      this.scheduler.schedule(spec);
    }

    this.current = config;
    this.markApplied(config.hash);

    this.log.info(
      {
        hash: config.hash,
        services: {
          added: diff.services.toAdd.length,
          removed: diff.services.toRemove.length,
          updated: diff.services.toUpdate.length,
          unchanged: diff.services.unchanged.length,
        },
        notifiers: {
          added: diff.notifiers.toAdd.length,
          removed: diff.notifiers.toRemove.length,
          replaced: diff.notifiers.toReplace.length,
        },
        globalChanged: diff.globalChanged,
      },
      'configuration applied',
    );
    this.emit(ReloadEventType.APPLIED, { hash: config.hash, diff });
    return { applied: true, hash: config.hash, diff };
  }

  /**
   * Build every prober and notifier the diff introduces, so that a kind
   * that cannot be instantiated rejects the reload before any change.
   */
  private preflight(diff: ConfigDiff): void {
    const issues: ConfigIssue[] = [];
    const services = [...diff.services.toAdd, ...diff.services.toUpdate.map(update => update.spec)];
    for (const spec of services) {
      try {
        this.registries.probers.create(spec);
      } catch (err) {
        issues.push({ severity: 'error', path: `services.${spec.name}`, message: errorMessage(err) });
      }
    }
    for (const spec of [...diff.notifiers.toAdd, ...diff.notifiers.toReplace]) {
      try {
        this.registries.notifiers.create(spec);
      } catch (err) {
        issues.push({ severity: 'error', path: `notifiers.${spec.name}`, message: errorMessage(err) });
      }
    }
    if (issues.length > 0) {
      throw new ConfigValidationError(issues);
    }
  }

  private dropStaleRestoredStates(config: MonitorConfig): void {
    for (const state of this.stateTracker.getAllStates()) {
      if (!config.services.has(state.service)) {
        this.stateTracker.clear(state.service);
      }
    }
  }

  private applyGlobal(global: GlobalSettings, diff: ConfigDiff): void {
    for (const key of diff.globalChanged) {
      switch (key) {
        case 'maxConcurrentProbes':
          this.scheduler.setMaxConcurrentProbes(global.maxConcurrentProbes);
          break;
        case 'historySize':
          this.stateTracker.setHistorySize(global.historySize);
          break;
        case 'failureThreshold':
          this.stateTracker.setFailureThreshold(global.failureThreshold);
          break;
        case 'alertCooldownMs':
          this.dispatcher.setCooldown(global.alertCooldownMs);
          break;
        case 'deliveryLogSize':
          this.dispatcher.setDeliveryLogSize(global.deliveryLogSize);
          break;
        // Defaults are already folded into each spec; the grace period is read at shutdown.
        case 'defaultIntervalMs':
        case 'defaultTimeoutMs':
        case 'shutdownGraceMs':
          break;
      }
    }
  }

  private markApplied(hash: string): void {
    this.status = { ...this.status, hash, appliedAt: new Date().toISOString() };
  }

  private reject(err: unknown): void {
    const message = errorMessage(err);
    this.status = { ...this.status, lastError: message, lastErrorAt: new Date().toISOString() };
    const issues = err instanceof ConfigValidationError ? err.issues : undefined;
    this.log.error({ issues, error: message }, 'configuration rejected, keeping the running configuration');
    this.emit(ReloadEventType.REJECTED, { error: message, issues });
  }
}
