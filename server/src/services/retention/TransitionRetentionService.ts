import type { Logger } from 'pino';
import type { ITransitionStore } from '../../stores/interfaces';
import { componentLogger } from '../../utils/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface TransitionRetentionOptions {
  store: Pick<ITransitionStore, 'deleteOlderThan'>;
  retentionDays: number;
  /** How often to prune. Defaults to hourly. */
  checkIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

export interface CleanupResult {
  deleted: number;
  retentionDays: number;
  cutoffTimestamp: string;
}

/**
 * Prunes persisted transitions older than the retention period. Runs once
 * at start and then on a fixed interval that does not keep the process
 * alive.
 */
export class TransitionRetentionService {
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private readonly store: Pick<ITransitionStore, 'deleteOlderThan'>;
  private readonly retentionDays: number;
  private readonly checkIntervalMs: number;
  private readonly log: Logger;
  private readonly now: () => number;

  static readonly DEFAULT_CHECK_INTERVAL_MS = 60 * 60 * 1000;

  constructor(options: TransitionRetentionOptions) {
    this.store = options.store;
    this.retentionDays = options.retentionDays;
    this.checkIntervalMs = options.checkIntervalMs ?? TransitionRetentionService.DEFAULT_CHECK_INTERVAL_MS;
    this.log = options.logger ?? componentLogger('retention');
    this.now = options.now ?? (() => Date.now());
  }

  start(): void {
    if (this.intervalHandle) return;

    this.log.info({ retentionDays: this.retentionDays }, 'transition retention started');
    this.runSafely();
    this.intervalHandle = setInterval(() => this.runSafely(), this.checkIntervalMs);
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
  }

  get isSchedulerActive(): boolean {
    return this.intervalHandle !== null;
  }

  runCleanup(): CleanupResult {
    const cutoffTimestamp = new Date(this.now() - this.retentionDays * DAY_MS).toISOString();
    const deleted = this.store.deleteOlderThan(cutoffTimestamp);
    const result: CleanupResult = { deleted, retentionDays: this.retentionDays, cutoffTimestamp };
    if (deleted > 0) {
      this.log.info(result, 'pruned old transitions');
    }
    return result;
  }

  private runSafely(): void {
    try {
      this.runCleanup();
    } catch (err) {
      this.log.error({ err }, 'transition retention cleanup failed');
    }
  }
}
