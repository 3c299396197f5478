import { readFile } from 'fs/promises';
import type { Logger } from 'pino';
import { componentLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { hashContent } from './ConfigLoader';
import type { HotReloader } from './HotReloader';

export const DEFAULT_POLL_INTERVAL_MS = 5_000;

export interface ConfigWatcherOptions {
  path: string;
  reloader: Pick<HotReloader, 'reload' | 'getCurrentConfig'>;
  pollIntervalMs?: number;
  logger?: Logger;
}

/**
 * Polls the configuration file and hands changed content to the reloader.
 * A rejected version is not retried until the file changes again.
 */
export class ConfigWatcher {
  private timer: NodeJS.Timeout | null = null;
  private lastSeenHash: string | null = null;
  private checking: Promise<void> | null = null;
  private readonly path: string;
  private readonly reloader: Pick<HotReloader, 'reload' | 'getCurrentConfig'>;
  private readonly pollIntervalMs: number;
  private readonly log: Logger;

  constructor(options: ConfigWatcherOptions) {
    this.path = options.path;
    this.reloader = options.reloader;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.log = options.logger ?? componentLogger('config-watcher');
  }

  start(): void {
    if (this.timer) return;
    this.lastSeenHash = this.reloader.getCurrentConfig().hash || null;
    this.timer = setInterval(() => {
      void this.check();
    }, this.pollIntervalMs);
    this.timer.unref();
    this.log.info({ path: this.path, pollIntervalMs: this.pollIntervalMs }, 'watching configuration file');
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.checking) await this.checking;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Compare the file's hash with the last one seen and reload on change.
   * Never throws; failures are logged.
   */
  check(): Promise<void> {
    if (!this.checking) {
      this.checking = this.poll().finally(() => {
        this.checking = null;
      });
    }
    return this.checking;
  }

  private async poll(): Promise<void> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      this.log.warn({ path: this.path, error: errorMessage(err) }, 'cannot read configuration file');
      return;
    }

    const hash = hashContent(text);
    if (hash === this.lastSeenHash) return;
    this.lastSeenHash = hash;

    this.log.info({ path: this.path, hash }, 'configuration file changed, reloading');
    try {
      await this.reloader.reload(text);
    } catch (err) {
      // The reloader has logged the rejection with its issues.
      this.log.debug({ path: this.path, error: errorMessage(err) }, 'reload triggered by file change failed');
    }
  }
}
