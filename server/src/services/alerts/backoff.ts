import type { RetryPolicy } from '../../config/types';

export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

const DEFAULT_CONFIG: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  multiplier: 2,
};

export class ExponentialBackoff {
  private attempt = 0;
  private config: BackoffConfig;

  constructor(config: Partial<BackoffConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getNextDelay(): number {
    const delay = Math.min(
      this.config.baseDelayMs * Math.pow(this.config.multiplier, this.attempt),
      this.config.maxDelayMs
    );
    this.attempt++;
    return delay;
  }

  reset(): void {
    this.attempt = 0;
  }

  getAttemptCount(): number {
    return this.attempt;
  }
}

export type RetryPhase = 'ready' | 'waiting' | 'succeeded' | 'exhausted' | 'cancelled';

/**
 * Attempt bookkeeping for one delivery. The caller drives the loop:
 * `begin` before each attempt, then `succeed` or `fail`; `fail` returns
 * the delay to wait before the next attempt, or null once attempts are
 * used up.
 */
export class RetryState {
  private phase: RetryPhase = 'ready';
  private attemptsMade = 0;
  private lastError: string | undefined;
  private readonly backoff: ExponentialBackoff;
  private readonly maxAttempts: number;
  private readonly maxDelayMs: number;

  constructor(policy: Pick<RetryPolicy, 'maxAttempts' | 'initialDelayMs' | 'backoffMultiplier' | 'maxDelayMs'>) {
    this.maxAttempts = Math.max(1, policy.maxAttempts);
    this.maxDelayMs = policy.maxDelayMs;
    this.backoff = new ExponentialBackoff({
      baseDelayMs: policy.initialDelayMs,
      multiplier: policy.backoffMultiplier,
      maxDelayMs: policy.maxDelayMs,
    });
  }

  /** Start the next attempt. Returns its 1-based number. */
  begin(): number {
    if (this.phase !== 'ready' && this.phase !== 'waiting') {
      throw new Error(`Cannot start an attempt in phase "${this.phase}"`);
    }
    this.phase = 'ready';
    this.attemptsMade++;
    return this.attemptsMade;
  }

  succeed(): void {
    this.phase = 'succeeded';
    this.lastError = undefined;
  }

  /**
   * Record a failed attempt. `retryAfterMs` from the channel raises the
   * delay but never past the policy's ceiling.
   */
  fail(error: string, retryAfterMs?: number): number | null {
    this.lastError = error;
    if (this.attemptsMade >= this.maxAttempts) {
      this.phase = 'exhausted';
      return null;
    }
    this.phase = 'waiting';
    const delay = this.backoff.getNextDelay();
    return retryAfterMs === undefined ? delay : Math.min(Math.max(delay, retryAfterMs), this.maxDelayMs);
  }

  cancel(reason: string): void {
    this.phase = 'cancelled';
    this.lastError = reason;
  }

  get state(): RetryPhase {
    return this.phase;
  }

  get attempts(): number {
    return this.attemptsMade;
  }

  get error(): string | undefined {
    return this.lastError;
  }

  get finished(): boolean {
    return this.phase === 'succeeded' || this.phase === 'exhausted' || this.phase === 'cancelled';
  }
}
