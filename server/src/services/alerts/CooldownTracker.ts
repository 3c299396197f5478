/**
 * Remembers when each (service, state) pair last produced an alert so a
 * service bouncing between two states does not page on every bounce.
 */
export class CooldownTracker {
  /** `service:state` -> last alert time (ms since epoch) */
  private lastAlertTimes: Map<string, number> = new Map();

  constructor(private readonly now: () => number = () => Date.now()) {}

  isSuppressed(service: string, state: string, cooldownMs: number): boolean {
    if (cooldownMs <= 0) return false;

    const lastTime = this.lastAlertTimes.get(CooldownTracker.key(service, state));
    if (lastTime === undefined) return false;

    return (this.now() - lastTime) < cooldownMs;
  }

  record(service: string, state: string): void {
    this.lastAlertTimes.set(CooldownTracker.key(service, state), this.now());
  }

  /** Drop entries older than `cooldownMs`. */
  prune(cooldownMs: number): void {
    const cutoff = this.now() - Math.max(cooldownMs, 0);
    for (const [key, time] of this.lastAlertTimes) {
      if (time <= cutoff) this.lastAlertTimes.delete(key);
    }
  }

  clear(): void {
    this.lastAlertTimes.clear();
  }

  get size(): number {
    return this.lastAlertTimes.size;
  }

  private static key(service: string, state: string): string {
    return `${service}:${state}`;
  }
}
