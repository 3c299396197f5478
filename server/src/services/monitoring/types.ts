export type HealthFlag = 'UP' | 'DOWN' | 'DEGRADED';

export const HEALTH_FLAGS: readonly HealthFlag[] = ['UP', 'DOWN', 'DEGRADED'];

export function isHealthFlag(value: unknown): value is HealthFlag {
  return typeof value === 'string' && (HEALTH_FLAGS as readonly string[]).includes(value);
}

export type Metadata = Record<string, unknown>;

/**
 * Result of one probe invocation. Immutable once produced.
 */
export interface CheckOutcome {
  service: string;
  kind: string;
  status: HealthFlag;
  latencyMs: number;
  error?: string;
  metadata: Metadata;
  timestamp: string;
}

/**
 * Running per-service counters. They start over when the service's state
 * is cleared.
 */
export interface CheckStats {
  totalChecks: number;
  upChecks: number;
  degradedChecks: number;
  downChecks: number;
  /** Sum over every counted check; divide by `totalChecks` for the mean. */
  totalLatencyMs: number;
  transitions: number;
}

export function emptyCheckStats(): CheckStats {
  return { totalChecks: 0, upChecks: 0, degradedChecks: 0, downChecks: 0, totalLatencyMs: 0, transitions: 0 };
}

export interface ServiceState {
  service: string;
  kind: string;
  /** null until the first outcome is recorded */
  status: HealthFlag | null;
  lastTransitionAt: string | null;
  lastOutcome: CheckOutcome | null;
  consecutiveFailures: number;
  stats: CheckStats;
}

export interface StateTransition {
  id: string;
  service: string;
  kind: string;
  oldState: HealthFlag | null;
  newState: HealthFlag;
  timestamp: string;
  latencyMs: number;
  error?: string;
  metadata: Metadata;
}

export enum SchedulerEventType {
  OUTCOME = 'outcome',
  TRANSITION = 'transition',
  TICK_SKIPPED = 'tick:skipped',
  TICK_DEFERRED = 'tick:deferred',
  SERVICE_SCHEDULED = 'service:scheduled',
  SERVICE_UNSCHEDULED = 'service:unscheduled',
  SERVICE_RESCHEDULED = 'service:rescheduled',
}

export interface TickSkippedEvent {
  service: string;
  reason: 'probe-in-flight';
}

export interface TickDeferredEvent {
  service: string;
  inFlight: number;
  limit: number;
}

export interface ScheduledServiceInfo {
  name: string;
  kind: string;
  intervalMs: number;
  timeoutMs: number;
  probing: boolean;
  deferred: boolean;
  lastProbeStartedAt: string | null;
}
