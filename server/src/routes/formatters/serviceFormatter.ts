import type { ServiceSpec } from '../../config/types';
import {
  emptyCheckStats,
  type CheckOutcome,
  type CheckStats,
  type ScheduledServiceInfo,
  type ServiceState,
} from '../../services/monitoring/types';
import type { FormattedCheck, FormattedCheckStats, FormattedServiceDetail, FormattedServiceStatus } from './types';

export function formatCheck(outcome: CheckOutcome): FormattedCheck {
  return {
    status: outcome.status,
    latencyMs: outcome.latencyMs,
    error: outcome.error ?? null,
    metadata: outcome.metadata,
    timestamp: outcome.timestamp,
  };
}

const round = (value: number, digits: number): number => Number(value.toFixed(digits));

export function formatCheckStats(stats: CheckStats): FormattedCheckStats {
  const { totalChecks } = stats;
  return {
    totalChecks,
    upChecks: stats.upChecks,
    degradedChecks: stats.degradedChecks,
    downChecks: stats.downChecks,
    healthRate: totalChecks > 0 ? round(stats.upChecks / totalChecks, 4) : 0,
    averageLatencyMs: totalChecks > 0 ? round(stats.totalLatencyMs / totalChecks, 2) : 0,
    transitions: stats.transitions,
  };
}

/**
 * Merge a configured service with its tracked state and schedule.
 */
export function formatServiceStatus(
  spec: ServiceSpec,
  state: ServiceState | undefined,
  scheduled: ScheduledServiceInfo | undefined,
): FormattedServiceStatus {
  return {
    name: spec.name,
    kind: spec.kind,
    intervalMs: spec.intervalMs,
    timeoutMs: spec.timeoutMs,
    status: state?.status ?? 'UNKNOWN',
    lastTransitionAt: state?.lastTransitionAt ?? null,
    consecutiveFailures: state?.consecutiveFailures ?? 0,
    lastCheck: state?.lastOutcome ? formatCheck(state.lastOutcome) : null,
    probing: scheduled?.probing ?? false,
    deferred: scheduled?.deferred ?? false,
  };
}

export function formatServiceDetail(
  spec: ServiceSpec,
  state: ServiceState | undefined,
  scheduled: ScheduledServiceInfo | undefined,
): FormattedServiceDetail {
  return {
    ...formatServiceStatus(spec, state, scheduled),
    params: { ...spec.params },
    lastProbeStartedAt: scheduled?.lastProbeStartedAt ?? null,
    stats: formatCheckStats(state?.stats ?? emptyCheckStats()),
  };
}
