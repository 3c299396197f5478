import type { RetryPolicy } from '../../config/types';
import type { HealthFlag, Metadata } from '../../services/monitoring/types';

export interface FormattedCheck {
  status: HealthFlag;
  latencyMs: number;
  error: string | null;
  metadata: Metadata;
  timestamp: string;
}

export interface FormattedServiceStatus {
  name: string;
  kind: string;
  intervalMs: number;
  timeoutMs: number;
  /** `UNKNOWN` until the first probe completes. */
  status: HealthFlag | 'UNKNOWN';
  lastTransitionAt: string | null;
  consecutiveFailures: number;
  lastCheck: FormattedCheck | null;
  probing: boolean;
  deferred: boolean;
}

export interface FormattedCheckStats {
  totalChecks: number;
  upChecks: number;
  degradedChecks: number;
  downChecks: number;
  /** Share of UP checks, 0..1; 0 before the first check. */
  healthRate: number;
  averageLatencyMs: number;
  transitions: number;
}

export interface FormattedServiceDetail extends FormattedServiceStatus {
  params: Record<string, unknown>;
  lastProbeStartedAt: string | null;
  stats: FormattedCheckStats;
}

export interface FormattedNotifier {
  name: string;
  kind: string;
  maxConcurrent: number | null;
  retry: RetryPolicy;
}

export interface FormattedReloadChanges {
  servicesAdded: string[];
  servicesRemoved: string[];
  servicesUpdated: string[];
  servicesReset: string[];
  notifiersAdded: string[];
  notifiersRemoved: string[];
  notifiersReplaced: string[];
  globalChanged: string[];
}
