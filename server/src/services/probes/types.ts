import type { KindDefinition, KindRegistry } from '../../utils/KindRegistry';
import type { ServiceSpec } from '../../config/types';
import type { HealthFlag, Metadata } from '../monitoring/types';

export interface ProbeResult {
  status: HealthFlag;
  /** Measured by the prober when it knows better than wall-clock around the call. */
  latencyMs?: number;
  error?: string;
  metadata?: Metadata;
}

/**
 * One health check bound to a service's parameters. Implementations must
 * stop work when `signal` aborts.
 */
export interface Prober {
  readonly kind: string;
  probe(signal: AbortSignal): Promise<ProbeResult>;
}

export type ProberDefinition = KindDefinition<ServiceSpec, Prober>;

export type ProberRegistry = KindRegistry<ServiceSpec, Prober>;
