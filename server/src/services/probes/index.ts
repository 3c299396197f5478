import { KindRegistry } from '../../utils/KindRegistry';
import type { ServiceSpec } from '../../config/types';
import { httpProber } from './HttpProber';
import { tcpProber } from './TcpProber';
import { redisProber } from './RedisProber';
import { postgresProber } from './PostgresProber';
import type { Prober, ProberDefinition, ProberRegistry } from './types';

export const BUILTIN_PROBERS: readonly ProberDefinition[] = [httpProber, tcpProber, redisProber, postgresProber];

export function createProberRegistry(extra: ProberDefinition[] = []): ProberRegistry {
  return new KindRegistry<ServiceSpec, Prober>('probe', [...BUILTIN_PROBERS, ...extra]);
}

export { HttpProber, parseHttpOptions } from './HttpProber';
export { TcpProber } from './TcpProber';
export { RedisProber, parseRedisOptions } from './RedisProber';
export { PostgresProber, parsePostgresOptions } from './PostgresProber';
export type { Prober, ProberDefinition, ProberRegistry, ProbeResult } from './types';
