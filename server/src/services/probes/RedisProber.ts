import Redis from 'ioredis';
import { performance } from 'perf_hooks';
import { componentLogger } from '../../utils/logger';
import type { ConfigIssue, KindParams, ServiceSpec } from '../../config/types';
import {
  addError,
  isNonEmptyString,
  isNumber,
  isValidPort,
  joinPath,
  numberParam,
  stringParam,
} from '../../utils/validation';
import type { Metadata } from '../monitoring/types';
import type { Prober, ProberDefinition, ProbeResult } from './types';

export interface RedisProbeOptions {
  host: string;
  port: number;
  password?: string;
  database: number;
  degradedLatencyMs?: number;
}

/** The subset of the ioredis client a probe uses. */
export interface RedisProbeClient {
  connect(): Promise<void>;
  ping(): Promise<string>;
  disconnect(): void;
}

export type RedisClientFactory = (options: RedisProbeOptions) => RedisProbeClient;

const log = componentLogger('probe:redis');

const createIoredisClient: RedisClientFactory = options => {
  const client = new Redis({
    host: options.host,
    port: options.port,
    password: options.password,
    db: options.database,
    lazyConnect: true,
    maxRetriesPerRequest: 0,
    enableOfflineQueue: false,
    retryStrategy: () => null,
  });
  client.on('error', err => log.debug({ err }, 'redis client error'));
  return client;
};

/**
 * Connects, sends PING and disconnects. A fresh connection per probe keeps
 * a wedged socket from masking an outage.
 */
export class RedisProber implements Prober {
  readonly kind = 'redis';

  constructor(
    private readonly options: RedisProbeOptions,
    private readonly createClient: RedisClientFactory = createIoredisClient,
  ) {}

  async probe(signal: AbortSignal): Promise<ProbeResult> {
    const client = this.createClient(this.options);
    const onAbort = (): void => client.disconnect();
    signal.addEventListener('abort', onAbort, { once: true });
    const startTime = performance.now();
    const metadata: Metadata = { host: this.options.host, port: this.options.port, database: this.options.database };

    try {
      await client.connect();
      signal.throwIfAborted();
      const reply = await client.ping();
      const latencyMs = performance.now() - startTime;

      if (reply !== 'PONG') {
        return { status: 'DOWN', latencyMs, error: `Unexpected PING reply "${reply}"`, metadata };
      }
      const { degradedLatencyMs } = this.options;
      if (degradedLatencyMs !== undefined && latencyMs > degradedLatencyMs) {
        return {
          status: 'DEGRADED',
          latencyMs,
          error: `PING took ${Math.round(latencyMs)}ms (threshold ${degradedLatencyMs}ms)`,
          metadata,
        };
      }
      return { status: 'UP', latencyMs, metadata };
    } catch (err) {
      if (signal.aborted) throw err;
      return {
        status: 'DOWN',
        latencyMs: performance.now() - startTime,
        error: err instanceof Error ? err.message : String(err),
        metadata,
      };
    } finally {
      signal.removeEventListener('abort', onAbort);
      client.disconnect();
    }
  }
}

function validateRedisParams(params: KindParams, path: string): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  if (params.host !== undefined && !isNonEmptyString(params.host)) {
    addError(issues, joinPath(path, 'host'), 'host must be a non-empty string');
  }
  if (params.port !== undefined && !isValidPort(params.port)) {
    addError(issues, joinPath(path, 'port'), 'port must be an integer between 1 and 65535');
  }
  if (params.password !== undefined && typeof params.password !== 'string') {
    addError(issues, joinPath(path, 'password'), 'password must be a string');
  }
  const database = params.database;
  if (database !== undefined && !(isNumber(database) && Number.isInteger(database) && database >= 0 && database <= 15)) {
    addError(issues, joinPath(path, 'database'), 'database must be an integer between 0 and 15');
  }
  const degraded = params.degraded_latency_ms;
  if (degraded !== undefined && !(isNumber(degraded) && degraded > 0)) {
    addError(issues, joinPath(path, 'degraded_latency_ms'), 'degraded_latency_ms must be a positive number');
  }
  return issues;
}

export function parseRedisOptions(params: KindParams): RedisProbeOptions {
  return {
    host: stringParam(params, 'host', 'localhost'),
    port: numberParam(params, 'port', 6379),
    password: stringParam(params, 'password'),
    database: numberParam(params, 'database', 0),
    degradedLatencyMs: numberParam(params, 'degraded_latency_ms'),
  };
}

export const redisProber: ProberDefinition = {
  kind: 'redis',
  validate: validateRedisParams,
  create: (spec: ServiceSpec) => new RedisProber(parseRedisOptions(spec.params)),
};
