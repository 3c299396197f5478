import { Client } from 'pg';
import { performance } from 'perf_hooks';
import { componentLogger } from '../../utils/logger';
import type { ConfigIssue, KindParams, ServiceSpec } from '../../config/types';
import {
  addError,
  isNonEmptyString,
  isValidPort,
  joinPath,
  numberParam,
  stringParam,
} from '../../utils/validation';
import type { Metadata } from '../monitoring/types';
import type { Prober, ProberDefinition, ProbeResult } from './types';

export interface PostgresProbeOptions {
  host: string;
  port: number;
  database?: string;
  user?: string;
  password?: string;
  connectionString?: string;
  query: string;
}

/** The subset of the pg client a probe uses. */
export interface PostgresProbeClient {
  connect(): Promise<unknown>;
  query(text: string): Promise<unknown>;
  end(): Promise<void>;
}

export type PostgresClientFactory = (options: PostgresProbeOptions) => PostgresProbeClient;

const log = componentLogger('probe:postgres');

const createPgClient: PostgresClientFactory = options => {
  const client = new Client(
    options.connectionString
      ? { connectionString: options.connectionString }
      : {
          host: options.host,
          port: options.port,
          database: options.database,
          user: options.user,
          password: options.password,
        },
  );
  client.on('error', err => log.debug({ err }, 'postgres client error'));
  return client;
};

export class PostgresProber implements Prober {
  readonly kind = 'postgres';

  constructor(
    private readonly options: PostgresProbeOptions,
    private readonly createClient: PostgresClientFactory = createPgClient,
  ) {}

  async probe(signal: AbortSignal): Promise<ProbeResult> {
    const client = this.createClient(this.options);
    let ended = false;
    const close = async (): Promise<void> => {
      if (ended) return;
      ended = true;
      await client.end();
    };
    const onAbort = (): void => {
      close().catch(err => log.debug({ err }, 'failed to close aborted connection'));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    const startTime = performance.now();
    const metadata: Metadata = { host: this.options.host, port: this.options.port };
    if (this.options.database) metadata.database = this.options.database;

    try {
      await client.connect();
      signal.throwIfAborted();
      await client.query(this.options.query);
      return { status: 'UP', latencyMs: performance.now() - startTime, metadata };
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
      await close().catch(err => log.debug({ err }, 'failed to close connection'));
    }
  }
}

function validatePostgresParams(params: KindParams, path: string): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  if (params.connection_string !== undefined) {
    if (!isNonEmptyString(params.connection_string)) {
      addError(issues, joinPath(path, 'connection_string'), 'connection_string must be a non-empty string');
    }
  } else if (!isNonEmptyString(params.host)) {
    addError(issues, joinPath(path, 'host'), 'host or connection_string is required');
  }

  if (params.port !== undefined && !isValidPort(params.port)) {
    addError(issues, joinPath(path, 'port'), 'port must be an integer between 1 and 65535');
  }
  for (const key of ['database', 'user', 'password', 'query']) {
    if (params[key] !== undefined && typeof params[key] !== 'string') {
      addError(issues, joinPath(path, key), `${key} must be a string`);
    }
  }
  return issues;
}

export function parsePostgresOptions(params: KindParams): PostgresProbeOptions {
  return {
    host: stringParam(params, 'host', 'localhost'),
    port: numberParam(params, 'port', 5432),
    database: stringParam(params, 'database'),
    user: stringParam(params, 'user'),
    password: stringParam(params, 'password'),
    connectionString: stringParam(params, 'connection_string'),
    query: stringParam(params, 'query', 'SELECT 1'),
  };
}

export const postgresProber: ProberDefinition = {
  kind: 'postgres',
  validate: validatePostgresParams,
  create: (spec: ServiceSpec) => new PostgresProber(parsePostgresOptions(spec.params)),
};
