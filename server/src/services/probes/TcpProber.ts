import net from 'net';
import { performance } from 'perf_hooks';
import type { ConfigIssue, KindParams, ServiceSpec } from '../../config/types';
import { addError, isNonEmptyString, isValidPort, joinPath, numberParam, stringParam } from '../../utils/validation';
import type { Prober, ProberDefinition, ProbeResult } from './types';

export interface TcpProbeOptions {
  host: string;
  port: number;
}

/**
 * Opens a TCP connection and closes it as soon as the handshake completes.
 */
export class TcpProber implements Prober {
  readonly kind = 'tcp';

  constructor(private readonly options: TcpProbeOptions) {}

  probe(signal: AbortSignal): Promise<ProbeResult> {
    const { host, port } = this.options;
    const startTime = performance.now();

    return new Promise<ProbeResult>((resolve, reject) => {
      const socket = net.connect({ host, port });

      const onAbort = (): void => {
        socket.destroy();
        reject(signal.reason);
      };

      const done = (result: ProbeResult): void => {
        signal.removeEventListener('abort', onAbort);
        socket.destroy();
        resolve(result);
      };

      socket.once('connect', () => {
        done({
          status: 'UP',
          latencyMs: performance.now() - startTime,
          metadata: { host, port },
        });
      });

      socket.once('error', err => {
        done({
          status: 'DOWN',
          latencyMs: performance.now() - startTime,
          error: err.message,
          metadata: { host, port },
        });
      });

      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}

function validateTcpParams(params: KindParams, path: string): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  if (!isNonEmptyString(params.host)) {
    addError(issues, joinPath(path, 'host'), 'host is required');
  }
  if (!isValidPort(params.port)) {
    addError(issues, joinPath(path, 'port'), 'port must be an integer between 1 and 65535');
  }
  return issues;
}

export const tcpProber: ProberDefinition = {
  kind: 'tcp',
  validate: validateTcpParams,
  create: (spec: ServiceSpec) =>
    new TcpProber({
      host: stringParam(spec.params, 'host', 'localhost'),
      port: numberParam(spec.params, 'port', 0),
    }),
};
