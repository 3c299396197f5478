import { performance } from 'perf_hooks';
import type { ConfigIssue, KindParams, ServiceSpec } from '../../config/types';
import {
  addError,
  headersParam,
  isNonEmptyString,
  isNumber,
  isPlainObject,
  isStringRecord,
  isValidUrl,
  joinPath,
  numberParam,
  stringParam,
} from '../../utils/validation';
import { describeFetchError } from '../../utils/http';
import type { Metadata } from '../monitoring/types';
import type { Prober, ProberDefinition, ProbeResult } from './types';

const METHODS = new Set(['GET', 'HEAD', 'POST', 'PUT', 'OPTIONS']);
const USER_AGENT = 'healthwatch/1.0';

export interface HttpProbeOptions {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
  /** Accepted status codes; any 2xx when empty. */
  expectedStatus: number[];
  expectedContent: string[];
  /** Responses slower than this are DEGRADED rather than UP. */
  degradedLatencyMs?: number;
}

function readList<T>(value: unknown, guard: (item: unknown) => item is T): T[] {
  if (value === undefined) return [];
  if (Array.isArray(value)) return value.filter(guard);
  return guard(value) ? [value] : [];
}

const isStatusCode = (value: unknown): value is number =>
  isNumber(value) && Number.isInteger(value) && value >= 100 && value <= 599;

const isString = (value: unknown): value is string => typeof value === 'string';

export function parseHttpOptions(params: KindParams): HttpProbeOptions {
  const body = params.body;
  return {
    url: stringParam(params, 'url', ''),
    method: stringParam(params, 'method', 'GET').toUpperCase(),
    headers: headersParam(params),
    body: isString(body) ? body : isPlainObject(body) ? JSON.stringify(body) : undefined,
    expectedStatus: readList(params.expected_status, isStatusCode),
    expectedContent: readList(params.expected_content, isString),
    degradedLatencyMs: numberParam(params, 'degraded_latency_ms'),
  };
}

export class HttpProber implements Prober {
  readonly kind = 'http';

  constructor(private readonly options: HttpProbeOptions) {}

  async probe(signal: AbortSignal): Promise<ProbeResult> {
    const { url, method, headers, body, degradedLatencyMs } = this.options;
    const startTime = performance.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: { 'User-Agent': USER_AGENT, ...headers },
        body: method === 'GET' || method === 'HEAD' ? undefined : body,
        signal,
        redirect: 'follow',
      });
    } catch (err) {
      if (signal.aborted) throw err;
      return {
        status: 'DOWN',
        latencyMs: performance.now() - startTime,
        error: describeFetchError(err),
      };
    }

    const text = method === 'HEAD' ? '' : await response.text();
    const latencyMs = performance.now() - startTime;
    const metadata: Metadata = { status_code: response.status };

    if (!this.isStatusExpected(response.status)) {
      return {
        status: 'DOWN',
        latencyMs,
        error: `HTTP ${response.status}: ${response.statusText}`,
        metadata,
      };
    }

    const missing = this.options.expectedContent.find(expected => !text.includes(expected));
    if (missing !== undefined) {
      metadata.missing_content = missing;
      return {
        status: 'DOWN',
        latencyMs,
        error: `Response does not contain "${missing}"`,
        metadata,
      };
    }

    if (degradedLatencyMs !== undefined && latencyMs > degradedLatencyMs) {
      return {
        status: 'DEGRADED',
        latencyMs,
        error: `Response took ${Math.round(latencyMs)}ms (threshold ${degradedLatencyMs}ms)`,
        metadata,
      };
    }

    return { status: 'UP', latencyMs, metadata };
  }

  private isStatusExpected(status: number): boolean {
    const expected = this.options.expectedStatus;
    if (expected.length === 0) return status >= 200 && status < 300;
    return expected.includes(status);
  }
}

function validateHttpParams(params: KindParams, path: string): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  if (!isNonEmptyString(params.url)) {
    addError(issues, joinPath(path, 'url'), 'url is required');
  } else if (!isValidUrl(params.url)) {
    addError(issues, joinPath(path, 'url'), `url must be a valid HTTP or HTTPS URL, got "${params.url}"`);
  }

  if (params.method !== undefined) {
    if (typeof params.method !== 'string' || !METHODS.has(params.method.toUpperCase())) {
      addError(issues, joinPath(path, 'method'), `method must be one of ${[...METHODS].join(', ')}`);
    }
  }

  if (params.headers !== undefined && !isStringRecord(params.headers)) {
    addError(issues, joinPath(path, 'headers'), 'headers must map header names to strings');
  }

  if (params.body !== undefined && !isString(params.body) && !isPlainObject(params.body)) {
    addError(issues, joinPath(path, 'body'), 'body must be a string or an object');
  }

  const status = params.expected_status;
  if (status !== undefined) {
    const codes: unknown[] = Array.isArray(status) ? status : [status];
    if (codes.length === 0 || !codes.every(isStatusCode)) {
      addError(issues, joinPath(path, 'expected_status'), 'expected_status must be a status code (100-599) or a list of them');
    }
  }

  const content = params.expected_content;
  if (content !== undefined) {
    const entries: unknown[] = Array.isArray(content) ? content : [content];
    if (!entries.every(isString)) {
      addError(issues, joinPath(path, 'expected_content'), 'expected_content must be a string or a list of strings');
    }
  }

  const degraded = params.degraded_latency_ms;
  if (degraded !== undefined && !(isNumber(degraded) && degraded > 0)) {
    addError(issues, joinPath(path, 'degraded_latency_ms'), 'degraded_latency_ms must be a positive number');
  }

  return issues;
}

export const httpProber: ProberDefinition = {
  kind: 'http',
  validate: validateHttpParams,
  create: (spec: ServiceSpec) => new HttpProber(parseHttpOptions(spec.params)),
};
