import { randomUUID } from 'crypto';
import type { IncomingMessage } from 'http';
import pinoHttp from 'pino-http';
import type { Logger } from 'pino';

const REDACTED_HEADERS: ReadonlySet<string> = new Set([
  'authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
]);

const HEALTH_PATH = '/api/health';

export interface RequestLoggerOptions {
  logger: Logger;
  quietHealthCheck?: boolean;
}

export function createRequestLogger(options: RequestLoggerOptions) {
  const { logger, quietHealthCheck = true } = options;

  return pinoHttp({
    logger,

    genReqId: (req, res) => {
      const incoming = req.headers['x-request-id'];
      const id = typeof incoming === 'string' && incoming.trim() ? incoming.trim() : randomUUID();
      res.setHeader('x-request-id', id);
      return id;
    },

    autoLogging: {
      ignore: quietHealthCheck ? (req) => isHealthCheck(req) : undefined,
    },

    customLogLevel: (_req, res, err) => {
      if (err || res.statusCode >= 500) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },

    serializers: {
      req: (req) => ({
        id: req.id,
        method: req.method,
        url: req.url,
        headers: redactHeaders(req.headers),
      }),
      res: (res) => ({
        statusCode: res.statusCode,
      }),
    },
  });
}

function isHealthCheck(req: IncomingMessage): boolean {
  const url = req.url ?? '';
  return url === HEALTH_PATH || url.startsWith(`${HEALTH_PATH}?`);
}

function redactHeaders(
  headers: Record<string, string | string[] | undefined>
): Record<string, string | string[] | undefined> {
  const redacted: Record<string, string | string[] | undefined> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (REDACTED_HEADERS.has(key.toLowerCase())) {
      redacted[key] = '[REDACTED]';
    } else if (value !== undefined) {
      redacted[key] = value;
    }
  }
  return redacted;
}

export { redactHeaders };
