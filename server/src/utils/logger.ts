import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set([
  'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent',
]);

/** Probe and notifier params may carry credentials; never log them in clear. */
const REDACTED_PATHS = [
  'params.password',
  'params.headers.authorization',
  'params.headers.Authorization',
  'spec.params.password',
];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.has(value);
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  if (!envValue) return 'info';
  const normalized = envValue.toLowerCase().trim();
  if (isLogLevel(normalized)) return normalized;
  return 'info';
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const env = process.env.NODE_ENV;
  const isTest = env === 'test';
  const level = options.level
    ?? (isTest && !process.env.LOG_LEVEL ? 'silent' : parseLogLevel(process.env.LOG_LEVEL));
  const pretty = options.pretty ?? (env !== 'production' && !isTest);

  const transport = pretty
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' } }
    : undefined;

  return pino({
    name: 'healthwatch',
    level,
    transport,
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
  });
}

const logger = createLogger();

/**
 * Child logger tagged with the component emitting the line.
 */
export function componentLogger(component: string, parent: pino.Logger = logger): pino.Logger {
  return parent.child({ component });
}

export default logger;
