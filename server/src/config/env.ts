import path from 'path';
import { parseLogLevel, type LogLevel } from '../utils/logger';
import { DEFAULT_POLL_INTERVAL_MS } from './ConfigWatcher';

export const DEFAULT_CONFIG_PATH = 'config/healthwatch.yaml';
export const DEFAULT_PORT = 3001;
export const DEFAULT_RETENTION_DAYS = 30;

/**
 * Process settings read from the environment (after dotenv has loaded `.env`).
 */
export interface EnvConfig {
  configPath: string;
  /** 0 disables the status API. */
  port: number;
  /** Unset disables the SQLite snapshot. */
  stateDbPath: string | null;
  /** 0 disables file polling; SIGHUP still reloads. */
  reloadPollMs: number;
  /** Persisted transitions older than this are pruned; 0 keeps them all. */
  transitionRetentionDays: number;
  logLevel: LogLevel;
}

/**
 * Parse a non-negative integer variable.
 *
 * - undefined / "" → fallback
 * - anything that is not a whole number ≥ 0 → fallback
 */
export function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const num = Number(value);
  if (!Number.isInteger(num) || num < 0) return fallback;
  return num;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const stateDbPath = env.STATE_DB_PATH?.trim();
  return {
    configPath: path.resolve(env.CONFIG_PATH?.trim() || DEFAULT_CONFIG_PATH),
    port: parseNonNegativeInt(env.PORT, DEFAULT_PORT),
    stateDbPath: stateDbPath ? stateDbPath : null,
    reloadPollMs: parseNonNegativeInt(env.RELOAD_POLL_MS, DEFAULT_POLL_INTERVAL_MS),
    transitionRetentionDays: parseNonNegativeInt(env.TRANSITION_RETENTION_DAYS, DEFAULT_RETENTION_DAYS),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
