import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import { parse } from 'yaml';
import type { Logger } from 'pino';
import { componentLogger } from '../utils/logger';
import { ConfigValidationError, errorMessage } from '../utils/errors';
import { validateConfig, type ValidatorRegistries } from './ConfigValidator';
import type { MonitorConfig } from './types';

export function hashContent(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

export async function readConfigSource(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigValidationError(
      [{ severity: 'error', path: '', message: `Cannot read configuration file: ${errorMessage(err)}` }],
      path,
    );
  }
}

/**
 * Parse YAML (or JSON, which YAML accepts) into a validated config.
 * Throws `ConfigValidationError` with every error-level issue.
 */
export function parseConfig(
  text: string,
  registries: ValidatorRegistries,
  source = 'configuration',
  logger: Logger = componentLogger('config'),
): MonitorConfig {
  let data: unknown;
  try {
    data = parse(text);
  } catch (err) {
    throw new ConfigValidationError(
      [{ severity: 'error', path: '', message: `Cannot parse configuration: ${errorMessage(err)}` }],
      source,
    );
  }

  const result = validateConfig(data, registries, hashContent(text));
  for (const warning of result.warnings) {
    logger.warn({ source, path: warning.path }, warning.message);
  }
  if (!result.valid || result.config === null) {
    throw new ConfigValidationError(result.errors, source);
  }
  return result.config;
}

export async function loadConfigFile(
  path: string,
  registries: ValidatorRegistries,
  logger?: Logger,
): Promise<MonitorConfig> {
  const text = await readConfigSource(path);
  return parseConfig(text, registries, path, logger);
}
