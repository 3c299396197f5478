import type { ConfigIssue, KindParams } from '../config/types';
import { ValidationError } from './errors';

// ============================================================================
// Type guards
// ============================================================================

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isPositiveInteger(value: unknown): value is number {
  return isNumber(value) && Number.isInteger(value) && value > 0;
}

export function isStringRecord(value: unknown): value is Record<string, string> {
  return isPlainObject(value) && Object.values(value).every(v => typeof v === 'string');
}

/**
 * Check if a string is a valid HTTP or HTTPS URL
 */
export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function isValidPort(value: unknown): value is number {
  return isPositiveInteger(value) && value <= 65535;
}

// ============================================================================
// Issue collection
// ============================================================================

export function addError(issues: ConfigIssue[], path: string, message: string): void {
  issues.push({ severity: 'error', path, message });
}

export function addWarning(issues: ConfigIssue[], path: string, message: string): void {
  issues.push({ severity: 'warning', path, message });
}

export function warnUnknownKeys(
  obj: Record<string, unknown>,
  known: ReadonlySet<string>,
  basePath: string,
  issues: ConfigIssue[],
): void {
  for (const key of Object.keys(obj)) {
    if (!known.has(key)) {
      addWarning(issues, joinPath(basePath, key), `Unknown field "${key}"`);
    }
  }
}

export function joinPath(basePath: string, key: string): string {
  return basePath ? `${basePath}.${key}` : key;
}

// ============================================================================
// Param readers (values are validated beforehand; readers only narrow)
// ============================================================================

export function stringParam(params: KindParams, key: string): string | undefined;
export function stringParam(params: KindParams, key: string, fallback: string): string;
export function stringParam(params: KindParams, key: string, fallback?: string): string | undefined {
  const value = params[key];
  return typeof value === 'string' ? value : fallback;
}

export function numberParam(params: KindParams, key: string): number | undefined;
export function numberParam(params: KindParams, key: string, fallback: number): number;
export function numberParam(params: KindParams, key: string, fallback?: number): number | undefined {
  const value = params[key];
  return isNumber(value) ? value : fallback;
}

export function booleanParam(params: KindParams, key: string, fallback: boolean): boolean {
  const value = params[key];
  return typeof value === 'boolean' ? value : fallback;
}

export function headersParam(params: KindParams, key = 'headers'): Record<string, string> {
  const value = params[key];
  return isStringRecord(value) ? { ...value } : {};
}

// ============================================================================
// Query parameters
// ============================================================================

export const DEFAULT_QUERY_LIMIT = 50;
export const MAX_QUERY_LIMIT = 1000;

/**
 * Parse a `limit` query parameter. Absent means `fallback`; anything other
 * than an integer in [1, MAX_QUERY_LIMIT] is rejected.
 */
export function parseLimitParam(value: unknown, fallback = DEFAULT_QUERY_LIMIT): number {
  if (value === undefined || value === '') return fallback;
  const num = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(num) || num < 1 || num > MAX_QUERY_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_QUERY_LIMIT}`, 'limit');
  }
  return num;
}
