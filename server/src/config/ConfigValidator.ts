import type { ProberRegistry } from '../services/probes/types';
import type { NotifierRegistry } from '../services/alerts/types';
import {
  addError,
  addWarning,
  isNonEmptyString,
  isNumber,
  isPlainObject,
  isPositiveInteger,
  joinPath,
  warnUnknownKeys,
} from '../utils/validation';
import {
  DEFAULT_BODY_TEMPLATE,
  DEFAULT_GLOBAL_SETTINGS,
  DEFAULT_RETRY_POLICY,
  type ConfigIssue,
  type ConfigValidationResult,
  type GlobalSettings,
  type KindParams,
  type MonitorConfig,
  type NotifierSpec,
  type RetryPolicy,
  type ServiceSpec,
} from './types';

// --- Constants ---

const NAME_REGEX = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;
const MAX_NAME_LENGTH = 128;
export const MIN_INTERVAL_MS = 100;
export const MAX_ATTEMPTS_LIMIT = 20;
/** Largest delay a Node.js timer accepts; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

const KNOWN_TOP_LEVEL_KEYS = new Set(['global', 'services', 'notifiers']);

const KNOWN_SERVICE_FIELDS = new Set(['kind', 'type', 'enabled', 'interval_ms', 'timeout_ms', 'params']);

const KNOWN_NOTIFIER_FIELDS = new Set(['kind', 'type', 'enabled', 'params', 'templates', 'retry', 'max_concurrent']);

const KNOWN_TEMPLATE_FIELDS = new Set(['subject', 'body']);

/** Config key, settings field, and whether zero is allowed. */
const GLOBAL_FIELDS: ReadonlyArray<[string, keyof GlobalSettings, boolean]> = [
  ['default_interval_ms', 'defaultIntervalMs', false],
  ['default_timeout_ms', 'defaultTimeoutMs', false],
  ['max_concurrent_probes', 'maxConcurrentProbes', false],
  ['history_size', 'historySize', false],
  ['failure_threshold', 'failureThreshold', false],
  ['alert_cooldown_ms', 'alertCooldownMs', true],
  ['shutdown_grace_ms', 'shutdownGraceMs', true],
  ['delivery_log_size', 'deliveryLogSize', false],
];

const RETRY_FIELDS: ReadonlyArray<[string, keyof RetryPolicy]> = [
  ['max_attempts', 'maxAttempts'],
  ['initial_delay_ms', 'initialDelayMs'],
  ['backoff_multiplier', 'backoffMultiplier'],
  ['max_delay_ms', 'maxDelayMs'],
  ['delivery_timeout_ms', 'deliveryTimeoutMs'],
];

export interface ValidatorRegistries {
  probers: ProberRegistry;
  notifiers: NotifierRegistry;
}

// --- Helpers ---

function isNonNegativeInteger(value: unknown): value is number {
  return isNumber(value) && Number.isInteger(value) && value >= 0;
}

function isMillisecondKey(key: string): boolean {
  return key.endsWith('_ms');
}

function checkTimerRange(value: number, key: string, path: string, issues: ConfigIssue[]): boolean {
  if (value <= MAX_TIMER_MS) return true;
  addError(issues, path, `${key} must be at most ${MAX_TIMER_MS}`);
  return false;
}

function validateName(name: string, path: string, issues: ConfigIssue[]): boolean {
  if (name.length > MAX_NAME_LENGTH) {
    addError(issues, path, `name must be at most ${MAX_NAME_LENGTH} characters`);
    return false;
  }
  if (!NAME_REGEX.test(name)) {
    addError(issues, path, 'name must start with a letter or digit and contain only letters, digits, ".", "_" or "-"');
    return false;
  }
  return true;
}

/**
 * Read the `kind` of an entry, accepting `type` as an alias.
 */
function readKind(entry: Record<string, unknown>, path: string, issues: ConfigIssue[]): string | null {
  const kind = entry.kind ?? entry.type;
  if (entry.kind !== undefined && entry.type !== undefined && entry.kind !== entry.type) {
    addError(issues, joinPath(path, 'kind'), 'kind and type are both set and disagree');
    return null;
  }
  if (!isNonEmptyString(kind)) {
    addError(issues, joinPath(path, 'kind'), 'kind is required and must be a non-empty string');
    return null;
  }
  return kind;
}

function readParams(entry: Record<string, unknown>, path: string, issues: ConfigIssue[]): KindParams | null {
  if (entry.params === undefined || entry.params === null) return {};
  if (!isPlainObject(entry.params)) {
    addError(issues, joinPath(path, 'params'), 'params must be an object');
    return null;
  }
  return entry.params;
}

function readEnabled(entry: Record<string, unknown>, path: string, issues: ConfigIssue[]): boolean {
  if (entry.enabled === undefined) return true;
  if (typeof entry.enabled !== 'boolean') {
    addError(issues, joinPath(path, 'enabled'), 'enabled must be a boolean');
    return true;
  }
  return entry.enabled;
}

// --- Level 1: Document structure ---

function validateStructure(data: unknown, issues: ConfigIssue[]): Record<string, unknown> | null {
  if (!isPlainObject(data)) {
    addError(issues, '', 'Configuration must be an object with global, services and notifiers sections');
    return null;
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_TOP_LEVEL_KEYS.has(key)) {
      addError(issues, key, `Unknown top-level key "${key}"`);
    }
  }

  for (const section of ['global', 'services', 'notifiers']) {
    const value = data[section];
    if (value !== undefined && value !== null && !isPlainObject(value)) {
      addError(issues, section, `${section} must be an object`);
    }
  }

  return data;
}

// --- Level 2: Global settings ---

function validateGlobal(raw: unknown, issues: ConfigIssue[]): GlobalSettings {
  const settings: GlobalSettings = { ...DEFAULT_GLOBAL_SETTINGS };
  if (!isPlainObject(raw)) return settings;

  warnUnknownKeys(raw, new Set(GLOBAL_FIELDS.map(([key]) => key)), 'global', issues);

  for (const [key, field, allowZero] of GLOBAL_FIELDS) {
    const value = raw[key];
    if (value === undefined) continue;
    const fieldPath = joinPath('global', key);
    if (!isNonNegativeInteger(value) || (!allowZero && value === 0)) {
      addError(issues, fieldPath, `${key} must be a ${allowZero ? 'non-negative' : 'positive'} integer`);
      continue;
    }
    if (isMillisecondKey(key) && !checkTimerRange(value, key, fieldPath, issues)) continue;
    settings[field] = value;
  }

  if (settings.defaultIntervalMs < MIN_INTERVAL_MS) {
    addError(issues, 'global.default_interval_ms', `default_interval_ms must be at least ${MIN_INTERVAL_MS}`);
  }

  return settings;
}

// --- Level 3: Services ---

function validateService(
  name: string,
  raw: unknown,
  global: GlobalSettings,
  probers: ProberRegistry,
  issues: ConfigIssue[],
): ServiceSpec | null {
  const path = joinPath('services', name);

  if (!isPlainObject(raw)) {
    addError(issues, path, 'Service entry must be an object');
    return null;
  }

  warnUnknownKeys(raw, KNOWN_SERVICE_FIELDS, path, issues);

  let valid = validateName(name, path, issues);
  const enabled = readEnabled(raw, path, issues);
  const kind = readKind(raw, path, issues);
  const params = readParams(raw, path, issues);

  const intervalMs = raw.interval_ms ?? global.defaultIntervalMs;
  if (!isPositiveInteger(intervalMs) || intervalMs < MIN_INTERVAL_MS) {
    addError(issues, joinPath(path, 'interval_ms'), `interval_ms must be an integer of at least ${MIN_INTERVAL_MS}`);
    valid = false;
  } else if (!checkTimerRange(intervalMs, 'interval_ms', joinPath(path, 'interval_ms'), issues)) {
    valid = false;
  }

  const timeoutMs = raw.timeout_ms ?? global.defaultTimeoutMs;
  if (!isPositiveInteger(timeoutMs)) {
    addError(issues, joinPath(path, 'timeout_ms'), 'timeout_ms must be a positive integer');
    valid = false;
  } else if (!checkTimerRange(timeoutMs, 'timeout_ms', joinPath(path, 'timeout_ms'), issues)) {
    valid = false;
  }

  if (isPositiveInteger(intervalMs) && isPositiveInteger(timeoutMs) && timeoutMs >= intervalMs) {
    addWarning(
      issues,
      joinPath(path, 'timeout_ms'),
      `timeout_ms (${timeoutMs}) is not shorter than interval_ms (${intervalMs}); ticks will be skipped while a probe hangs`,
    );
  }

  if (kind === null || params === null) return null;

  const paramIssues = probers.validate(kind, params, path);
  issues.push(...paramIssues);
  if (paramIssues.some(issue => issue.severity === 'error')) valid = false;

  if (!valid || !enabled || !isPositiveInteger(intervalMs) || !isPositiveInteger(timeoutMs)) return null;

  return { name, kind, params, intervalMs, timeoutMs };
}

// --- Level 4: Notifiers ---

function validateTemplates(raw: unknown, path: string, issues: ConfigIssue[]): NotifierSpec['templates'] | null {
  if (raw === undefined || raw === null) return { body: DEFAULT_BODY_TEMPLATE };

  const templatesPath = joinPath(path, 'templates');
  if (typeof raw === 'string') return { body: raw };
  if (!isPlainObject(raw)) {
    addError(issues, templatesPath, 'templates must be a string or an object with subject and body');
    return null;
  }

  warnUnknownKeys(raw, KNOWN_TEMPLATE_FIELDS, templatesPath, issues);

  let valid = true;
  if (raw.subject !== undefined && typeof raw.subject !== 'string') {
    addError(issues, joinPath(templatesPath, 'subject'), 'subject must be a string');
    valid = false;
  }
  if (raw.body !== undefined && !isNonEmptyString(raw.body)) {
    addError(issues, joinPath(templatesPath, 'body'), 'body must be a non-empty string');
    valid = false;
  }
  if (!valid) return null;

  const templates: NotifierSpec['templates'] = {
    body: typeof raw.body === 'string' ? raw.body : DEFAULT_BODY_TEMPLATE,
  };
  if (typeof raw.subject === 'string') templates.subject = raw.subject;
  return templates;
}

function validateRetry(raw: unknown, path: string, issues: ConfigIssue[]): RetryPolicy | null {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY };
  if (raw === undefined || raw === null) return policy;

  const retryPath = joinPath(path, 'retry');
  if (!isPlainObject(raw)) {
    addError(issues, retryPath, 'retry must be an object');
    return null;
  }

  warnUnknownKeys(raw, new Set(RETRY_FIELDS.map(([key]) => key)), retryPath, issues);

  let valid = true;
  for (const [key, field] of RETRY_FIELDS) {
    const value = raw[key];
    if (value === undefined) continue;

    const fieldPath = joinPath(retryPath, key);
    if (field === 'backoffMultiplier') {
      if (!isNumber(value) || value < 1) {
        addError(issues, fieldPath, 'backoff_multiplier must be a number of at least 1');
        valid = false;
        continue;
      }
    } else if (field === 'initialDelayMs') {
      if (!isNonNegativeInteger(value)) {
        addError(issues, fieldPath, 'initial_delay_ms must be a non-negative integer');
        valid = false;
        continue;
      }
    } else if (!isPositiveInteger(value)) {
      addError(issues, fieldPath, `${key} must be a positive integer`);
      valid = false;
      continue;
    }
    if (isMillisecondKey(key) && !checkTimerRange(value, key, fieldPath, issues)) {
      valid = false;
      continue;
    }
    policy[field] = value;
  }

  if (policy.maxAttempts > MAX_ATTEMPTS_LIMIT) {
    addError(issues, joinPath(retryPath, 'max_attempts'), `max_attempts must be at most ${MAX_ATTEMPTS_LIMIT}`);
    valid = false;
  }
  if (policy.maxDelayMs < policy.initialDelayMs) {
    addError(issues, joinPath(retryPath, 'max_delay_ms'), 'max_delay_ms must not be less than initial_delay_ms');
    valid = false;
  }

  return valid ? policy : null;
}

function validateNotifier(
  name: string,
  raw: unknown,
  notifiers: NotifierRegistry,
  issues: ConfigIssue[],
): NotifierSpec | null {
  const path = joinPath('notifiers', name);

  if (!isPlainObject(raw)) {
    addError(issues, path, 'Notifier entry must be an object');
    return null;
  }

  warnUnknownKeys(raw, KNOWN_NOTIFIER_FIELDS, path, issues);

  let valid = validateName(name, path, issues);
  const enabled = readEnabled(raw, path, issues);
  const kind = readKind(raw, path, issues);
  const params = readParams(raw, path, issues);
  const templates = validateTemplates(raw.templates, path, issues);
  const retry = validateRetry(raw.retry, path, issues);

  let maxConcurrent: number | undefined;
  if (raw.max_concurrent !== undefined) {
    if (isPositiveInteger(raw.max_concurrent)) {
      maxConcurrent = raw.max_concurrent;
    } else {
      addError(issues, joinPath(path, 'max_concurrent'), 'max_concurrent must be a positive integer');
      valid = false;
    }
  }

  if (kind === null || params === null) return null;

  const paramIssues = notifiers.validate(kind, params, path);
  issues.push(...paramIssues);
  if (paramIssues.some(issue => issue.severity === 'error')) valid = false;

  if (!valid || !enabled || templates === null || retry === null) return null;

  const spec: NotifierSpec = { name, kind, params, templates, retry };
  if (maxConcurrent !== undefined) spec.maxConcurrent = maxConcurrent;
  return spec;
}

// --- Public API ---

/**
 * Validate a parsed configuration document and build the typed config.
 *
 * Issues are collected across the whole document rather than stopping at
 * the first one. `config` is only set when there are no errors; disabled
 * entries are validated but left out of it.
 */
export function validateConfig(
  data: unknown,
  registries: ValidatorRegistries,
  hash = '',
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const split = (): Pick<ConfigValidationResult, 'errors' | 'warnings'> => ({
    errors: issues.filter(issue => issue.severity === 'error'),
    warnings: issues.filter(issue => issue.severity === 'warning'),
  });

  const doc = validateStructure(data, issues);
  if (doc === null) {
    return { valid: false, config: null, ...split() };
  }

  const global = validateGlobal(doc.global, issues);

  const services = new Map<string, ServiceSpec>();
  const rawServices = isPlainObject(doc.services) ? doc.services : {};
  for (const [name, entry] of Object.entries(rawServices)) {
    const spec = validateService(name, entry, global, registries.probers, issues);
    if (spec) services.set(name, spec);
  }

  const notifiers = new Map<string, NotifierSpec>();
  const rawNotifiers = isPlainObject(doc.notifiers) ? doc.notifiers : {};
  for (const [name, entry] of Object.entries(rawNotifiers)) {
    const spec = validateNotifier(name, entry, registries.notifiers, issues);
    if (spec) notifiers.set(name, spec);
  }

  if (Object.keys(rawServices).length === 0) {
    addWarning(issues, 'services', 'No services configured');
  }

  const { errors, warnings } = split();
  if (errors.length > 0) {
    return { valid: false, config: null, errors, warnings };
  }

  const config: MonitorConfig = { global, services, notifiers, hash };
  return { valid: true, config, errors, warnings };
}
