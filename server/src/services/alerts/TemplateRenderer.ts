import { formatTimestamp } from '../../utils/time';
import type { StateTransition } from '../monitoring/types';

export type TemplateVariables = Record<string, string>;

export interface RenderOptions {
  /** Escape values as JSON string content. Detected from the template when omitted. */
  jsonEscape?: boolean;
}

const PLACEHOLDER = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;

/**
 * A template is treated as JSON when its trimmed text is an object literal.
 */
export function isJsonTemplate(template: string): boolean {
  const trimmed = template.trim();
  return trimmed.startsWith('{') && trimmed.endsWith('}');
}

function escapeJsonString(value: string): string {
  // JSON.stringify quotes the value; strip them since the template supplies its own.
  return JSON.stringify(value).slice(1, -1);
}

/**
 * Substitute `{{name}}` placeholders. Unknown names are left as written.
 */
export function renderTemplate(template: string, variables: TemplateVariables, options: RenderOptions = {}): string {
  const escape = options.jsonEscape ?? isJsonTemplate(template);

  return template.replace(PLACEHOLDER, (match: string, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(variables, name)) return match;
    const value = variables[name];
    return escape ? escapeJsonString(value) : value;
  });
}

function stringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  return JSON.stringify(value);
}

/** Characters a placeholder cannot contain become `_`, e.g. `db.pool-size` -> `db_pool_size`. */
export function placeholderName(key: string): string {
  return key.replace(/[^A-Za-z0-9_]/g, '_');
}

/**
 * Variables exposed to notifier templates for a transition.
 */
export function buildTemplateVariables(transition: StateTransition): TemplateVariables {
  const latency = transition.latencyMs.toFixed(2);
  const variables: TemplateVariables = {
    service_name: transition.service,
    service_kind: transition.kind,
    service_type: transition.kind,
    old_state: transition.oldState ?? 'UNKNOWN',
    new_state: transition.newState,
    status: transition.newState,
    timestamp: formatTimestamp(transition.timestamp),
    latency_ms: latency,
    response_time: latency,
    error_message: transition.error ?? '',
  };

  for (const [key, value] of Object.entries(transition.metadata)) {
    variables[`metadata_${placeholderName(key)}`] = stringify(value);
  }
  variables.metadata_json = JSON.stringify(transition.metadata);

  return variables;
}
