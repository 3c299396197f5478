import { buildTemplateVariables, isJsonTemplate, renderTemplate } from './TemplateRenderer';
import type { StateTransition } from '../monitoring/types';

const transition = (overrides: Partial<StateTransition> = {}): StateTransition => ({
  id: 't-1',
  service: 'cache-a',
  kind: 'redis',
  oldState: 'UP',
  newState: 'DOWN',
  timestamp: '2026-03-04T05:06:07.890Z',
  latencyMs: 12.3456,
  error: 'connection refused',
  metadata: { host: 'cache', port: 6379 },
  ...overrides,
});

describe('renderTemplate', () => {
  it('should substitute known placeholders', () => {
    expect(renderTemplate('service_name={{service_name}}', { service_name: 'cache-a' })).toBe('service_name=cache-a');
  });

  it('should tolerate whitespace inside braces', () => {
    expect(renderTemplate('{{ status }}', { status: 'UP' })).toBe('UP');
  });

  it('should leave unknown placeholders as written', () => {
    expect(renderTemplate('{{service_name}} {{region}}', { service_name: 'api' })).toBe('api {{region}}');
  });

  it('should escape values inside JSON templates', () => {
    const rendered = renderTemplate('{"text": "{{error_message}}"}', { error_message: 'bad "quote"\nnext' });

    expect(rendered).toBe('{"text": "bad \\"quote\\"\\nnext"}');
    expect(JSON.parse(rendered)).toEqual({ text: 'bad "quote"\nnext' });
  });

  it('should not escape plain text templates', () => {
    expect(renderTemplate('err: {{e}}', { e: 'a "b"' })).toBe('err: a "b"');
  });

  it('should let the caller force escaping', () => {
    expect(renderTemplate('{{e}}', { e: '"' }, { jsonEscape: true })).toBe('\\"');
  });

  it('should not resolve inherited object properties', () => {
    expect(renderTemplate('{{constructor}}', {})).toBe('{{constructor}}');
  });
});

describe('isJsonTemplate', () => {
  it('should detect object literals after trimming', () => {
    expect(isJsonTemplate('  {"a": 1}\n')).toBe(true);
    expect(isJsonTemplate('[1, 2]')).toBe(false);
    expect(isJsonTemplate('Service {{service_name}}')).toBe(false);
  });
});

describe('buildTemplateVariables', () => {
  it('should expose transition fields under their template names', () => {
    expect(buildTemplateVariables(transition())).toEqual({
      service_name: 'cache-a',
      service_kind: 'redis',
      service_type: 'redis',
      old_state: 'UP',
      new_state: 'DOWN',
      status: 'DOWN',
      timestamp: '2026-03-04 05:06:07',
      latency_ms: '12.35',
      response_time: '12.35',
      error_message: 'connection refused',
      metadata_host: 'cache',
      metadata_port: '6379',
      metadata_json: '{"host":"cache","port":6379}',
    });
  });

  it('should render a missing old state as UNKNOWN and a missing error as empty', () => {
    const variables = buildTemplateVariables(transition({ oldState: null, error: undefined, metadata: {} }));

    expect(variables.old_state).toBe('UNKNOWN');
    expect(variables.error_message).toBe('');
    expect(variables.metadata_json).toBe('{}');
  });

  it('should serialise structured metadata values', () => {
    const variables = buildTemplateVariables(transition({ metadata: { tags: ['a', 'b'], extra: null } }));

    expect(variables.metadata_tags).toBe('["a","b"]');
    expect(variables.metadata_extra).toBe('');
  });

  it('should expose metadata keys with dots or dashes under placeholder-safe names', () => {
    const variables = buildTemplateVariables(transition({ metadata: { 'db.pool-size': 8, 'x-region': 'eu' } }));

    expect(variables.metadata_db_pool_size).toBe('8');
    expect(variables.metadata_x_region).toBe('eu');
    expect(renderTemplate('{{metadata_x_region}}/{{metadata_db_pool_size}}', variables)).toBe('eu/8');
  });
});
