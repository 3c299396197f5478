import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import pino from 'pino';
import { createProberRegistry } from '../services/probes';
import { createNotifierRegistry } from '../services/alerts/notifiers';
import { ConfigValidationError } from '../utils/errors';
import { hashContent, loadConfigFile, parseConfig } from './ConfigLoader';

const registries = { probers: createProberRegistry(), notifiers: createNotifierRegistry() };
const silent = pino({ level: 'silent' });

const YAML_SOURCE = `
global:
  max_concurrent_probes: 3
services:
  cache-a:
    kind: tcp
    interval_ms: 1000
    params:
      host: localhost
      port: 6379
notifiers:
  console:
    kind: log
`;

describe('ConfigLoader', () => {
  describe('hashContent', () => {
    it('should return the sha256 hex digest', () => {
      expect(hashContent('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
      expect(hashContent('a')).not.toBe(hashContent('b'));
    });
  });

  describe('parseConfig', () => {
    it('should parse YAML and stamp the content hash', () => {
      const config = parseConfig(YAML_SOURCE, registries, 'test', silent);

      expect(config.global.maxConcurrentProbes).toBe(3);
      expect(config.services.get('cache-a')).toMatchObject({ kind: 'tcp', intervalMs: 1000 });
      expect(config.notifiers.has('console')).toBe(true);
      expect(config.hash).toBe(hashContent(YAML_SOURCE));
    });

    it('should accept JSON', () => {
      const config = parseConfig(
        JSON.stringify({ services: { api: { kind: 'http', params: { url: 'http://localhost/' } } } }),
        registries,
        'test',
        silent,
      );

      expect(config.services.get('api')?.kind).toBe('http');
    });

    it('should throw with every validation error', () => {
      const source = 'services:\n  a:\n    kind: tcp\n    interval_ms: 1\n    params: { host: h, port: 1 }\n';

      let caught: unknown;
      try {
        parseConfig(source, registries, 'test.yaml', silent);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ConfigValidationError);
      if (!(caught instanceof ConfigValidationError)) return;
      expect(caught.issues.map(issue => issue.path)).toEqual(['services.a.interval_ms']);
      expect(caught.message).toBe(
        'Invalid configuration (test.yaml): services.a.interval_ms: interval_ms must be an integer of at least 100',
      );
      expect(caught.statusCode).toBe(422);
    });

    it('should report syntax errors as configuration errors', () => {
      expect(() => parseConfig('services: [unclosed', registries, 'test', silent)).toThrow(ConfigValidationError);
    });

    it('should log warnings', () => {
      const warn = jest.spyOn(silent, 'warn');

      parseConfig(YAML_SOURCE.replace('max_concurrent_probes: 3', 'max_concurrent_probes: 3\n  colour: red'), registries, 'test', silent);

      expect(warn).toHaveBeenCalledWith({ source: 'test', path: 'global.colour' }, 'Unknown field "colour"');
      warn.mockRestore();
    });
  });

  describe('loadConfigFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'healthwatch-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should read and parse the file', async () => {
      const path = join(dir, 'healthwatch.yaml');
      writeFileSync(path, YAML_SOURCE);

      const config = await loadConfigFile(path, registries, silent);

      expect(Array.from(config.services.keys())).toEqual(['cache-a']);
    });

    it('should reject a missing file', async () => {
      await expect(loadConfigFile(join(dir, 'missing.yaml'), registries, silent)).rejects.toThrow(
        /Cannot read configuration file/,
      );
    });
  });

  describe('shipped sample', () => {
    it('should load with the built-in kinds and leave out disabled entries', async () => {
      const config = await loadConfigFile(join(__dirname, '../../config/healthwatch.yaml'), registries, silent);

      expect([...config.services.keys()]).toEqual(['web', 'cache-a', 'orders-db']);
      expect([...config.notifiers.keys()]).toEqual(['console', 'ops-webhook']);
      expect(config.global.failureThreshold).toBe(2);
      expect(config.services.get('orders-db')?.intervalMs).toBe(30000);
      expect(config.notifiers.get('ops-webhook')?.retry.maxAttempts).toBe(5);
    });
  });
});
