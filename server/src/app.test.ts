import request from 'supertest';
import { createApp } from './app';
import { createMonitorHarness, silentLogger, type MonitorHarness } from './__tests__/helpers/monitorHarness';

describe('createApp', () => {
  let h: MonitorHarness;

  beforeEach(() => {
    h = createMonitorHarness();
  });

  afterEach(async () => {
    await h.stop();
  });

  it('should send security headers and hide the framework', async () => {
    const res = await request(createApp(h.ctx, { logger: silentLogger })).get('/api/health');

    expect(res.status).toBe(200);
    expect(res.headers['x-frame-options']).toBe('DENY');
    expect(res.headers['x-powered-by']).toBeUndefined();
    expect(res.headers['x-request-id']).toEqual(expect.any(String));
  });

  it('should rate limit the API when enabled', async () => {
    const res = await request(createApp(h.ctx, { logger: silentLogger })).get('/api/services');

    expect(res.headers['ratelimit-limit']).toBe('300');
  });

  it('should skip rate limiting when disabled', async () => {
    const res = await request(createApp(h.ctx, { logger: silentLogger, rateLimit: false })).get('/api/services');

    expect(res.status).toBe(200);
    expect(res.headers['ratelimit-limit']).toBeUndefined();
  });

  it('should answer reload requests without a config path with 422', async () => {
    const res = await request(createApp(h.ctx, { logger: silentLogger, rateLimit: false })).post('/api/reload');

    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      error: 'Invalid configuration',
      issues: [{ severity: 'error', path: '', message: 'No configuration path set' }],
    });
  });
});
