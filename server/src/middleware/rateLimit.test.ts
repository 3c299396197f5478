import express from 'express';
import request from 'supertest';
import { createApiRateLimit, createAdminRateLimit, parseRateLimitConfig } from './rateLimit';

function createApp(opts: { apiMax?: number; adminMax?: number } = {}) {
  const app = express();

  app.use(createApiRateLimit({ windowMs: 60000, max: opts.apiMax ?? 3 }));

  app.get('/api/services', (_req, res) => {
    res.json({ ok: true });
  });

  app.post('/api/reload', createAdminRateLimit({ windowMs: 60000, max: opts.adminMax ?? 2 }), (_req, res) => {
    res.json({ applied: false });
  });

  return app;
}

describe('Rate Limit Middleware', () => {
  describe('api rate limit', () => {
    it('should allow requests under the limit', async () => {
      const app = createApp({ apiMax: 3 });

      const res = await request(app).get('/api/services');
      expect(res.status).toBe(200);
      expect(res.body.ok).toBe(true);
    });

    it('should return 429 after exceeding the limit', async () => {
      const app = createApp({ apiMax: 2 });

      await request(app).get('/api/services');
      await request(app).get('/api/services');
      const res = await request(app).get('/api/services');

      expect(res.status).toBe(429);
      expect(res.body.error).toBe('Too many requests, please try again later');
      expect(res.headers['retry-after']).toBeDefined();
    });

    it('should include RateLimit headers', async () => {
      const app = createApp({ apiMax: 5 });

      const res = await request(app).get('/api/services');

      expect(res.headers['ratelimit-limit']).toBe('5');
      expect(res.headers['ratelimit-remaining']).toBe('4');
    });
  });

  describe('admin rate limit', () => {
    it('should limit reload requests separately', async () => {
      const app = createApp({ apiMax: 10, adminMax: 2 });

      await request(app).post('/api/reload');
      await request(app).post('/api/reload');
      const limited = await request(app).post('/api/reload');

      expect(limited.status).toBe(429);
      expect(limited.body.error).toBe('Too many reload or check requests, please try again later');

      const read = await request(app).get('/api/services');
      expect(read.status).toBe(200);
    });
  });

  describe('parseRateLimitConfig', () => {
    it('should return defaults when no env vars set', () => {
      expect(parseRateLimitConfig({})).toEqual({
        api: { windowMs: 60000, max: 300 },
        admin: { windowMs: 60000, max: 20 },
      });
    });

    it('should read from env vars when set', () => {
      const config = parseRateLimitConfig({
        RATE_LIMIT_WINDOW_MS: '300000',
        RATE_LIMIT_MAX: '50',
        ADMIN_RATE_LIMIT_WINDOW_MS: '30000',
        ADMIN_RATE_LIMIT_MAX: '5',
      });

      expect(config).toEqual({
        api: { windowMs: 300000, max: 50 },
        admin: { windowMs: 30000, max: 5 },
      });
    });

    it('should ignore invalid values', () => {
      expect(parseRateLimitConfig({ RATE_LIMIT_MAX: 'lots' }).api.max).toBe(300);
    });
  });
});
