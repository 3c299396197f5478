import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../app';
import { createMonitorHarness, flush, monitorYaml, silentLogger, type MonitorHarness } from '../../__tests__/helpers/monitorHarness';

describe('Transitions and deliveries API', () => {
  let h: MonitorHarness;
  let app: Express;

  beforeEach(async () => {
    h = createMonitorHarness();
    h.probes.set('cache-a', { status: 'DOWN', error: 'connection refused' });
    h.probes.set('db', { status: 'DEGRADED', error: 'replica lag' });
    await h.reloader.reload(
      monitorYaml({ 'cache-a': '', db: '', web: '' }, { console: '', pager: '' }),
    );
    await flush();
    await h.dispatcher.idle();
    app = createApp(h.ctx, { logger: silentLogger, rateLimit: false });
  });

  afterEach(async () => {
    await h.stop();
  });

  describe('GET /api/transitions', () => {
    it('should return transitions newest first', async () => {
      const res = await request(app).get('/api/transitions');

      expect(res.status).toBe(200);
      expect(res.body.map((t: { service: string; newState: string }) => [t.service, t.newState])).toEqual([
        ['db', 'DEGRADED'],
        ['cache-a', 'DOWN'],
      ]);
    });

    it('should filter by service and honour the limit', async () => {
      const byService = await request(app).get('/api/transitions?service=cache-a');
      const limited = await request(app).get('/api/transitions?limit=1');

      expect(byService.body).toHaveLength(1);
      expect(byService.body[0].service).toBe('cache-a');
      expect(limited.body).toHaveLength(1);
      expect(limited.body[0].service).toBe('db');
    });

    it('should reject a repeated service parameter', async () => {
      const res = await request(app).get('/api/transitions?service=a&service=b');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'service must be a single name', field: 'service' });
    });
  });

  describe('GET /api/deliveries', () => {
    it('should list one delivery per notifier and transition', async () => {
      const res = await request(app).get('/api/deliveries');

      expect(res.status).toBe(200);
      expect(res.body).toHaveLength(4);
      expect(
        res.body
          .map((r: { notifier: string; service: string }) => `${r.notifier}:${r.service}`)
          .sort(),
      ).toEqual(['console:cache-a', 'console:db', 'pager:cache-a', 'pager:db']);
      expect(res.body.every((r: { success: boolean; attempts: number }) => r.success && r.attempts === 1)).toBe(true);
    });

    it('should filter by notifier', async () => {
      const res = await request(app).get('/api/deliveries?notifier=pager&limit=1');

      expect(res.body).toHaveLength(1);
      expect(res.body[0].notifier).toBe('pager');
    });

    it('should reject a limit above the maximum', async () => {
      const res = await request(app).get('/api/deliveries?limit=5000');

      expect(res.status).toBe(400);
    });
  });
});
