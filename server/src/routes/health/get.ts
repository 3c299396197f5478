import type { Request, Response } from 'express';
import { errorMessage } from '../../utils/errors';
import type { MonitorContext } from '../types';

type DatabaseStatus = 'connected' | 'disabled' | 'error';

export function getHealth(ctx: MonitorContext) {
  return (_req: Request, res: Response): void => {
    const reload = ctx.reloader.getStatus();
    const body = {
      timestamp: new Date().toISOString(),
      services: ctx.reloader.getCurrentConfig().services.size,
      inFlightProbes: ctx.scheduler.getInFlightCount(),
      config: reload,
    };

    let database: DatabaseStatus = 'disabled';
    if (ctx.db) {
      try {
        const row = ctx.db.prepare<[], { ok: number }>('SELECT 1 as ok').get();
        database = row?.ok === 1 ? 'connected' : 'error';
      } catch (error) {
        res.status(500).json({ status: 'unhealthy', ...body, database: 'error', error: errorMessage(error) });
        return;
      }
    }

    if (database === 'error') {
      res.status(500).json({ status: 'unhealthy', ...body, database });
      return;
    }

    res.json({ status: 'healthy', ...body, database });
  };
}
