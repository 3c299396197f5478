import type { Request, Response } from 'express';
import { NotFoundError } from '../../utils/errors';
import { formatServiceDetail } from '../formatters';
import type { MonitorContext } from '../types';

export function getService(ctx: MonitorContext) {
  return (req: Request, res: Response): void => {
    const { name } = req.params;
    const spec = ctx.reloader.getCurrentConfig().services.get(name);
    if (!spec) {
      throw new NotFoundError(`Service "${name}"`);
    }

    res.json(
      formatServiceDetail(spec, ctx.stateTracker.getCurrentState(name), ctx.scheduler.getScheduledService(name)),
    );
  };
}
