import type { Request, Response } from 'express';
import { NotFoundError } from '../../utils/errors';
import { parseLimitParam } from '../../utils/validation';
import type { MonitorContext } from '../types';

/**
 * Recent transitions of one service, newest first. Services removed from
 * the configuration keep their history while the tracker still knows them.
 */
export function getServiceHistory(ctx: MonitorContext) {
  return (req: Request, res: Response): void => {
    const { name } = req.params;
    const limit = parseLimitParam(req.query.limit);

    const configured = ctx.reloader.getCurrentConfig().services.has(name);
    if (!configured && !ctx.stateTracker.getCurrentState(name)) {
      throw new NotFoundError(`Service "${name}"`);
    }

    res.json({
      service: name,
      transitions: ctx.stateTracker.getHistory({ service: name, limit }),
    });
  };
}
