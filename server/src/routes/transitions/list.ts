import type { Request, Response } from 'express';
import { ValidationError } from '../../utils/errors';
import { parseLimitParam } from '../../utils/validation';
import type { MonitorContext } from '../types';

/** Recent transitions across all services, newest first. */
export function listTransitions(ctx: MonitorContext) {
  return (req: Request, res: Response): void => {
    const limit = parseLimitParam(req.query.limit);
    const { service } = req.query;
    if (service !== undefined && typeof service !== 'string') {
      throw new ValidationError('service must be a single name', 'service');
    }

    res.json(ctx.stateTracker.getHistory({ service, limit }));
  };
}
