import type { Request, Response } from 'express';
import { ValidationError } from '../../utils/errors';
import { parseLimitParam } from '../../utils/validation';
import type { MonitorContext } from '../types';

/** Most recent delivery outcomes, newest first. */
export function listDeliveries(ctx: MonitorContext) {
  return (req: Request, res: Response): void => {
    const limit = parseLimitParam(req.query.limit);
    const { notifier } = req.query;
    if (notifier !== undefined && typeof notifier !== 'string') {
      throw new ValidationError('notifier must be a single name', 'notifier');
    }

    const records = ctx.dispatcher.getRecentDeliveries(notifier === undefined ? limit : undefined);
    res.json(notifier === undefined ? records : records.filter(r => r.notifier === notifier).slice(0, limit));
  };
}
