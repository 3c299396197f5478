import type { Request, Response } from 'express';
import { asyncHandler } from '../../utils/errors';
import type { MonitorContext } from '../types';

/**
 * Push a synthetic UP -> DOWN alert through one notifier. A delivery that
 * still fails after its retries answers 502 with the same body.
 */
export function sendTestAlert(ctx: MonitorContext) {
  return asyncHandler(async (req: Request, res: Response) => {
    const { name } = req.params;
    const { transition, delivery } = await ctx.dispatcher.sendTest(name);

    res.status(delivery.success ? 200 : 502).json({
      notifier: name,
      service: transition.service,
      transitionId: transition.id,
      delivery,
    });
  });
}
