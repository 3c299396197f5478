import type { Request, Response } from 'express';
import { asyncHandler } from '../../utils/errors';
import { formatCheck } from '../formatters';
import type { MonitorContext } from '../types';

/**
 * Probe a service immediately. The outcome goes through the tracker like a
 * scheduled one, so it can cause a transition and alerts.
 */
export function checkServiceNow(ctx: MonitorContext) {
  return asyncHandler(async (req: Request, res: Response) => {
    const { name } = req.params;
    const outcome = await ctx.scheduler.checkNow(name);
    const state = ctx.stateTracker.getCurrentState(name);

    res.json({
      service: name,
      check: formatCheck(outcome),
      status: state?.status ?? outcome.status,
    });
  });
}
