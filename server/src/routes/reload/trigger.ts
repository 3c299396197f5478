import type { Request, Response } from 'express';
import { asyncHandler } from '../../utils/errors';
import { formatReloadChanges } from '../formatters';
import type { MonitorContext } from '../types';

/**
 * Re-read the configuration file and apply it. A rejected file answers 422
 * with every issue; the running configuration stays in place.
 */
export function triggerReload(ctx: MonitorContext) {
  return asyncHandler(async (_req: Request, res: Response) => {
    const result = await ctx.reloader.reload();

    res.json({
      applied: result.applied,
      hash: result.hash,
      changes: result.diff ? formatReloadChanges(result.diff) : null,
    });
  });
}
