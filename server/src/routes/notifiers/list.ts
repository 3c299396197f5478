import type { Request, Response } from 'express';
import { formatNotifier } from '../formatters';
import type { MonitorContext } from '../types';

export function listNotifiers(ctx: MonitorContext) {
  return (_req: Request, res: Response): void => {
    const specs = [...ctx.reloader.getCurrentConfig().notifiers.values()];
    res.json(specs.sort((a, b) => a.name.localeCompare(b.name)).map(formatNotifier));
  };
}
