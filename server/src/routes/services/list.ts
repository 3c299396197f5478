import type { Request, Response } from 'express';
import { ValidationError } from '../../utils/errors';
import { isHealthFlag } from '../../services/monitoring/types';
import { formatServiceStatus } from '../formatters';
import type { MonitorContext } from '../types';

export function listServices(ctx: MonitorContext) {
  return (req: Request, res: Response): void => {
    const { status } = req.query;
    if (status !== undefined && status !== 'UNKNOWN' && !isHealthFlag(status)) {
      throw new ValidationError('status must be one of UP, DOWN, DEGRADED, UNKNOWN', 'status');
    }

    const specs = [...ctx.reloader.getCurrentConfig().services.values()].sort((a, b) =>
      a.name.localeCompare(b.name),
    );
    const formatted = specs.map(spec =>
      formatServiceStatus(spec, ctx.stateTracker.getCurrentState(spec.name), ctx.scheduler.getScheduledService(spec.name)),
    );

    res.json(status === undefined ? formatted : formatted.filter(service => service.status === status));
  };
}
