import { Router, type RequestHandler } from 'express';
import type { MonitorContext } from '../types';
import { listServices } from './list';
import { getService } from './get';
import { getServiceHistory } from './history';
import { checkServiceNow } from './check';

export function createServicesRouter(ctx: MonitorContext, adminLimit?: RequestHandler): Router {
  const router = Router();

  router.get('/', listServices(ctx));
  router.get('/:name', getService(ctx));
  router.get('/:name/history', getServiceHistory(ctx));

  // On-demand probes share the admin rate limit with reloads
  const guards = adminLimit ? [adminLimit] : [];
  router.post('/:name/check', ...guards, checkServiceNow(ctx));

  return router;
}
