import { Router, type RequestHandler } from 'express';
import type { MonitorContext } from '../types';
import { triggerReload } from './trigger';

export function createReloadRouter(ctx: MonitorContext, adminLimit?: RequestHandler): Router {
  const router = Router();
  const guards = adminLimit ? [adminLimit] : [];

  router.post('/', ...guards, triggerReload(ctx));

  return router;
}
