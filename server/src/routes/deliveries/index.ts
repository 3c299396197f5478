import { Router } from 'express';
import type { MonitorContext } from '../types';
import { listDeliveries } from './list';

export function createDeliveriesRouter(ctx: MonitorContext): Router {
  const router = Router();

  router.get('/', listDeliveries(ctx));

  return router;
}
