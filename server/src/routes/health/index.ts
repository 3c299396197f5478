import { Router } from 'express';
import type { MonitorContext } from '../types';
import { getHealth } from './get';

export function createHealthRouter(ctx: MonitorContext): Router {
  const router = Router();

  router.get('/', getHealth(ctx));

  return router;
}
