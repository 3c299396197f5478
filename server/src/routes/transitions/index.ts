import { Router } from 'express';
import type { MonitorContext } from '../types';
import { listTransitions } from './list';

export function createTransitionsRouter(ctx: MonitorContext): Router {
  const router = Router();

  router.get('/', listTransitions(ctx));

  return router;
}
