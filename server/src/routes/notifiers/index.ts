import { Router, type RequestHandler } from 'express';
import type { MonitorContext } from '../types';
import { listNotifiers } from './list';
import { sendTestAlert } from './test';

export function createNotifiersRouter(ctx: MonitorContext, adminLimit?: RequestHandler): Router {
  const router = Router();
  const guards = adminLimit ? [adminLimit] : [];

  router.get('/', listNotifiers(ctx));
  router.post('/:name/test', ...guards, sendTestAlert(ctx));

  return router;
}
