import express, { type Express } from 'express';
import type { Logger } from 'pino';
import { createHealthRouter } from './routes/health';
import { createServicesRouter } from './routes/services';
import { createTransitionsRouter } from './routes/transitions';
import { createDeliveriesRouter } from './routes/deliveries';
import { createReloadRouter } from './routes/reload';
import { createNotifiersRouter } from './routes/notifiers';
import type { MonitorContext } from './routes/types';
import { createSecurityHeaders } from './middleware/securityHeaders';
import { createApiRateLimit, createAdminRateLimit } from './middleware/rateLimit';
import { createRequestLogger } from './middleware/requestLogger';
import { errorHandler, NotFoundError } from './utils/errors';
import defaultLogger from './utils/logger';

export interface AppOptions {
  logger?: Logger;
  /** Off in tests that hammer a single endpoint. */
  rateLimit?: boolean;
}

/**
 * Build the operator API over the live monitor components.
 */
export function createApp(ctx: MonitorContext, options: AppOptions = {}): Express {
  const { logger = defaultLogger, rateLimit = true } = options;
  const app = express();

  app.disable('x-powered-by');
  app.use(createSecurityHeaders());
  app.use(createRequestLogger({ logger }));
  if (rateLimit) {
    app.use('/api', createApiRateLimit());
  }

  const adminLimit = rateLimit ? createAdminRateLimit() : undefined;

  app.use('/api/health', createHealthRouter(ctx));
  app.use('/api/services', createServicesRouter(ctx, adminLimit));
  app.use('/api/transitions', createTransitionsRouter(ctx));
  app.use('/api/deliveries', createDeliveriesRouter(ctx));
  app.use('/api/notifiers', createNotifiersRouter(ctx, adminLimit));
  app.use('/api/reload', createReloadRouter(ctx, adminLimit));

  app.use('/api', (_req, _res, next) => {
    next(new NotFoundError('Route'));
  });

  // Registered last: Express identifies error handlers by their four parameters
  app.use(errorHandler);

  return app;
}
