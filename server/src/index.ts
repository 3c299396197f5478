import http from 'node:http';
import dotenv from 'dotenv';
import { createApp } from './app';
import { loadEnvConfig } from './config/env';
import { createMonitor } from './monitor';
import { ConfigValidationError } from './utils/errors';
import { createLogger } from './utils/logger';

dotenv.config();

const env = loadEnvConfig();
const logger = createLogger({ level: env.logLevel });

async function start() {
  const monitor = createMonitor({ env, logger });

  try {
    await monitor.start();
  } catch (error) {
    const issues = error instanceof ConfigValidationError ? error.issues : undefined;
    logger.fatal({ err: error, issues, configPath: env.configPath }, 'failed to load initial configuration');
    await monitor.shutdown();
    process.exit(1);
  }

  let server: http.Server | undefined;
  if (env.port > 0) {
    const app = createApp(monitor.context, { logger });
    server = app.listen(env.port, () => {
      logger.info({ port: env.port }, 'status API started');
    });
  }

  // SIGHUP re-reads the file now instead of waiting for the next poll
  process.on('SIGHUP', () => {
    logger.info('SIGHUP received, reloading configuration');
    monitor.reloader.reload().catch((error: unknown) => {
      logger.warn({ err: error }, 'reload on SIGHUP rejected');
    });
  });

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;

    // Force exit if draining outlasts the grace period by a wide margin
    // Use unref() so this timer doesn't keep the process alive
    const forceExitTimer = setTimeout(() => {
      logger.warn('forcing exit after timeout');
      process.exit(1);
    }, monitor.reloader.getGlobalSettings().shutdownGraceMs + 10000);
    forceExitTimer.unref();

    server?.close(() => {
      logger.info('status API closed');
    });
    await monitor.shutdown();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error({ err: error }, 'shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

start().catch((error) => {
  logger.fatal({ err: error }, 'failed to start');
  process.exit(1);
});
