// Loads .env before the configuration is read
import { validateRequiredEnvVars } from '@tutoriapp/shared/config/global-env';
import { loadServiceConfig } from '@tutoriapp/shared/config/configLoader';
import logger, { describeError, logServiceStart, logServiceStop } from '@tutoriapp/shared/config/logger';
import { createApp, SERVICE_NAME } from './app';
import { createDatabaseRuntime } from './config/database';

async function start() {
  validateRequiredEnvVars();
  const config = loadServiceConfig(SERVICE_NAME, { requirePostgres: true, requireJWT: true });
  if (!config.JWT_SECRET) {
    throw new Error('JWT_SECRET is required');
  }

  const database = createDatabaseRuntime(config);
  await database.init();

  const app = createApp({
    database,
    tokens: { secret: config.JWT_SECRET, expiresInSeconds: config.JWT_EXPIRES_IN },
  });

  const PORT = config.PORT;
  const server = app.listen(PORT, () => logServiceStart('Tutoring Service', PORT));

  server.on('error', (err: NodeJS.ErrnoException) => {
    logger.error(err.code === 'EADDRINUSE' ? `Port ${PORT} is already in use` : 'Server error', {
      service: SERVICE_NAME,
      port: PORT,
      error: err.message,
      code: err.code,
    });
    process.exit(1);
  });

  // Graceful shutdown handler
  let shuttingDown = false;
  const gracefulShutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown`, { service: SERVICE_NAME });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout', { service: SERVICE_NAME });
      process.exit(1);
    }, 30000).unref();

    server.close(() => {
      logger.info('HTTP server closed', { service: SERVICE_NAME });
      database
        .close()
        .then(() => {
          logServiceStop('Tutoring Service', PORT);
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Database shutdown failed', { service: SERVICE_NAME, error: describeError(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

start().catch((error: unknown) => {
  logger.error('Failed to start Tutoring Service', {
    service: SERVICE_NAME,
    error: describeError(error),
  });
  process.exit(1);
});
