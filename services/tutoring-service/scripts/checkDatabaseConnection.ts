/**
 * Opens the service's database runtime, runs the health probe and closes it again.
 * Exit code 0 when PostgreSQL answers, 2 otherwise.
 */
import '@tutoriapp/shared/config/global-env';
import { loadServiceConfig } from '@tutoriapp/shared/config/configLoader';
import logger, { describeError } from '@tutoriapp/shared/config/logger';
import { createDatabaseRuntime } from '../src/config/database';

async function main(): Promise<number> {
  const config = loadServiceConfig('tutoring-service', { requirePostgres: true });
  const database = createDatabaseRuntime(config);

  try {
    const status = await database.health();
    logger.info(`PostgreSQL health: ${status}`, { service: config.SERVICE_NAME });
    return status === 'ok' ? 0 : 2;
  } finally {
    await database.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error('PostgreSQL connectivity check failed', { error: describeError(error) });
    process.exit(2);
  });
