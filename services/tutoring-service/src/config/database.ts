/**
 * Database Configuration for Tutoring Service
 * One PostgreSQL connection, driven by the shared database runtime
 */

import type { ServiceConfig } from '@tutoriapp/shared/config/configLoader';
import { PostgresClient } from '@tutoriapp/shared/databases/postgres/client';
import { createPostgresClientConfig } from '@tutoriapp/shared/databases/postgres/connection';
import { DatabaseRuntime } from '@tutoriapp/shared/databases/postgres/runtime';

export function createDatabaseRuntime(config: ServiceConfig): DatabaseRuntime<PostgresClient> {
  const client = new PostgresClient(createPostgresClientConfig(config, config.SERVICE_NAME));
  return new DatabaseRuntime(client, {
    serviceName: config.SERVICE_NAME,
    startupTimeoutMs: config.DB_LOOP_STARTUP_TIMEOUT_MS,
    shutdownTimeoutMs: config.DB_LOOP_SHUTDOWN_TIMEOUT_MS,
  });
}
