import type { ClientConfig } from 'pg';
import type { PostgresConfig } from '../../config/configLoader';

/**
 * Resolve the connection string from POSTGRES_URL / POSTGRES_URI / DATABASE_URL,
 * falling back to the individual POSTGRES_* variables.
 */
export function buildPostgresConnectionString(config: PostgresConfig): string {
	const url = config.POSTGRES_URL || config.POSTGRES_URI || config.DATABASE_URL;
	if (url) {
		// uselibpqcompat keeps pg-connection-string from treating sslmode=require as verify-full
		if (config.POSTGRES_SSL && !/sslmode=/.test(url)) {
			const sep = url.includes('?') ? '&' : '?';
			return `${url}${sep}uselibpqcompat=true&sslmode=require`;
		}
		return url;
	}

	if (!config.POSTGRES_USER || !config.POSTGRES_PASSWORD || !config.POSTGRES_DB) {
		throw new Error(
			'POSTGRES_URL (or POSTGRES_URI / DATABASE_URL) or POSTGRES_USER + POSTGRES_PASSWORD + POSTGRES_DB is required'
		);
	}

	const user = encodeURIComponent(config.POSTGRES_USER);
	const password = encodeURIComponent(config.POSTGRES_PASSWORD);
	return `postgresql://${user}:${password}@${config.POSTGRES_HOST}:${config.POSTGRES_PORT}/${config.POSTGRES_DB}`;
}

/**
 * Client settings for the single long-lived connection of a service.
 */
export function createPostgresClientConfig(config: PostgresConfig, applicationName: string): ClientConfig {
	return {
		connectionString: buildPostgresConnectionString(config),
		ssl: config.POSTGRES_SSL ? { rejectUnauthorized: false } : false,
		application_name: `${applicationName}-${process.env.NODE_ENV || 'development'}-${process.pid}`,
		connectionTimeoutMillis: 30000, // cold starts on managed Postgres can be slow
		keepAlive: true,
		keepAliveInitialDelayMillis: 0,
		statement_timeout: config.DB_STATEMENT_TIMEOUT,
	};
}
