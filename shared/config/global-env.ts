import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import logger from './logger';

function findEnvPath(startDir = process.cwd()): string | null {
	let current = startDir;
	while (true) {
		const candidate = path.join(current, '.env');
		if (fs.existsSync(candidate)) {
			return candidate;
		}
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}
	return null;
}

// Load .env at import time (file system only, never a database connection)
const resolvedEnvPath = findEnvPath();

if (resolvedEnvPath) {
	const result = dotenv.config({ path: resolvedEnvPath });
	if (result.error) {
		logger.warn('⚠️ Failed to load .env file, falling back to process environment');
	} else {
		logger.info(`✅ Environment variables loaded from ${resolvedEnvPath}`);
	}
} else if (process.env.NODE_ENV !== undefined) {
	logger.warn('⚠️ .env file not found in current or parent directories, using process environment');
}

/**
 * Validate required environment variables at runtime.
 * Only call from runtime entrypoints, never at import time.
 *
 * @throws Error if required variables are missing
 */
export function validateRequiredEnvVars(): void {
	const requiredVars = ['JWT_SECRET'];
	const requireOneOf: Array<[string, string[]]> = [
		['POSTGRES_URL or POSTGRES_URI or DATABASE_URL or POSTGRES_USER + POSTGRES_PASSWORD + POSTGRES_DB', ['POSTGRES_URL', 'POSTGRES_URI', 'DATABASE_URL', 'POSTGRES_USER']],
	];

	const missing: string[] = [];

	requiredVars.forEach((key) => {
		if (!process.env[key]) {
			missing.push(key);
			logger.warn(`⚠️ Missing environment variable: ${key}`);
		}
	});

	requireOneOf.forEach(([label, keys]) => {
		const satisfied = keys.some((key) => !!process.env[key]);
		if (!satisfied) {
			missing.push(label);
			logger.warn(`⚠️ Missing environment variable: ${label}`);
		}
	});

	if (missing.length > 0) {
		throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
	}
}
