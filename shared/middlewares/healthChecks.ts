/**
 * Health Check Middleware
 * Provides /health (liveness) and /ready (readiness) endpoints
 * /ready runs a probe query through the database runtime
 */

import { Request, Response } from 'express';

export interface HealthProbe {
	health(): Promise<'ok' | 'error'>;
}

interface HealthCheckOptions {
	serviceName: string;
	database?: HealthProbe;
}

/**
 * Create health check endpoints
 * /health - liveness probe (always returns 200 if service is running)
 * /ready - readiness probe (returns 503 if the database is unreachable)
 */
export function createHealthCheckEndpoints(options: HealthCheckOptions) {
	const { serviceName, database } = options;

	const healthHandler = (_req: Request, res: Response) => {
		res.status(200).json({
			status: 'ok',
			service: serviceName,
			timestamp: new Date().toISOString(),
		});
	};

	const readyHandler = async (_req: Request, res: Response) => {
		const checks = {
			postgres: database ? await database.health() : 'ok',
		};

		const ready = checks.postgres === 'ok';

		res.status(ready ? 200 : 503).json({
			ready,
			service: serviceName,
			checks,
			timestamp: new Date().toISOString(),
		});
	};

	return {
		healthHandler,
		readyHandler,
	};
}
