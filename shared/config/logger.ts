/**
 * Shared winston logger.
 *
 * Development gets one colorized line per entry with service, route and
 * status tags in front; production writes JSON. Silent while Jest runs.
 */

import winston from 'winston';
import type { Request, Response } from 'express';

const levels = { error: 0, warn: 1, info: 2, http: 3, debug: 4 };

winston.addColors({ error: 'red', warn: 'yellow', info: 'green', http: 'magenta', debug: 'cyan' });

const timestamp = winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' });

// keys rendered as tags or dropped from the trailing meta
const TAGGED_KEYS = new Set(['timestamp', 'level', 'message', 'service', 'environment', 'method', 'url', 'statusCode', 'error']);

const renderLine = winston.format.printf((info) => {
	const tags = [`[${String(info.timestamp)}]`];
	if (info.service) tags.push(`[${String(info.service)}]`);
	if (info.method && info.url) tags.push(`[${String(info.method)} ${String(info.url)}]`);
	if (info.statusCode) tags.push(`[${String(info.statusCode)}]`);

	let line = `${tags.join(' ')} ${info.level}: ${String(info.message)}`;
	if (info.error !== undefined) {
		line += ` | error=${typeof info.error === 'string' ? info.error : JSON.stringify(info.error)}`;
	}

	const rest = Object.entries(info).filter(([key]) => !TAGGED_KEYS.has(key));
	if (rest.length > 0) {
		line += ` ${JSON.stringify(Object.fromEntries(rest))}`;
	}
	return line;
});

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const logger = winston.createLogger({
	levels,
	level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
	silent: isTest,
	defaultMeta: {
		service: process.env.SERVICE_NAME || 'tutoring-service',
		environment: process.env.NODE_ENV || 'development',
	},
	transports: [
		new winston.transports.Console({
			format: isProduction
				? winston.format.combine(timestamp, winston.format.errors({ stack: true }), winston.format.json())
				: winston.format.combine(timestamp, winston.format.colorize({ all: true }), renderLine),
		}),
	],
});

/**
 * Logging surface the database components accept. The winston instance
 * satisfies it; tests pass a silent object or jest.fn() spies.
 */
export interface DatabaseLogger {
	debug(message: string, meta?: Record<string, unknown>): void;
	info(message: string, meta?: Record<string, unknown>): void;
	warn(message: string, meta?: Record<string, unknown>): void;
	error(message: string, meta?: Record<string, unknown>): void;
}

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const logServiceStart = (serviceName: string, port: number) => {
	logger.info(`${serviceName} listening`, { service: serviceName, port });
};

export const logServiceStop = (serviceName: string, port: number) => {
	logger.info(`${serviceName} stopped`, { service: serviceName, port });
};

function requestTags(req: Request): Record<string, unknown> {
	return {
		method: req.method,
		url: req.originalUrl || req.url,
		ip: req.ip || req.socket.remoteAddress,
	};
}

/** One entry per finished request; 4xx and 5xx go out as warnings. */
export const logApiRequest = (req: Request, res: Response, responseTime?: number) => {
	const meta = { ...requestTags(req), statusCode: res.statusCode, responseTimeMs: responseTime };
	if (res.statusCode >= 400) {
		logger.warn('request completed', meta);
	} else {
		logger.http('request completed', meta);
	}
};

/**
 * Client errors are warnings, server errors are errors. The stack is only
 * attached outside production.
 */
export const logApiError = (error: Error, req: Request, _res: Response, statusCode: number = 500) => {
	const meta = {
		...requestTags(req),
		statusCode,
		error: error.name,
		stack: isProduction ? undefined : error.stack,
	};
	if (statusCode < 500) {
		logger.warn(error.message, meta);
	} else {
		logger.error(error.message, meta);
	}
};

export const logDatabaseOperation = (operation: string, table?: string, details?: Record<string, unknown>) => {
	logger.debug(`${operation} ${table ?? ''}`.trim(), { operation, table, ...details });
};

export const logAuthEvent = (
	event: 'login' | 'register' | 'token_verify',
	userId?: number,
	success: boolean = true,
	details?: Record<string, unknown>
) => {
	logger.log(success ? 'info' : 'warn', `auth ${event} ${success ? 'succeeded' : 'failed'}`, {
		event,
		userId,
		...details,
	});
};

export default logger;
