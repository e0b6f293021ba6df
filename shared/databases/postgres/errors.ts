/**
 * Database error taxonomy
 *
 * Driver failures are converted into a DatabaseError carrying a category so
 * callers dispatch on type instead of matching message text.
 */

import { AppError } from '../../config/errorHandler';
import { getErrorCode, isRecord, isString } from '../../utils/typeGuards';

export type DatabaseErrorCategory = 'connection' | 'constraint' | 'invalid_input' | 'query';

export class DatabaseError extends AppError {
	readonly category: DatabaseErrorCategory;
	readonly code?: string;
	readonly constraint?: string;

	constructor(
		message: string,
		category: DatabaseErrorCategory,
		details: { code?: string; constraint?: string; cause?: unknown } = {}
	) {
		super(message, statusForCategory(category, details.code), category !== 'query', { cause: details.cause });
		this.category = category;
		this.code = details.code;
		this.constraint = details.constraint;
	}
}

/**
 * The loop context did not report ready within its startup bound.
 */
export class LoopStartupError extends AppError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, 503, false, options);
	}
}

/**
 * The shared client could not connect, even after one repair cycle.
 */
export class ConnectionStartupError extends AppError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, 503, false, options);
	}
}

/**
 * In-flight work outlived the shutdown bound. Logged, never thrown to callers.
 */
export class ShutdownTimeoutError extends AppError {
	readonly pendingCalls: number;

	constructor(message: string, pendingCalls: number) {
		super(message, 500, true);
		this.pendingCalls = pendingCalls;
	}
}

// Node socket errors raised by the driver when the transport is unusable
const CONNECTION_ERROR_CODES = new Set([
	'ECONNRESET',
	'ECONNREFUSED',
	'ECONNABORTED',
	'EPIPE',
	'ETIMEDOUT',
	'ENOTFOUND',
	'EHOSTUNREACH',
	'ENETUNREACH',
]);

// SQLSTATE admin_shutdown, crash_shutdown, cannot_connect_now
const CONNECTION_SQLSTATES = new Set(['57P01', '57P02', '57P03']);

// Messages pg emits without a code when the socket is gone
const CONNECTION_MESSAGES = [
	/connection terminated/i,
	/not queryable/i,
	/client was closed/i,
	/not connected/i,
];

function statusForCategory(category: DatabaseErrorCategory, code?: string): number {
	switch (category) {
		case 'connection':
			return 503;
		case 'constraint':
			// foreign_key_violation points at a missing referenced row
			return code === '23503' ? 400 : 409;
		case 'invalid_input':
			return 400;
		default:
			return 500;
	}
}

export function categorizePostgresFailure(code: string | undefined, message: string): DatabaseErrorCategory {
	if (code) {
		if (CONNECTION_ERROR_CODES.has(code) || CONNECTION_SQLSTATES.has(code) || code.startsWith('08')) {
			return 'connection';
		}
		if (code.startsWith('23')) {
			return 'constraint';
		}
		if (code.startsWith('22')) {
			return 'invalid_input';
		}
		return 'query';
	}
	return CONNECTION_MESSAGES.some((pattern) => pattern.test(message)) ? 'connection' : 'query';
}

/**
 * Convert anything thrown by the pg driver into a DatabaseError.
 * A DatabaseError passes through untouched.
 */
export function classifyPostgresError(error: unknown): DatabaseError {
	if (error instanceof DatabaseError) {
		return error;
	}

	const message = error instanceof Error ? error.message : String(error);
	const code = getErrorCode(error);
	const constraint = isRecord(error) && isString(error.constraint) ? error.constraint : undefined;

	return new DatabaseError(message, categorizePostgresFailure(code, message), {
		code,
		constraint,
		cause: error,
	});
}

export function isConnectionError(error: unknown): error is DatabaseError {
	return error instanceof DatabaseError && error.category === 'connection';
}
