/**
 * Type Guard Utilities
 * Safe type checking functions
 */

/**
 * Check if value is a record (object, not array, not null)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check if value is a string
 */
export function isString(value: unknown): value is string {
	return typeof value === 'string';
}

/**
 * Check if value is a number
 */
export function isNumber(value: unknown): value is number {
	return typeof value === 'number' && !isNaN(value);
}

/**
 * Check if value is a boolean
 */
export function isBoolean(value: unknown): value is boolean {
	return typeof value === 'boolean';
}

/**
 * Check if value is a non-empty string
 */
export function isNonEmptyString(value: unknown): value is string {
	return isString(value) && value.trim().length > 0;
}

/**
 * Read the `code` of a driver or system error (`ECONNRESET`, SQLSTATE `23505`, ...)
 */
export function getErrorCode(error: unknown): string | undefined {
	if (!isRecord(error)) {
		return undefined;
	}
	const code = error.code;
	return isString(code) ? code : undefined;
}
