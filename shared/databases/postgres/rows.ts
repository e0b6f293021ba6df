/**
 * Row readers
 *
 * pg returns DECIMAL / COUNT as strings and row_to_json() timestamps as ISO
 * strings; these helpers normalise both shapes.
 */

import { isRecord } from '../../utils/typeGuards';

export type Row = Record<string, unknown>;

export function readNumber(row: Row, key: string): number {
	const value = row[key];
	if (typeof value === 'number') {
		return value;
	}
	if (typeof value === 'string' && value.trim() !== '' && !isNaN(Number(value))) {
		return Number(value);
	}
	throw new TypeError(`Column "${key}" is not numeric`);
}

export function readOptionalNumber(row: Row, key: string): number | null {
	return row[key] === null || row[key] === undefined ? null : readNumber(row, key);
}

export function readString(row: Row, key: string): string {
	const value = row[key];
	if (typeof value !== 'string') {
		throw new TypeError(`Column "${key}" is not text`);
	}
	return value;
}

export function readOptionalString(row: Row, key: string): string | null {
	const value = row[key];
	return typeof value === 'string' ? value : null;
}

export function readBoolean(row: Row, key: string, fallback = false): boolean {
	const value = row[key];
	return typeof value === 'boolean' ? value : fallback;
}

export function readOptionalDate(row: Row, key: string): Date | null {
	const value = row[key];
	if (value instanceof Date) {
		return value;
	}
	if (typeof value === 'string' || typeof value === 'number') {
		const date = new Date(value);
		return isNaN(date.getTime()) ? null : date;
	}
	return null;
}

export function readDate(row: Row, key: string): Date {
	const date = readOptionalDate(row, key);
	if (!date) {
		throw new TypeError(`Column "${key}" is not a timestamp`);
	}
	return date;
}

export function readObject(row: Row, key: string): Row | null {
	const value = row[key];
	return isRecord(value) ? value : null;
}

export function readObjectArray(row: Row, key: string): Row[] {
	const value = row[key];
	return Array.isArray(value) ? value.filter(isRecord) : [];
}

export function readNumberArray(row: Row, key: string): number[] {
	const value = row[key];
	return Array.isArray(value) ? value.filter((item): item is number => typeof item === 'number') : [];
}

/**
 * Read a text column constrained to a fixed set of values.
 */
export function readEnum<T extends string>(row: Row, key: string, allowed: readonly T[]): T {
	const value = row[key];
	const match = allowed.find((item) => item === value);
	if (match === undefined) {
		throw new TypeError(`Column "${key}" has unexpected value ${JSON.stringify(value)}`);
	}
	return match;
}

export function readOptionalEnum<T extends string>(row: Row, key: string, allowed: readonly T[]): T | null {
	return row[key] === null || row[key] === undefined ? null : readEnum(row, key, allowed);
}
