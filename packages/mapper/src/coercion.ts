/**
 * Type Coercion Functions
 *
 * Turn raw driver values into the declared property type. Each throws
 * ConversionError naming the column when the value cannot be converted.
 * Null handling is left to the caller.
 *
 * @example
 * ```typescript
 * coerceNumber('25', 'age');              // -> 25
 * coerceNumber('abc', 'age');             // throws ConversionError
 * coerceDate('2024-01-01', 'created_at'); // -> Date
 * coerceBoolean('f', 'active');           // -> false
 * ```
 */

import { ConversionError } from './mapper-error';
import type { TypeRef } from './types';

const INTEGRAL = /^-?\d+$/;

/**
 * Coerce a value to a number. Integral strings and bigints must fit in the
 * safe integer range; values that are neither numbers, strings nor bigints
 * are rejected.
 * @throws ConversionError if the value is empty, results in NaN or would lose precision
 */
export function coerceNumber(value: unknown, column: string): number {
	if (typeof value === 'number') {
		if (Number.isNaN(value)) {
			throw new ConversionError(column, 'value is NaN', 'number', value);
		}
		return value;
	}

	if (typeof value === 'string') {
		const text = value.trim();
		if (text === '') {
			throw new ConversionError(column, 'cannot coerce empty string', 'number', value);
		}
		const num = Number(text);
		if (Number.isNaN(num)) {
			throw new ConversionError(column, 'coercion failed', 'number', value);
		}
		if (INTEGRAL.test(text) && !Number.isSafeInteger(num)) {
			throw new ConversionError(column, 'outside the safe integer range', 'number', value);
		}
		return num;
	}

	if (typeof value === 'bigint') {
		if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
			throw new ConversionError(column, 'outside the safe integer range', 'number', value);
		}
		return Number(value);
	}

	throw new ConversionError(column, 'coercion failed', 'number', value);
}

/**
 * Coerce a value to an integral number.
 * @throws ConversionError if the value is not a whole number or not a safe integer
 */
export function coerceInteger(value: unknown, column: string): number {
	const num = coerceNumber(value, column);
	if (!Number.isInteger(num)) {
		throw new ConversionError(column, 'not an integer', 'integer', value);
	}
	if (!Number.isSafeInteger(num)) {
		throw new ConversionError(column, 'outside the safe integer range', 'integer', value);
	}
	return num;
}

/**
 * Coerce a value to a bigint. Accepts bigints, integral numbers and strings of digits
 * (node-postgres returns int8 columns as strings).
 */
export function coerceBigInt(value: unknown, column: string): bigint {
	if (typeof value === 'bigint') {
		return value;
	}
	if (typeof value === 'number' && Number.isInteger(value)) {
		return BigInt(value);
	}
	if (typeof value === 'string' && INTEGRAL.test(value.trim())) {
		return BigInt(value.trim());
	}
	throw new ConversionError(column, 'coercion failed', 'bigint', value);
}

/**
 * Coerce a value to a Date.
 * @throws ConversionError if the value is empty, of an unsupported type or an Invalid Date
 */
export function coerceDate(value: unknown, column: string): Date {
	// Already a Date - return as-is
	if (value instanceof Date) {
		if (Number.isNaN(value.getTime())) {
			throw new ConversionError(column, 'invalid Date object', 'date', value);
		}
		return value;
	}

	if (value === '') {
		throw new ConversionError(column, 'cannot coerce empty string', 'date', value);
	}

	// Number (timestamp)
	if (typeof value === 'number') {
		const date = new Date(value);
		if (Number.isNaN(date.getTime())) {
			throw new ConversionError(column, 'invalid timestamp', 'date', value);
		}
		return date;
	}

	// String (ISO date or other format)
	if (typeof value === 'string') {
		const date = new Date(value);
		if (Number.isNaN(date.getTime())) {
			throw new ConversionError(column, 'invalid date string', 'date', value);
		}
		return date;
	}

	throw new ConversionError(column, 'unsupported type for date coercion', 'date', value);
}

const TRUE_STRINGS = new Set(['true', 't', 'yes', 'y', '1']);
const FALSE_STRINGS = new Set(['false', 'f', 'no', 'n', '0']);

/**
 * Coerce a value to a boolean.
 * Numbers map 0 to false and 1 to true; strings accept the usual SQL spellings.
 */
export function coerceBoolean(value: unknown, column: string): boolean {
	if (typeof value === 'boolean') {
		return value;
	}
	if (value === 0 || value === 1) {
		return value === 1;
	}
	if (typeof value === 'string') {
		const normalized = value.trim().toLowerCase();
		if (TRUE_STRINGS.has(normalized)) return true;
		if (FALSE_STRINGS.has(normalized)) return false;
	}
	throw new ConversionError(column, 'coercion failed', 'boolean', value);
}

export function coerceString(value: unknown, column: string): string {
	if (typeof value === 'string') {
		return value;
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (typeof value === 'object') {
		throw new ConversionError(column, 'cannot coerce object to string', 'string', value);
	}
	return String(value);
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Validate a UUID string and normalize it to lower case.
 */
export function coerceUuid(value: unknown, column: string): string {
	if (typeof value === 'string' && UUID_PATTERN.test(value)) {
		return value.toLowerCase();
	}
	throw new ConversionError(column, 'invalid uuid', 'uuid', value);
}

/**
 * Parse JSON text; already-decoded values (node-postgres decodes json/jsonb) pass through.
 */
export function coerceJson(value: unknown, column: string): unknown {
	if (typeof value !== 'string') {
		return value;
	}
	try {
		return JSON.parse(value);
	} catch (error) {
		throw new ConversionError(column, 'invalid JSON', 'json', value, error);
	}
}

/**
 * Whether a non-null value already has the runtime type a property declares.
 * Custom, json and any types accept every value.
 */
export function matchesDeclaredType(type: TypeRef, value: unknown): boolean {
	switch (type) {
		case 'string':
		case 'uuid':
			return typeof value === 'string';
		case 'number':
			return typeof value === 'number';
		case 'integer':
			return typeof value === 'number' && Number.isInteger(value);
		case 'boolean':
			return typeof value === 'boolean';
		case 'bigint':
			return typeof value === 'bigint';
		case 'date':
			return value instanceof Date;
		default:
			return true;
	}
}
