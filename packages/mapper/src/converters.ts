import {
	coerceBigInt,
	coerceBoolean,
	coerceDate,
	coerceInteger,
	coerceJson,
	coerceNumber,
	coerceString,
	coerceUuid
} from './coercion';
import type { ColumnConverter, ConverterRegistry, ResultRow, TypeRef } from './types';

/**
 * Reads the raw column value untouched. Used when no converter is registered
 * for a property's declared type.
 */
export const passthroughConverter: ColumnConverter = Object.freeze({
	convert(row: ResultRow, columnIndex: number): unknown {
		return row.get(columnIndex);
	}
});

/**
 * Builds a converter from a coercion function. Null and undefined are
 * returned as null without calling `coerce`.
 *
 * @example
 * ```typescript
 * converters.register('money', valueConverter((value, column) => Money.parse(coerceString(value, column))));
 * ```
 */
export function valueConverter<T>(coerce: (value: unknown, column: string) => T): ColumnConverter<T> {
	return {
		convert(row: ResultRow, columnIndex: number): T | null {
			const value = row.get(columnIndex);
			if (value === null || value === undefined) {
				return null;
			}
			return coerce(value, row.columns[columnIndex - 1] ?? `#${columnIndex}`);
		}
	};
}

/**
 * Default converter registry. Ships converters for every built-in field type;
 * custom types are added with `register()`.
 */
export class ColumnConverters implements ConverterRegistry {
	private readonly converters = new Map<TypeRef, ColumnConverter>();

	public constructor() {
		this.register('string', valueConverter(coerceString));
		this.register('number', valueConverter(coerceNumber));
		this.register('integer', valueConverter(coerceInteger));
		this.register('boolean', valueConverter(coerceBoolean));
		this.register('date', valueConverter(coerceDate));
		this.register('bigint', valueConverter(coerceBigInt));
		this.register('uuid', valueConverter(coerceUuid));
		this.register('json', valueConverter(coerceJson));
		this.register('any', passthroughConverter);
	}

	/**
	 * Registers (or replaces) the converter for a type.
	 */
	public register(type: TypeRef, converter: ColumnConverter): this {
		this.converters.set(type, converter);
		return this;
	}

	public findConverter(type: TypeRef): ColumnConverter | undefined {
		return this.converters.get(type);
	}
}
