/**
 * Field Builders
 *
 * Declare the properties of a mapped type: its value type, whether it may be
 * null, and optionally the column it reads from.
 *
 * @example
 * ```typescript
 * class Account {
 *   static fields = {
 *     id: field().bigint(),
 *     email: field('email_address').string(),
 *     closedAt: field().date().nullable(),
 *     balance: field().custom<Money>('money')
 *   };
 *   id = 0n;
 *   email = '';
 *   closedAt: Date | null = null;
 *   balance?: Money;
 * }
 * ```
 */

import type { FieldBuilder, FieldColumnBuilder, FieldDef, FieldMap, TypeRef } from './types';

/**
 * Returns new instances for immutability.
 */
class FieldBuilderInternal<T> implements FieldBuilder<T> {
	public readonly _def: FieldDef;
	declare readonly _type?: T;

	public constructor(type: TypeRef, column: string | undefined, nullable: boolean) {
		this._def = Object.freeze({ column, type, nullable });
	}

	public nullable(): FieldBuilderInternal<T | null> {
		return new FieldBuilderInternal<T | null>(this._def.type, this._def.column, true);
	}
}

class FieldColumnBuilderInternal implements FieldColumnBuilder {
	public constructor(private readonly column: string | undefined) {}

	public string(): FieldBuilder<string> {
		return new FieldBuilderInternal<string>('string', this.column, false);
	}

	public number(): FieldBuilder<number> {
		return new FieldBuilderInternal<number>('number', this.column, false);
	}

	public integer(): FieldBuilder<number> {
		return new FieldBuilderInternal<number>('integer', this.column, false);
	}

	public boolean(): FieldBuilder<boolean> {
		return new FieldBuilderInternal<boolean>('boolean', this.column, false);
	}

	public date(): FieldBuilder<Date> {
		return new FieldBuilderInternal<Date>('date', this.column, false);
	}

	public bigint(): FieldBuilder<bigint> {
		return new FieldBuilderInternal<bigint>('bigint', this.column, false);
	}

	public uuid(): FieldBuilder<string> {
		return new FieldBuilderInternal<string>('uuid', this.column, false);
	}

	public json<T = unknown>(): FieldBuilder<T> {
		return new FieldBuilderInternal<T>('json', this.column, false);
	}

	public any<T = unknown>(): FieldBuilder<T | null> {
		return new FieldBuilderInternal<T | null>('any', this.column, true);
	}

	public custom<T>(typeName: string): FieldBuilder<T> {
		return new FieldBuilderInternal<T>(typeName, this.column, false);
	}
}

/**
 * Field builder factory.
 *
 * @param column - Column name override. Omit it to match the property name
 *   under the active naming rules.
 */
export function field(column?: string): FieldColumnBuilder {
	return new FieldColumnBuilderInternal(column);
}

export function isFieldBuilder(value: unknown): value is FieldBuilder {
	if (typeof value !== 'object' || value === null || !('_def' in value)) {
		return false;
	}
	const def: unknown = value._def;
	return (
		typeof def === 'object' &&
		def !== null &&
		'type' in def &&
		typeof def.type === 'string' &&
		'nullable' in def &&
		typeof def.nullable === 'boolean' &&
		'column' in def &&
		(def.column === undefined || typeof def.column === 'string')
	);
}

export function isFieldMap(value: unknown): value is FieldMap {
	return typeof value === 'object' && value !== null && Object.values(value).every(isFieldBuilder);
}
