import { MapperError } from './mapper-error';
import type { ColumnSignature, ResultRow } from './types';

class ArrayRow implements ResultRow {
	public constructor(
		public readonly columns: ColumnSignature,
		private readonly values: readonly unknown[]
	) {}

	public get(columnIndex: number): unknown {
		if (!Number.isInteger(columnIndex) || columnIndex < 1 || columnIndex > this.values.length) {
			throw new RangeError(`Column index ${columnIndex} is outside 1..${this.values.length}`);
		}
		return this.values[columnIndex - 1];
	}
}

/**
 * Builds a single row. Values are positional and must line up with `columns`.
 */
export function rowOf(columns: readonly string[], values: readonly unknown[]): ResultRow {
	checkWidth(columns, values);
	return new ArrayRow(Object.freeze([...columns]), values);
}

function checkWidth(columns: ColumnSignature, values: readonly unknown[]): void {
	if (values.length !== columns.length) {
		throw new MapperError(
			'ResultSet',
			undefined,
			'row width does not match column count',
			`${columns.length} values`,
			values.length
		);
	}
}

/**
 * In-memory, pre-fetched query result. Every row shares one column signature.
 *
 * @example
 * ```typescript
 * const rows = ResultSet.of(['id', 'display_name'], [[1, 'alice'], [2, 'bob']]);
 * const users = mappers.mapAll(User, rows);
 * ```
 */
export class ResultSet implements Iterable<ResultRow> {
	private constructor(
		public readonly columns: ColumnSignature,
		private readonly rows: readonly ResultRow[]
	) {}

	public static of(columns: readonly string[], rows: readonly (readonly unknown[])[]): ResultSet {
		const signature = Object.freeze([...columns]);
		return new ResultSet(
			signature,
			rows.map((values) => {
				checkWidth(signature, values);
				return new ArrayRow(signature, values);
			})
		);
	}

	public get size(): number {
		return this.rows.length;
	}

	/**
	 * Row at a 0-based position, or undefined past the end.
	 */
	public row(index: number): ResultRow | undefined {
		return this.rows[index];
	}

	public [Symbol.iterator](): Iterator<ResultRow> {
		return this.rows[Symbol.iterator]();
	}
}

/**
 * Whether two column signatures list the same labels in the same order.
 */
export function sameSignature(a: ColumnSignature, b: ColumnSignature): boolean {
	return a.length === b.length && a.every((label, index) => label === b[index]);
}
