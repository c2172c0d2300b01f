import { matchesDeclaredType } from './coercion';
import { InstantiationError, MapperError, PropertyWriteError } from './mapper-error';
import { sameSignature } from './result-set';
import type { Constructor, MappingPlan, PlanEntry, PropertyDescriptor, ResultRow } from './types';

/**
 * Row Materializer
 *
 * Applies a resolved plan to one row. Every call allocates exactly one new
 * object; plans are only read. Any failure aborts the current row and names
 * the property involved.
 */
export class RowMaterializer {
	/**
	 * @throws InstantiationError when the constructor declares parameters or throws
	 */
	public instantiate<T extends object>(type: Constructor<T>): T {
		if (type.length > 0) {
			throw new InstantiationError(
				type.name || 'anonymous',
				`constructor declares ${type.length} required parameter(s)`
			);
		}
		try {
			return new type();
		} catch (error) {
			throw new InstantiationError(type.name || 'anonymous', 'constructor threw', error);
		}
	}

	/**
	 * Instantiates `type` and writes every plan entry to it.
	 * @throws PropertyWriteError naming the property that could not be written
	 */
	public materialize<T extends object>(plan: MappingPlan, row: ResultRow, type: Constructor<T>): T {
		this.assertShape(plan, row);
		const instance = this.instantiate(type);
		for (const entry of plan.entries) {
			this.write(plan, entry, instance, this.read(plan, entry, row));
		}
		return instance;
	}

	/**
	 * Builds a frozen plain record with one key per property, in catalog order.
	 * Properties without a plan entry are null.
	 */
	public materializeRecord(
		plan: MappingPlan,
		row: ResultRow,
		properties: readonly PropertyDescriptor[]
	): Readonly<Record<string, unknown>> {
		this.assertShape(plan, row);
		const values = new Map<string, unknown>();
		for (const entry of plan.entries) {
			values.set(entry.property.name, this.read(plan, entry, row));
		}

		const record: Record<string, unknown> = {};
		for (const property of properties) {
			record[property.name] = values.has(property.name) ? values.get(property.name) : null;
		}
		return Object.freeze(record);
	}

	private assertShape(plan: MappingPlan, row: ResultRow): void {
		if (row.columns.length !== plan.columns.length) {
			throw new MapperError(
				plan.typeName,
				undefined,
				'row does not fit the mapping plan',
				`${plan.columns.length} columns`,
				row.columns.length
			);
		}
		if (!sameSignature(row.columns, plan.columns)) {
			throw new MapperError(
				plan.typeName,
				undefined,
				'row columns differ from the mapping plan',
				plan.columns.join(', '),
				row.columns.join(', ')
			);
		}
	}

	/**
	 * Converts one column and checks the result against the property declaration.
	 */
	private read(plan: MappingPlan, entry: PlanEntry, row: ResultRow): unknown {
		const { property } = entry;
		let value: unknown;
		try {
			value = entry.converter.convert(row, entry.columnIndex);
		} catch (error) {
			throw new PropertyWriteError(
				plan.typeName,
				property.name,
				'conversion-failed',
				property.declaredType,
				row.get(entry.columnIndex),
				error
			);
		}

		if (value === null || value === undefined) {
			if (!property.nullable) {
				throw new PropertyWriteError(plan.typeName, property.name, 'null-value', property.declaredType, null);
			}
			return null;
		}

		if (!matchesDeclaredType(property.declaredType, value)) {
			throw new PropertyWriteError(plan.typeName, property.name, 'type-mismatch', property.declaredType, value);
		}
		return value;
	}

	private write(plan: MappingPlan, entry: PlanEntry, instance: object, value: unknown): void {
		const { property } = entry;
		if (!property.writable) {
			throw new PropertyWriteError(plan.typeName, property.name, 'not-writable');
		}

		let written: boolean;
		try {
			written = Reflect.set(instance, property.name, value);
		} catch (error) {
			throw new PropertyWriteError(
				plan.typeName,
				property.name,
				'setter-failed',
				property.declaredType,
				value,
				error
			);
		}
		if (!written) {
			throw new PropertyWriteError(plan.typeName, property.name, 'not-writable');
		}
	}
}
