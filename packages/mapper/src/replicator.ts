/**
 * Replicated Types
 *
 * Read-only record shapes declared up front. Rows map to frozen plain
 * objects; every declared type needs a converter, and every non-nullable
 * property needs a column.
 *
 * @example
 * ```typescript
 * const Account = replicated('Account', {
 *   id: field().bigint(),
 *   email: field('email_address').string(),
 *   closedAt: field().date().nullable()
 * });
 * type Account = ReplicatedRecord<typeof Account>;
 *
 * const accounts: Account[] = new RowMappers().mapAll(Account, resultSet);
 * ```
 */

import { matchesDeclaredType } from './coercion';
import type { MapperContext, RowMapperFactory } from './mapper-context';
import { IncompleteMappingError, MapperError } from './mapper-error';
import { sameSignature } from './result-set';
import { isReplicatedType, typeNameOf } from './target-type';
import type {
	ColumnSignature,
	FieldBuilder,
	FieldMap,
	MappingPlan,
	PropertyDescriptor,
	ReplicatedType,
	ResultRow,
	RowMapper,
	TargetType
} from './types';

export type InferRecord<F extends FieldMap> = {
	readonly [K in keyof F]: F[K] extends FieldBuilder<infer V> ? V : never;
};

export type ReplicatedRecord<R> = R extends ReplicatedType<infer T> ? T : never;

function conformsTo(fields: FieldMap, value: unknown): boolean {
	if (typeof value !== 'object' || value === null) {
		return false;
	}
	return Object.entries(fields).every(([name, builder]) => {
		if (!Object.hasOwn(value, name)) {
			return false;
		}
		const property: unknown = Reflect.get(value, name);
		if (property === null) {
			return builder._def.nullable;
		}
		return matchesDeclaredType(builder._def.type, property);
	});
}

/**
 * Declares a replicated record shape.
 */
export function replicated<F extends FieldMap>(name: string, fields: F): ReplicatedType<InferRecord<F>> {
	const frozenFields = Object.freeze({ ...fields });
	const token: ReplicatedType<InferRecord<F>> = {
		$replicated: true,
		$name: name,
		$fields: frozenFields,
		$is: (value: unknown): value is InferRecord<F> => conformsTo(frozenFields, value)
	};
	return Object.freeze(token);
}

export class ReplicatorMapper<T extends object> implements RowMapper<T> {
	public constructor(
		private readonly type: ReplicatedType<T>,
		private readonly context: MapperContext
	) {}

	/**
	 * Factory supporting every replicated type.
	 */
	public static factory(): RowMapperFactory {
		return new ReplicatorMapperFactory();
	}

	public map(row: ResultRow): T {
		return this.specializeFor(row.columns).map(row);
	}

	/**
	 * @throws MissingConverterError when a declared type has no converter
	 * @throws IncompleteMappingError when a non-nullable property has no column
	 */
	public specializeFor(columns: ColumnSignature): RowMapper<T> {
		const plan = this.context.plans.getOrResolve(this.type, columns, { requireConverters: true });
		const properties = this.context.catalog.introspect(this.type);

		const bound = new Set(plan.entries.map((entry) => entry.property.name));
		const missing = properties
			.filter((property) => !property.nullable && !bound.has(property.name))
			.map((property) => property.name);
		if (missing.length > 0) {
			throw new IncompleteMappingError(this.type.$name, 'no column for required properties', missing);
		}

		return new BoundReplicatorMapper(this, this.type, plan, properties, this.context);
	}
}

class BoundReplicatorMapper<T extends object> implements RowMapper<T> {
	public constructor(
		private readonly parent: ReplicatorMapper<T>,
		private readonly type: ReplicatedType<T>,
		private readonly plan: MappingPlan,
		private readonly properties: readonly PropertyDescriptor[],
		private readonly context: MapperContext
	) {}

	public map(row: ResultRow): T {
		const record = this.context.materializer.materializeRecord(this.plan, row, this.properties);
		if (!this.type.$is(record)) {
			throw new MapperError(this.type.$name, undefined, 'record does not conform to its declared fields');
		}
		return record;
	}

	public specializeFor(columns: ColumnSignature): RowMapper<T> {
		return sameSignature(columns, this.plan.columns) ? this : this.parent.specializeFor(columns);
	}
}

class ReplicatorMapperFactory implements RowMapperFactory {
	public supports(type: TargetType): boolean {
		return isReplicatedType(type);
	}

	public buildMapper<T extends object>(type: TargetType<T>, context: MapperContext): RowMapper<T> {
		if (!isReplicatedType(type)) {
			throw new MapperError(typeNameOf(type), undefined, 'not a replicated type');
		}
		return new ReplicatorMapper(type, context);
	}
}
