import type { MapperContext, RowMapperFactory } from './mapper-context';
import { MapperError } from './mapper-error';
import { sameSignature } from './result-set';
import { isReplicatedType, typeNameOf } from './target-type';
import type { ColumnSignature, Constructor, MappingPlan, ResultRow, RowMapper, TargetType } from './types';

/**
 * Maps rows onto new instances of a class.
 *
 * `map()` looks the plan up per row shape; `specializeFor()` resolves once and
 * returns a mapper bound to that plan.
 *
 * @example
 * ```typescript
 * const mappers = new RowMappers().register(BeanMapper.factory(User));
 * const users = mappers.mapAll(User, resultSet);
 *
 * // Columns aliased as author_id, author_name, ...
 * mappers.register(BeanMapper.factory(Author, 'author_'));
 * ```
 */
export class BeanMapper<T extends object> implements RowMapper<T> {
	public constructor(
		private readonly type: Constructor<T>,
		private readonly prefix: string,
		private readonly context: MapperContext
	) {}

	/**
	 * Factory supporting exactly `type`, matching columns that start with `prefix`.
	 */
	public static factory<T extends object>(type: Constructor<T>, prefix = ''): RowMapperFactory {
		return new BeanMapperFactory(type, prefix);
	}

	public map(row: ResultRow): T {
		const plan = this.context.plans.getOrResolve(this.type, row.columns, { prefix: this.prefix });
		return this.context.materializer.materialize(plan, row, this.type);
	}

	public specializeFor(columns: ColumnSignature): BoundBeanMapper<T> {
		const plan = this.context.plans.getOrResolve(this.type, columns, { prefix: this.prefix });
		return new BoundBeanMapper(this, this.type, plan, this.context);
	}
}

/**
 * Bean mapper bound to one resolved plan.
 */
export class BoundBeanMapper<T extends object> implements RowMapper<T> {
	public constructor(
		private readonly parent: BeanMapper<T>,
		private readonly type: Constructor<T>,
		public readonly plan: MappingPlan,
		private readonly context: MapperContext
	) {}

	/**
	 * @throws MapperError when the row's column count differs from the plan's
	 */
	public map(row: ResultRow): T {
		return this.context.materializer.materialize(this.plan, row, this.type);
	}

	public specializeFor(columns: ColumnSignature): RowMapper<T> {
		return sameSignature(columns, this.plan.columns) ? this : this.parent.specializeFor(columns);
	}
}

class BeanMapperFactory implements RowMapperFactory {
	public constructor(
		private readonly type: Constructor,
		private readonly prefix: string
	) {}

	public supports(type: TargetType): boolean {
		return type === this.type;
	}

	public buildMapper<T extends object>(type: TargetType<T>, context: MapperContext): RowMapper<T> {
		if (isReplicatedType(type) || type !== this.type) {
			throw new MapperError(typeNameOf(type), undefined, 'bean mapper factory does not support this type');
		}
		return new BeanMapper(type, this.prefix, context);
	}
}
