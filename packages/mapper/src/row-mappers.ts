import { Logger } from '@rowbound/logging';
import { ColumnConverters } from './converters';
import type { IntrospectionStrategy } from './introspection';
import type { MapperContext, RowMapperFactory } from './mapper-context';
import { MapperError } from './mapper-error';
import { MappingConfig } from './mapping-config';
import { PlanCache } from './plan-cache';
import { PlanResolver } from './plan-resolver';
import { PropertyCatalog } from './property-catalog';
import { ReplicatorMapper } from './replicator';
import type { ResultSet } from './result-set';
import { RowMaterializer } from './row-materializer';
import { typeNameOf } from './target-type';
import type { ConverterRegistry, RowMapper, TargetType } from './types';

export interface RowMappersOptions {
	config?: MappingConfig;
	converters?: ConverterRegistry;
	strategies?: readonly IntrospectionStrategy[];
	logger?: Logger;
}

/**
 * Registry of row mapper factories sharing one catalog and one plan cache.
 *
 * Factories registered later take precedence. Replicated types are supported
 * out of the box; classes are added with `BeanMapper.factory()`.
 *
 * @example
 * ```typescript
 * const mappers = new RowMappers({ config: await MappingConfig.fromProvider(new EnvConfigProvider()) })
 *   .register(BeanMapper.factory(User))
 *   .register(BeanMapper.factory(Team, 'team_'));
 *
 * const users = mappers.mapAll(User, resultSet);
 * ```
 */
export class RowMappers {
	public readonly context: MapperContext;
	private readonly factories: RowMapperFactory[] = [];
	private readonly logger: Logger;

	public constructor(options: RowMappersOptions = {}) {
		this.logger = options.logger ?? new Logger('RowMappers');
		const config = options.config ?? new MappingConfig();
		const catalog = new PropertyCatalog(options.strategies, this.logger.child('PropertyCatalog'));
		const resolver = new PlanResolver({
			catalog,
			converters: options.converters ?? new ColumnConverters(),
			naming: config,
			requireConverters: config.requireConverters,
			logger: this.logger.child('PlanResolver')
		});
		this.context = {
			catalog,
			plans: new PlanCache(resolver),
			materializer: new RowMaterializer()
		};
		this.register(ReplicatorMapper.factory());
	}

	public register(factory: RowMapperFactory): this {
		this.factories.push(factory);
		return this;
	}

	/**
	 * Mapper from the most recently registered factory supporting `type`.
	 */
	public findFor<T extends object>(type: TargetType<T>): RowMapper<T> | undefined {
		for (let index = this.factories.length - 1; index >= 0; index--) {
			const factory = this.factories[index];
			if (factory?.supports(type)) {
				return factory.buildMapper(type, this.context);
			}
		}
		return undefined;
	}

	/**
	 * @throws MapperError when no registered factory supports `type`
	 */
	public mapperFor<T extends object>(type: TargetType<T>): RowMapper<T> {
		const mapper = this.findFor(type);
		if (!mapper) {
			throw new MapperError(typeNameOf(type), undefined, 'no row mapper registered for type');
		}
		return mapper;
	}

	/**
	 * Maps every row, resolving the plan once for the whole result.
	 */
	public mapAll<T extends object>(type: TargetType<T>, rows: ResultSet): T[] {
		const mapper = this.mapperFor(type).specializeFor(rows.columns);
		const results = Array.from(rows, (row) => mapper.map(row));
		this.logger.debug('Rows Mapped', { type: typeNameOf(type), rows: results.length });
		return results;
	}
}
