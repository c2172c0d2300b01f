import { Logger } from '@rowbound/logging';
import { DeclaredFieldsStrategy, InstanceReflectionStrategy, type IntrospectionStrategy } from './introspection';
import { IntrospectionError } from './mapper-error';
import { typeNameOf } from './target-type';
import type { PropertyDescriptor, TargetType } from './types';

/**
 * Property Catalog
 *
 * Introspects each target type once and caches its ordered, frozen property
 * descriptors for as long as the type is reachable.
 */
export class PropertyCatalog {
	private readonly cache = new WeakMap<TargetType, readonly PropertyDescriptor[]>();

	public constructor(
		private readonly strategies: readonly IntrospectionStrategy[] = PropertyCatalog.defaultStrategies(),
		private readonly logger: Logger = new Logger('PropertyCatalog')
	) {}

	/**
	 * Declared fields take precedence over instance reflection.
	 */
	public static defaultStrategies(): IntrospectionStrategy[] {
		return [new DeclaredFieldsStrategy(), new InstanceReflectionStrategy()];
	}

	public supports(type: TargetType): boolean {
		return this.strategies.some((strategy) => strategy.supports(type));
	}

	/**
	 * @throws IntrospectionError when no strategy supports the type or the chosen one fails
	 */
	public introspect(type: TargetType): readonly PropertyDescriptor[] {
		const cached = this.cache.get(type);
		if (cached) {
			return cached;
		}

		const strategy = this.strategies.find((candidate) => candidate.supports(type));
		if (!strategy) {
			throw new IntrospectionError(typeNameOf(type), 'no introspection strategy supports this type');
		}

		const properties = Object.freeze(strategy.introspect(type));
		this.cache.set(type, properties);
		this.logger.debug('Type Introspected', {
			type: typeNameOf(type),
			strategy: strategy.name,
			properties: properties.map((property) => property.name)
		});
		return properties;
	}
}
