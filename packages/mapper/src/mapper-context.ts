import type { PlanCache } from './plan-cache';
import type { PropertyCatalog } from './property-catalog';
import type { RowMaterializer } from './row-materializer';
import type { RowMapper, TargetType } from './types';

/**
 * Shared machinery a registry hands to the mappers it builds.
 */
export interface MapperContext {
	readonly catalog: PropertyCatalog;
	readonly plans: PlanCache;
	readonly materializer: RowMaterializer;
}

export interface RowMapperFactory {
	supports(type: TargetType): boolean;
	buildMapper<T extends object>(type: TargetType<T>, context: MapperContext): RowMapper<T>;
}
