/**
 * @rowbound/mapper - Reflective row mapping
 *
 * Matches result columns to the properties of a target type, resolves a
 * reusable plan per column signature and materializes rows through it.
 *
 * @example
 * ```typescript
 * import { RowMappers, BeanMapper, ResultSet } from '@rowbound/mapper';
 *
 * class User {
 *   id = 0;
 *   displayName = '';
 * }
 *
 * const mappers = new RowMappers().register(BeanMapper.factory(User));
 * const users = mappers.mapAll(User, ResultSet.of(['id', 'display_name'], [[1, 'alice']]));
 * ```
 */

// --- Types ---

export type {
	FieldType,
	TypeRef,
	FieldDef,
	FieldBuilder,
	FieldColumnBuilder,
	FieldMap,
	PropertyDescriptor,
	ColumnSignature,
	ResultRow,
	ColumnConverter,
	ConverterRegistry,
	NamingRules,
	NamingConfig,
	PlanEntry,
	MappingPlan,
	Constructor,
	ReplicatedType,
	TargetType,
	RowMapper
} from './types';
export type { MapperContext, RowMapperFactory } from './mapper-context';

// --- Naming & Fields ---

export { columnNameMatches, camelToSnake, defaultNamingRules } from './naming';
export { field, isFieldBuilder, isFieldMap } from './field';
export { isReplicatedType, typeNameOf, effectiveColumnName } from './target-type';

// --- Configuration ---

export {
	MappingConfig,
	MappingSettingsSchema,
	defaultMappingSettings,
	type MappingSettings
} from './mapping-config';

// --- Converters ---

export {
	coerceNumber,
	coerceInteger,
	coerceBigInt,
	coerceDate,
	coerceBoolean,
	coerceString,
	coerceUuid,
	coerceJson,
	matchesDeclaredType
} from './coercion';
export { ColumnConverters, passthroughConverter, valueConverter } from './converters';

// --- Results ---

export { ResultSet, rowOf, sameSignature } from './result-set';

// --- Resolution ---

export {
	DeclaredFieldsStrategy,
	InstanceReflectionStrategy,
	type IntrospectionStrategy
} from './introspection';
export { PropertyCatalog } from './property-catalog';
export { PlanResolver, stripPrefix, type ResolveOptions, type PlanResolverOptions } from './plan-resolver';
export { PlanCache } from './plan-cache';
export { RowMaterializer } from './row-materializer';

// --- Mappers ---

export { BeanMapper, BoundBeanMapper } from './bean-mapper';
export { replicated, ReplicatorMapper, type InferRecord, type ReplicatedRecord } from './replicator';
export { RowMappers, type RowMappersOptions } from './row-mappers';

// --- Errors ---

export {
	MapperError,
	IntrospectionError,
	NoMatchingColumnsError,
	IncompleteMappingError,
	MissingConverterError,
	InstantiationError,
	PropertyWriteError,
	ConversionError,
	type PropertyWriteFailure
} from './mapper-error';
