import { Logger } from '@rowbound/logging';
import { ColumnConverters, passthroughConverter } from './converters';
import { IncompleteMappingError, MissingConverterError, NoMatchingColumnsError } from './mapper-error';
import { MappingConfig } from './mapping-config';
import { PropertyCatalog } from './property-catalog';
import { effectiveColumnName, typeNameOf } from './target-type';
import type { ColumnSignature, ConverterRegistry, MappingPlan, NamingConfig, PlanEntry, TargetType } from './types';

export interface ResolveOptions {
	/** Only columns starting with this prefix (case-insensitive) are considered; it is stripped before matching */
	readonly prefix?: string;
	/** Overrides the resolver-wide setting */
	readonly requireConverters?: boolean;
}

export interface PlanResolverOptions {
	catalog?: PropertyCatalog;
	converters?: ConverterRegistry;
	naming?: NamingConfig;
	/** Fail on missing converters instead of passing raw values through */
	requireConverters?: boolean;
	logger?: Logger;
}

/**
 * Label with `prefix` removed, or undefined when the column is not part of the prefix.
 * A label equal to the prefix has nothing left to match and is skipped.
 */
export function stripPrefix(label: string, prefix: string): string | undefined {
	if (prefix === '') {
		return label;
	}
	if (label.length > prefix.length && label.toLowerCase().startsWith(prefix.toLowerCase())) {
		return label.slice(prefix.length);
	}
	return undefined;
}

/**
 * Plan Resolver
 *
 * Cross-references a column signature with a type's property catalog.
 *
 * Each column binds to the first property, in catalog order, whose effective
 * column name matches. A property binds at most once: a later column matching
 * an already bound property stays unmatched. Entries keep column order.
 */
export class PlanResolver {
	private readonly catalog: PropertyCatalog;
	private readonly converters: ConverterRegistry;
	private readonly naming: NamingConfig;
	private readonly requireConverters: boolean;
	private readonly logger: Logger;

	public constructor(options: PlanResolverOptions = {}) {
		const config = new MappingConfig();
		this.catalog = options.catalog ?? new PropertyCatalog();
		this.converters = options.converters ?? new ColumnConverters();
		this.naming = options.naming ?? config;
		this.requireConverters = options.requireConverters ?? config.requireConverters;
		this.logger = options.logger ?? new Logger('PlanResolver');
	}

	/**
	 * @throws IntrospectionError when the type cannot be reflected
	 * @throws MissingConverterError when converters are required and one is missing
	 * @throws NoMatchingColumnsError when no column of a non-empty signature matched
	 * @throws IncompleteMappingError in strict mode when any column is unmatched
	 */
	public resolve(type: TargetType, columns: ColumnSignature, options: ResolveOptions = {}): MappingPlan {
		const typeName = typeNameOf(type);
		const properties = this.catalog.introspect(type);
		const prefix = options.prefix ?? '';
		const requireConverters = options.requireConverters ?? this.requireConverters;

		const entries: PlanEntry[] = [];
		const bound = new Set<string>();
		const unmatched: string[] = [];

		columns.forEach((label, offset) => {
			const columnIndex = offset + 1;
			const name = stripPrefix(label, prefix);
			const property =
				name === undefined
					? undefined
					: properties.find((candidate) => this.naming.columnNameMatches(name, effectiveColumnName(candidate)));

			if (!property) {
				unmatched.push(label);
				return;
			}
			if (bound.has(property.name)) {
				this.logger.debug('Column Skipped: Property Already Bound', {
					type: typeName,
					column: label,
					property: property.name
				});
				unmatched.push(label);
				return;
			}

			const converter = this.converters.findConverter(property.declaredType);
			if (!converter) {
				if (requireConverters) {
					throw new MissingConverterError(typeName, property.name, property.declaredType);
				}
				this.logger.debug('Converter Fallback', {
					type: typeName,
					property: property.name,
					declaredType: property.declaredType
				});
			}

			bound.add(property.name);
			entries.push(
				Object.freeze({
					columnIndex,
					column: label,
					converter: converter ?? passthroughConverter,
					fallback: converter === undefined,
					property
				})
			);
		});

		if (entries.length === 0 && columns.length > 0) {
			throw new NoMatchingColumnsError(typeName, columns, prefix);
		}
		if (this.naming.isStrictMatching() && unmatched.length > 0) {
			throw new IncompleteMappingError(typeName, 'strict matching left columns unmatched', unmatched);
		}

		this.logger.debug('Mapping Plan Resolved', {
			type: typeName,
			prefix,
			columns: columns.length,
			matched: entries.length
		});

		return Object.freeze({
			typeName,
			prefix,
			columns: Object.freeze([...columns]),
			entries: Object.freeze(entries)
		});
	}
}
