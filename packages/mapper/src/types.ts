/**
 * Mapper Types
 *
 * Core type definitions for reflective row mapping.
 * Result rows describe what a query returned; property descriptors describe
 * what a target type accepts; a mapping plan joins the two.
 */

// --- Field Types ---

export type FieldType = 'string' | 'number' | 'integer' | 'boolean' | 'date' | 'bigint' | 'uuid' | 'json' | 'any';

/**
 * A built-in field type, or the name a custom converter is registered under.
 */
export type TypeRef = FieldType | (string & {});

// --- Field Definition ---

/**
 * Declared shape of one property.
 */
export interface FieldDef {
	/** Column name override; the property name is matched when absent */
	readonly column: string | undefined;
	readonly type: TypeRef;
	/** Whether null may be written to the property */
	readonly nullable: boolean;
}

/**
 * Fluent field definition. `T` is the value type the property receives.
 */
export interface FieldBuilder<T = unknown> {
	readonly _def: FieldDef;
	readonly _type?: T;
	nullable(): FieldBuilder<T | null>;
}

export interface FieldColumnBuilder {
	string(): FieldBuilder<string>;
	number(): FieldBuilder<number>;
	integer(): FieldBuilder<number>;
	boolean(): FieldBuilder<boolean>;
	date(): FieldBuilder<Date>;
	bigint(): FieldBuilder<bigint>;
	uuid(): FieldBuilder<string>;
	json<T = unknown>(): FieldBuilder<T>;
	/** Untyped passthrough; nullable by default */
	any<T = unknown>(): FieldBuilder<T | null>;
	/** Property converted by the converter registered under `typeName` */
	custom<T>(typeName: string): FieldBuilder<T>;
}

export type FieldMap = Readonly<Record<string, FieldBuilder>>;

// --- Property Descriptor ---

/**
 * One mappable property of a target type. Frozen once introspected.
 */
export interface PropertyDescriptor {
	readonly name: string;
	readonly declaredType: TypeRef;
	readonly nullable: boolean;
	readonly readable: boolean;
	readonly writable: boolean;
	readonly explicitColumnName?: string;
}

// --- Result Rows ---

/**
 * Ordered column labels of a query result.
 */
export type ColumnSignature = readonly string[];

/**
 * One pre-fetched row. Column indexes are 1-based.
 */
export interface ResultRow {
	readonly columns: ColumnSignature;
	get(columnIndex: number): unknown;
}

// --- Converters ---

export interface ColumnConverter<T = unknown> {
	convert(row: ResultRow, columnIndex: number): T | null;
}

export interface ConverterRegistry {
	findConverter(type: TypeRef): ColumnConverter | undefined;
}

// --- Naming ---

export interface NamingRules {
	readonly caseSensitive: boolean;
	readonly camelCaseToUnderscore: boolean;
}

export interface NamingConfig {
	columnNameMatches(label: string, propertyName: string): boolean;
	isStrictMatching(): boolean;
}

// --- Mapping Plan ---

export interface PlanEntry {
	/** 1-based position in the column signature */
	readonly columnIndex: number;
	readonly column: string;
	readonly converter: ColumnConverter;
	/** True when no converter was registered and the raw value is passed through */
	readonly fallback: boolean;
	readonly property: PropertyDescriptor;
}

export interface MappingPlan {
	readonly typeName: string;
	readonly prefix: string;
	readonly columns: ColumnSignature;
	readonly entries: readonly PlanEntry[];
}

// --- Target Types ---

/**
 * A class mapped through its zero-argument constructor.
 * Any constructor is accepted here; ones needing arguments fail at instantiation.
 */
export type Constructor<T extends object = object> = new (...args: never[]) => T;

/**
 * Token for a read-only record shape declared with `replicated()`.
 */
export interface ReplicatedType<T extends object = object> {
	readonly $replicated: true;
	readonly $name: string;
	readonly $fields: FieldMap;
	/** Checks a materialized record against the declared fields */
	readonly $is: (value: unknown) => value is T;
}

export type TargetType<T extends object = object> = Constructor<T> | ReplicatedType<T>;

// --- Mappers ---

export interface RowMapper<T> {
	map(row: ResultRow): T;
	/** Returns a mapper bound to one resolved plan, reusable for every row of that shape */
	specializeFor(columns: ColumnSignature): RowMapper<T>;
}
