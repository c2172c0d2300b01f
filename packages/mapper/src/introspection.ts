/**
 * Introspection Strategies
 *
 * Each strategy turns one kind of target type into ordered property
 * descriptors. The catalog tries them in order and caches the first answer.
 */

import { isFieldMap } from './field';
import { IntrospectionError } from './mapper-error';
import { isReplicatedType, typeNameOf } from './target-type';
import type { Constructor, FieldMap, PropertyDescriptor, TargetType, TypeRef } from './types';

export interface IntrospectionStrategy {
	readonly name: string;
	supports(type: TargetType): boolean;
	/** @throws IntrospectionError when the type cannot be reflected */
	introspect(type: TargetType): PropertyDescriptor[];
}

interface AccessFlags {
	readonly readable: boolean;
	readonly writable: boolean;
}

function describeProperty(
	name: string,
	declaredType: TypeRef,
	nullable: boolean,
	access: AccessFlags,
	column: string | undefined
): PropertyDescriptor {
	const base = { name, declaredType, nullable, readable: access.readable, writable: access.writable };
	return Object.freeze(column === undefined ? base : { ...base, explicitColumnName: column });
}

/**
 * Accessor flags for `name` found on the prototype chain (stopping at
 * Object.prototype), or undefined when it is not an accessor there.
 */
function findAccessor(prototype: object | null, name: string): AccessFlags | undefined {
	for (let current = prototype; current && current !== Object.prototype; current = Object.getPrototypeOf(current)) {
		const descriptor = Object.getOwnPropertyDescriptor(current, name);
		if (descriptor) {
			if (descriptor.get || descriptor.set) {
				return { readable: descriptor.get !== undefined, writable: descriptor.set !== undefined };
			}
			return undefined;
		}
	}
	return undefined;
}

/**
 * Classes declaring a static `fields` map, and replicated shape tokens.
 * Properties come out in declaration order.
 *
 * @example
 * ```typescript
 * class Invoice {
 *   static fields = { number: field('invoice_no').string(), total: field().number() };
 *   number = '';
 *   total = 0;
 * }
 * ```
 */
export class DeclaredFieldsStrategy implements IntrospectionStrategy {
	public readonly name = 'declared-fields';

	public supports(type: TargetType): boolean {
		return isReplicatedType(type) || 'fields' in type;
	}

	public introspect(type: TargetType): PropertyDescriptor[] {
		const typeName = typeNameOf(type);
		if (isReplicatedType(type)) {
			return this.describe(typeName, type.$fields, () => ({ readable: true, writable: false }));
		}

		const fields: unknown = Reflect.get(type, 'fields');
		if (!isFieldMap(fields)) {
			throw new IntrospectionError(typeName, 'static fields must map property names to field builders');
		}
		const prototype: unknown = type.prototype;
		const owner = typeof prototype === 'object' ? prototype : null;
		return this.describe(
			typeName,
			fields,
			(name) => findAccessor(owner, name) ?? { readable: true, writable: true }
		);
	}

	private describe(
		typeName: string,
		fields: FieldMap,
		accessOf: (name: string) => AccessFlags
	): PropertyDescriptor[] {
		const entries = Object.entries(fields);
		if (entries.length === 0) {
			throw new IntrospectionError(typeName, 'type exposes no properties');
		}
		return entries.map(([name, builder]) =>
			describeProperty(name, builder._def.type, builder._def.nullable, accessOf(name), builder._def.column)
		);
	}
}

function inferType(value: unknown): TypeRef {
	switch (typeof value) {
		case 'string':
			return 'string';
		case 'number':
			return 'number';
		case 'boolean':
			return 'boolean';
		case 'bigint':
			return 'bigint';
		default:
			return value instanceof Date ? 'date' : 'any';
	}
}

function isNullableSample(value: unknown): boolean {
	return typeof value !== 'number' && typeof value !== 'boolean' && typeof value !== 'bigint';
}

function isStringRecord(value: unknown): value is Readonly<Record<string, string>> {
	return (
		typeof value === 'object' &&
		value !== null &&
		!Array.isArray(value) &&
		Object.values(value).every((column) => typeof column === 'string')
	);
}

/**
 * Plain classes with a zero-argument constructor. One instance is sampled:
 * its own enumerable data properties come first, then get/set accessors from
 * the prototype chain (subclass first). Value types are inferred from the
 * sample; numbers, booleans and bigints are non-nullable.
 *
 * A static `columnNames` record renames columns:
 *
 * @example
 * ```typescript
 * class Thing {
 *   static columnNames = { uuid: 'something' };
 *   name = '';
 *   value = 0;
 *   uuid?: string;
 * }
 * ```
 */
export class InstanceReflectionStrategy implements IntrospectionStrategy {
	public readonly name = 'instance-reflection';

	public supports(type: TargetType): boolean {
		return !isReplicatedType(type);
	}

	public introspect(type: TargetType): PropertyDescriptor[] {
		const typeName = typeNameOf(type);
		if (isReplicatedType(type)) {
			throw new IntrospectionError(typeName, 'replicated types declare their fields');
		}
		if (type.length > 0) {
			throw new IntrospectionError(typeName, `constructor requires ${type.length} argument(s)`);
		}

		const sample = this.sample(type, typeName);
		const columnNames = this.columnNames(type, typeName);
		const columnOf = (name: string): string | undefined =>
			Object.hasOwn(columnNames, name) ? columnNames[name] : undefined;

		const properties: PropertyDescriptor[] = [];
		const seen = new Set<string>();

		for (const name of Object.keys(sample)) {
			const value: unknown = Reflect.get(sample, name);
			if (typeof value === 'function') continue;
			seen.add(name);
			const writable = Object.getOwnPropertyDescriptor(sample, name)?.writable ?? true;
			properties.push(
				describeProperty(name, inferType(value), isNullableSample(value), { readable: true, writable }, columnOf(name))
			);
		}

		let prototype: object | null = Object.getPrototypeOf(sample);
		for (; prototype && prototype !== Object.prototype; prototype = Object.getPrototypeOf(prototype)) {
			for (const name of Object.getOwnPropertyNames(prototype)) {
				if (name === 'constructor' || seen.has(name)) continue;
				const descriptor = Object.getOwnPropertyDescriptor(prototype, name);
				if (!descriptor || (!descriptor.get && !descriptor.set)) continue;
				seen.add(name);
				const value = descriptor.get ? this.read(sample, name, typeName) : undefined;
				properties.push(
					describeProperty(
						name,
						inferType(value),
						isNullableSample(value),
						{ readable: descriptor.get !== undefined, writable: descriptor.set !== undefined },
						columnOf(name)
					)
				);
			}
		}

		if (properties.length === 0) {
			throw new IntrospectionError(typeName, 'type exposes no properties');
		}
		return properties;
	}

	private sample(type: Constructor, typeName: string): object {
		try {
			return new type();
		} catch (error) {
			throw new IntrospectionError(typeName, 'constructor threw while sampling an instance', error);
		}
	}

	private read(sample: object, name: string, typeName: string): unknown {
		try {
			return Reflect.get(sample, name);
		} catch (error) {
			throw new IntrospectionError(typeName, `getter '${name}' threw while sampling`, error);
		}
	}

	private columnNames(type: Constructor, typeName: string): Readonly<Record<string, string>> {
		if (!('columnNames' in type)) {
			return {};
		}
		const columnNames: unknown = type.columnNames;
		if (!isStringRecord(columnNames)) {
			throw new IntrospectionError(typeName, 'static columnNames must map property names to column names');
		}
		return columnNames;
	}
}
