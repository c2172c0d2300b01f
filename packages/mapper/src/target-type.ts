import type { PropertyDescriptor, ReplicatedType, TargetType } from './types';

export function isReplicatedType<T extends object>(type: TargetType<T>): type is ReplicatedType<T> {
	return typeof type === 'object' && type.$replicated === true;
}

export function typeNameOf(type: TargetType): string {
	if (isReplicatedType(type)) {
		return type.$name;
	}
	return type.name || 'anonymous';
}

/**
 * Column name a property is matched against: the explicit override, else its own name.
 */
export function effectiveColumnName(property: PropertyDescriptor): string {
	return property.explicitColumnName ?? property.name;
}
