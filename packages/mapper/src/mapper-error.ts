/**
 * MapperError
 *
 * Base error for everything that can go wrong while introspecting, resolving
 * or materializing. Carries the target type, the member involved (when there
 * is one) and the offending value.
 *
 * @example
 * ```typescript
 * throw new MapperError('User', 'age', 'conversion failed', 'number', 'abc');
 * // MapperError: [User.age] conversion failed - expected number, got: "abc"
 * ```
 */
export class MapperError extends Error {
	public override readonly name: string = 'MapperError';

	/**
	 * @param target - Name of the type being mapped (or the column, for converter errors)
	 * @param member - Property or column involved, if any
	 * @param reason - Description of why the mapping failed
	 * @param expectedType - Expected data type (optional)
	 * @param actualValue - The actual value that caused the error (optional)
	 * @param cause - Underlying error (optional)
	 */
	public constructor(
		public readonly target: string,
		public readonly member: string | undefined,
		public readonly reason: string,
		public readonly expectedType?: string,
		public readonly actualValue?: unknown,
		cause?: unknown
	) {
		super(
			MapperError.formatMessage(target, member, reason, expectedType, actualValue),
			cause === undefined ? undefined : { cause }
		);

		// Maintains proper stack trace for where error was thrown (V8 engines)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}

	private static formatMessage(
		target: string,
		member: string | undefined,
		reason: string,
		expectedType?: string,
		actualValue?: unknown
	): string {
		const location = member === undefined ? target : `${target}.${member}`;
		let message = `[${location}] ${reason}`;

		if (expectedType !== undefined) {
			message += ` - expected ${expectedType}`;
		}

		if (actualValue !== undefined) {
			message += `, got: ${MapperError.formatValue(actualValue)}`;
		}

		return message;
	}

	private static formatValue(value: unknown): string {
		if (value === null) {
			return 'null';
		}
		if (typeof value === 'string') {
			return `"${value}"`;
		}
		if (value instanceof Date) {
			return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
		}
		if (typeof value === 'object') {
			try {
				return JSON.stringify(value);
			} catch {
				return '[object]';
			}
		}
		return String(value);
	}
}

/**
 * The target type cannot be reflected into property descriptors.
 */
export class IntrospectionError extends MapperError {
	public override readonly name: string = 'IntrospectionError';

	public constructor(target: string, reason: string, cause?: unknown) {
		super(target, undefined, reason, undefined, undefined, cause);
	}
}

/**
 * None of a non-empty column list matched a property.
 */
export class NoMatchingColumnsError extends MapperError {
	public override readonly name: string = 'NoMatchingColumnsError';

	public constructor(
		target: string,
		public readonly columns: readonly string[],
		public readonly prefix: string
	) {
		super(
			target,
			undefined,
			prefix === ''
				? `no columns matched (columns: ${columns.join(', ')})`
				: `no columns matched with prefix '${prefix}' (columns: ${columns.join(', ')})`
		);
	}
}

/**
 * Strict matching left columns unconsumed, or a required property got no column.
 */
export class IncompleteMappingError extends MapperError {
	public override readonly name: string = 'IncompleteMappingError';

	public constructor(
		target: string,
		reason: string,
		public readonly unmatched: readonly string[]
	) {
		super(target, undefined, `${reason}: ${unmatched.join(', ')}`);
	}
}

/**
 * No converter is registered for a property's declared type and converters are required.
 */
export class MissingConverterError extends MapperError {
	public override readonly name: string = 'MissingConverterError';

	public constructor(target: string, property: string, typeRef: string) {
		super(target, property, 'no converter registered', typeRef);
	}
}

/**
 * The target type has no usable zero-argument constructor, or construction threw.
 */
export class InstantiationError extends MapperError {
	public override readonly name: string = 'InstantiationError';

	public constructor(target: string, reason: string, cause?: unknown) {
		super(target, undefined, reason, undefined, undefined, cause);
	}
}

export type PropertyWriteFailure =
	| 'conversion-failed'
	| 'null-value'
	| 'type-mismatch'
	| 'not-writable'
	| 'setter-failed';

const writeFailureReasons: Record<PropertyWriteFailure, string> = {
	'conversion-failed': 'conversion failed',
	'null-value': 'null written to non-nullable property',
	'type-mismatch': 'value does not match declared type',
	'not-writable': 'property is not writable',
	'setter-failed': 'setter threw'
};

/**
 * A converted value could not be written to one property of one row.
 */
export class PropertyWriteError extends MapperError {
	public override readonly name: string = 'PropertyWriteError';

	public constructor(
		target: string,
		public readonly property: string,
		public readonly failure: PropertyWriteFailure,
		expectedType?: string,
		actualValue?: unknown,
		cause?: unknown
	) {
		super(target, property, writeFailureReasons[failure], expectedType, actualValue, cause);
	}
}

/**
 * Thrown by built-in converters when a raw column value cannot be coerced.
 */
export class ConversionError extends MapperError {
	public override readonly name: string = 'ConversionError';

	public constructor(column: string, reason: string, expectedType: string, actualValue: unknown, cause?: unknown) {
		super(column, undefined, reason, expectedType, actualValue, cause);
	}
}
