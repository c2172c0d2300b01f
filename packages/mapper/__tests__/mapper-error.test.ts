import { describe, test, expect } from 'vitest';
import {
	ConversionError,
	IncompleteMappingError,
	InstantiationError,
	IntrospectionError,
	MapperError,
	MissingConverterError,
	NoMatchingColumnsError,
	PropertyWriteError
} from '../src/mapper-error';

describe('MapperError', () => {
	describe('construction', () => {
		test('should create error with all properties', () => {
			const error = new MapperError('User', 'age', 'conversion failed', 'number', 'abc');

			expect(error.target).toBe('User');
			expect(error.member).toBe('age');
			expect(error.reason).toBe('conversion failed');
			expect(error.expectedType).toBe('number');
			expect(error.actualValue).toBe('abc');
		});

		test('should be instance of Error with the correct name', () => {
			const error = new MapperError('User', 'id', 'test error');
			expect(error).toBeInstanceOf(Error);
			expect(error.name).toBe('MapperError');
		});

		test('should keep the cause', () => {
			const cause = new Error('driver failure');
			expect(new MapperError('User', undefined, 'failed', undefined, undefined, cause).cause).toBe(cause);
		});
	});

	describe('message format', () => {
		test('should include target, member, expected type and value', () => {
			const error = new MapperError('User', 'age', 'conversion failed', 'number', 'abc');
			expect(error.message).toBe('[User.age] conversion failed - expected number, got: "abc"');
		});

		test('should omit the member when there is none', () => {
			expect(new MapperError('User', undefined, 'cannot map').message).toBe('[User] cannot map');
		});

		test('should show null values', () => {
			expect(new MapperError('User', 'email', 'missing', 'string', null).message).toBe(
				'[User.email] missing - expected string, got: null'
			);
		});

		test('should render dates and objects', () => {
			expect(new MapperError('T', 'at', 'bad', undefined, new Date(0)).message).toBe(
				'[T.at] bad, got: 1970-01-01T00:00:00.000Z'
			);
			expect(new MapperError('T', 'meta', 'bad', undefined, { a: 1 }).message).toBe('[T.meta] bad, got: {"a":1}');
		});

		test('should fall back when an object cannot be serialized', () => {
			expect(new MapperError('T', 'meta', 'bad', undefined, { big: 1n }).message).toBe('[T.meta] bad, got: [object]');
		});
	});
});

describe('error taxonomy', () => {
	test('IntrospectionError', () => {
		const error = new IntrospectionError('Empty', 'type exposes no properties');
		expect(error).toBeInstanceOf(MapperError);
		expect(error.name).toBe('IntrospectionError');
		expect(error.message).toBe('[Empty] type exposes no properties');
	});

	test('NoMatchingColumnsError', () => {
		const error = new NoMatchingColumnsError('User', ['foo', 'bar'], '');
		expect(error.name).toBe('NoMatchingColumnsError');
		expect(error.columns).toEqual(['foo', 'bar']);
		expect(error.message).toBe('[User] no columns matched (columns: foo, bar)');
	});

	test('NoMatchingColumnsError with a prefix', () => {
		expect(new NoMatchingColumnsError('User', ['foo'], 'u_').message).toBe(
			"[User] no columns matched with prefix 'u_' (columns: foo)"
		);
	});

	test('IncompleteMappingError', () => {
		const error = new IncompleteMappingError('User', 'strict matching left columns unmatched', ['extra']);
		expect(error.name).toBe('IncompleteMappingError');
		expect(error.unmatched).toEqual(['extra']);
		expect(error.message).toBe('[User] strict matching left columns unmatched: extra');
	});

	test('MissingConverterError', () => {
		const error = new MissingConverterError('Wallet', 'balance', 'money');
		expect(error.name).toBe('MissingConverterError');
		expect(error.message).toBe('[Wallet.balance] no converter registered - expected money');
	});

	test('InstantiationError', () => {
		const cause = new Error('boom');
		const error = new InstantiationError('Fragile', 'constructor threw', cause);
		expect(error.name).toBe('InstantiationError');
		expect(error.cause).toBe(cause);
		expect(error.message).toBe('[Fragile] constructor threw');
	});

	test('PropertyWriteError', () => {
		const error = new PropertyWriteError('Counter', 'count', 'null-value', 'number', null);
		expect(error.name).toBe('PropertyWriteError');
		expect(error.property).toBe('count');
		expect(error.failure).toBe('null-value');
		expect(error.message).toBe('[Counter.count] null written to non-nullable property - expected number, got: null');
	});

	test('ConversionError', () => {
		const error = new ConversionError('age', 'coercion failed', 'number', 'abc');
		expect(error.name).toBe('ConversionError');
		expect(error.message).toBe('[age] coercion failed - expected number, got: "abc"');
	});
});
