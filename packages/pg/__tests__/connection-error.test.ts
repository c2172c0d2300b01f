import { describe, test, expect } from 'vitest';
import { isConnectionError } from '../src/connection-error';

function withCode(message: string, code: string): Error {
	return Object.assign(new Error(message), { code });
}

describe('isConnectionError()', () => {
	test('should recognize connection and operator intervention codes', () => {
		expect(isConnectionError(withCode('connection failure', '08006'))).toBe(true);
		expect(isConnectionError(withCode('admin shutdown', '57P01'))).toBe(true);
	});

	test('should recognize a terminated connection without a code', () => {
		expect(isConnectionError(new Error('Connection terminated unexpectedly'))).toBe(true);
	});

	test('should not flag statement errors', () => {
		expect(isConnectionError(withCode('duplicate key value', '23505'))).toBe(false);
		expect(isConnectionError(withCode('canceling statement due to statement timeout', '57014'))).toBe(false);
		expect(isConnectionError(new Error('insert failed'))).toBe(false);
		expect(isConnectionError('Connection terminated')).toBe(false);
	});
});
