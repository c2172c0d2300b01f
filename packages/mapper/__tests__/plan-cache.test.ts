import { describe, test, expect, vi } from 'vitest';
import { NoMatchingColumnsError } from '../src/mapper-error';
import { PlanCache } from '../src/plan-cache';
import { PlanResolver } from '../src/plan-resolver';
import { Thing, User } from './helpers/fixtures';

function createCache() {
	const resolver = new PlanResolver();
	const resolve = vi.spyOn(resolver, 'resolve');
	return { cache: new PlanCache(resolver), resolve };
}

describe('PlanCache', () => {
	test('should resolve a shape once and reuse the plan', () => {
		const { cache, resolve } = createCache();

		const first = cache.getOrResolve(User, ['user_id', 'display_name']);
		const second = cache.getOrResolve(User, ['user_id', 'display_name']);

		expect(second).toBe(first);
		expect(resolve).toHaveBeenCalledTimes(1);
	});

	test('should key on signature content rather than array identity', () => {
		const { cache, resolve } = createCache();
		const columns = ['user_id'];

		cache.getOrResolve(User, columns);
		cache.getOrResolve(User, [...columns]);

		expect(resolve).toHaveBeenCalledTimes(1);
	});

	test('should resolve again for a different signature, prefix or type', () => {
		const { cache, resolve } = createCache();

		cache.getOrResolve(User, ['user_id']);
		cache.getOrResolve(User, ['user_id', 'display_name']);
		cache.getOrResolve(User, ['u_user_id'], { prefix: 'u_' });
		cache.getOrResolve(Thing, ['name']);

		expect(resolve).toHaveBeenCalledTimes(4);
	});

	test('should not cache failed resolutions', () => {
		const { cache, resolve } = createCache();

		expect(() => cache.getOrResolve(User, ['nope'])).toThrow(NoMatchingColumnsError);
		expect(() => cache.getOrResolve(User, ['nope'])).toThrow(NoMatchingColumnsError);

		expect(resolve).toHaveBeenCalledTimes(2);
		expect(cache.has(User, ['nope'])).toBe(false);
	});

	test('should report cached shapes', () => {
		const { cache } = createCache();
		cache.getOrResolve(User, ['user_id'], { prefix: '' });

		expect(cache.has(User, ['user_id'])).toBe(true);
		expect(cache.has(User, ['user_id'], { prefix: 'u_' })).toBe(false);
	});
});
