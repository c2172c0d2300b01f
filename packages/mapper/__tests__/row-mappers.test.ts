import { describe, test, expect, vi } from 'vitest';
import { BeanMapper } from '../src/bean-mapper';
import { field } from '../src/field';
import {
	IncompleteMappingError,
	MapperError,
	MissingConverterError,
	NoMatchingColumnsError,
	PropertyWriteError
} from '../src/mapper-error';
import { MappingConfig } from '../src/mapping-config';
import { replicated } from '../src/replicator';
import { ResultSet } from '../src/result-set';
import { RowMappers } from '../src/row-mappers';
import { SAMPLE_UUID, Thing, User, Wallet, captureError } from './helpers/fixtures';

describe('RowMappers', () => {
	test('should map a whole result set', () => {
		const mappers = new RowMappers().register(BeanMapper.factory(Thing));
		const rows = ResultSet.of(
			['name', 'value', 'something'],
			[
				['alice', 42, SAMPLE_UUID],
				['bob', 7, null]
			]
		);

		const things = mappers.mapAll(Thing, rows);

		expect(things.map((thing) => [thing.name, thing.value, thing.uuid])).toEqual([
			['alice', 42, SAMPLE_UUID],
			['bob', 7, null]
		]);
	});

	test('should resolve the plan once per result set', () => {
		const mappers = new RowMappers().register(BeanMapper.factory(User));
		const getOrResolve = vi.spyOn(mappers.context.plans, 'getOrResolve');
		const rows = ResultSet.of(
			['user_id', 'display_name'],
			[
				[1, 'a'],
				[2, 'b'],
				[3, 'c']
			]
		);

		mappers.mapAll(User, rows);

		expect(getOrResolve).toHaveBeenCalledTimes(1);
		expect(mappers.context.plans.has(User, rows.columns)).toBe(true);
	});

	test('should return an empty list for an empty result set', () => {
		const mappers = new RowMappers().register(BeanMapper.factory(User));
		expect(mappers.mapAll(User, ResultSet.of(['user_id'], []))).toEqual([]);
	});

	test('should support replicated types without registration', () => {
		const Point = replicated('Point', { x: field().number(), y: field().number() });
		const points = new RowMappers().mapAll(Point, ResultSet.of(['x', 'y'], [[1, 2]]));
		expect(points).toEqual([{ x: 1, y: 2 }]);
	});

	test('should fail the row instead of rounding or inventing numbers', () => {
		class Ledger {
			static fields = { id: field().integer(), total: field().number() };
			id = 0;
			total = 0;
		}
		const mappers = new RowMappers().register(BeanMapper.factory(Ledger));

		const rounded = captureError(
			() => mappers.mapAll(Ledger, ResultSet.of(['id', 'total'], [['9007199254740993', 1]])),
			PropertyWriteError
		);
		expect([rounded.property, rounded.failure]).toEqual(['id', 'conversion-failed']);

		const invented = captureError(
			() => mappers.mapAll(Ledger, ResultSet.of(['id', 'total'], [[1, []]])),
			PropertyWriteError
		);
		expect([invented.property, invented.failure]).toEqual(['total', 'conversion-failed']);
	});

	describe('lookup', () => {
		test('should return undefined from findFor when nothing supports the type', () => {
			expect(new RowMappers().findFor(User)).toBeUndefined();
		});

		test('should throw from mapperFor when nothing supports the type', () => {
			const error = (): unknown => new RowMappers().mapperFor(User);
			expect(error).toThrow(MapperError);
			expect(error).toThrow('[User] no row mapper registered for type');
		});

		test('should prefer the most recently registered factory', () => {
			const rows = ResultSet.of(['u_user_id', 'u_display_name'], [[5, 'eve']]);
			const mappers = new RowMappers().register(BeanMapper.factory(User));

			expect(() => mappers.mapAll(User, rows)).toThrow(NoMatchingColumnsError);

			mappers.register(BeanMapper.factory(User, 'u_'));
			expect(mappers.mapAll(User, rows)).toEqual([Object.assign(new User(), { userId: 5, displayName: 'eve' })]);
		});
	});

	describe('configuration', () => {
		test('should apply strict matching', () => {
			const mappers = new RowMappers({ config: new MappingConfig({ strictMatching: true }) }).register(
				BeanMapper.factory(User)
			);
			const rows = ResultSet.of(['user_id', 'extra'], [[1, 'x']]);

			expect(() => mappers.mapAll(User, rows)).toThrow(IncompleteMappingError);
		});

		test('should apply required converters', () => {
			const mappers = new RowMappers({ config: new MappingConfig({ requireConverters: true }) }).register(
				BeanMapper.factory(Wallet)
			);

			expect(() => mappers.mapAll(Wallet, ResultSet.of(['balance'], [['12.00']]))).toThrow(MissingConverterError);
		});

		test('should pass raw values through for unknown types by default', () => {
			const mappers = new RowMappers().register(BeanMapper.factory(Wallet));
			const [wallet] = mappers.mapAll(Wallet, ResultSet.of(['owner', 'balance'], [['ann', '12.00']]));

			expect(wallet?.balance).toBe('12.00');
		});
	});
});
