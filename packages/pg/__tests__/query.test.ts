import { describe, test, expect } from 'vitest';
import { BeanMapper, RowMappers } from '@rowbound/mapper';
import { PgHandle } from '../src/pg-handle';
import { queryAs } from '../src/query';
import { FakePgClient } from './helpers/fake-pg';

class User {
	userId = 0;
	displayName = '';
}

describe('queryAs()', () => {
	test('should map selected rows to the target type', async () => {
		const sql = 'SELECT user_id, display_name FROM users ORDER BY user_id';
		const client = new FakePgClient().respond(sql, {
			columns: ['user_id', 'display_name'],
			rows: [
				[1, 'ann'],
				['2', 'bob']
			]
		});
		const mappers = new RowMappers().register(BeanMapper.factory(User));

		const users = await queryAs(new PgHandle(client), mappers, User, sql);

		expect(users).toEqual([
			Object.assign(new User(), { userId: 1, displayName: 'ann' }),
			Object.assign(new User(), { userId: 2, displayName: 'bob' })
		]);
	});
});
