import { describe, test, expect, vi } from 'vitest';
import { IsolationLevel } from '../src/isolation-level';
import { TransactionDecorator } from '../src/transaction-decorator';
import { TransactionIsolationConflictError } from '../src/transaction-error';
import { FakeHandle } from './helpers/fake-handle';

function setup(): { handle: FakeHandle; transactions: TransactionDecorator } {
	const handle = new FakeHandle();
	return { handle, transactions: new TransactionDecorator(() => handle) };
}

describe('TransactionDecorator', () => {
	test('should open a transaction when none is active', async () => {
		const { handle, transactions } = setup();
		const save = transactions.decorate('Users.save', IsolationLevel.UNSPECIFIED, async (id: number, name: string) => ({
			active: handle.isInTransaction(),
			saved: `${id}:${name}`
		}));

		await expect(save(1, 'ann')).resolves.toEqual({ active: true, saved: '1:ann' });
		expect(handle.statements).toEqual(['BEGIN', 'COMMIT']);
	});

	test('should begin at the requested level', async () => {
		const { handle, transactions } = setup();
		const report = transactions.decorate('Reports.run', IsolationLevel.REPEATABLE_READ, async () =>
			handle.getTransactionIsolationLevel()
		);

		await expect(report()).resolves.toBe(IsolationLevel.REPEATABLE_READ);
		expect(handle.statements).toEqual(['BEGIN ISOLATION LEVEL REPEATABLE READ', 'COMMIT']);
	});

	test('should roll back when the call fails', async () => {
		const { handle, transactions } = setup();
		const fail = transactions.decorate('Users.delete', IsolationLevel.UNSPECIFIED, async () => {
			throw new Error('constraint violated');
		});

		await expect(fail()).rejects.toThrow('constraint violated');
		expect(handle.statements).toEqual(['BEGIN', 'ROLLBACK']);
		expect(handle.isInTransaction()).toBe(false);
	});

	test('should decorate each call independently', async () => {
		const { handle, transactions } = setup();
		const touch = transactions.decorate('Users.touch', IsolationLevel.UNSPECIFIED, async () => undefined);

		await touch();
		await touch();

		expect(handle.statements).toEqual(['BEGIN', 'COMMIT', 'BEGIN', 'COMMIT']);
	});

	describe('nesting', () => {
		test('should join an outer transaction at the same level', async () => {
			const { handle, transactions } = setup();
			const inner = transactions.decorate('Accounts.debit', IsolationLevel.SERIALIZABLE, async (amount: number) => -amount);
			const outer = transactions.decorate('Accounts.transfer', IsolationLevel.SERIALIZABLE, async () => inner(5));

			await expect(outer()).resolves.toBe(-5);
			expect(handle.statements).toEqual(['BEGIN ISOLATION LEVEL SERIALIZABLE', 'COMMIT']);
		});

		test('should join an outer transaction when no level is requested', async () => {
			const { handle, transactions } = setup();
			const inner = transactions.decorate('Audit.record', IsolationLevel.UNSPECIFIED, async () =>
				handle.getTransactionIsolationLevel()
			);
			const outer = transactions.decorate('Accounts.close', IsolationLevel.SERIALIZABLE, () => inner());

			await expect(outer()).resolves.toBe(IsolationLevel.SERIALIZABLE);
			expect(handle.statements).toEqual(['BEGIN ISOLATION LEVEL SERIALIZABLE', 'COMMIT']);
		});

		test('should join a transaction opened on the handle directly', async () => {
			const { handle, transactions } = setup();
			const lookup = transactions.decorate('Users.find', IsolationLevel.READ_COMMITTED, async () => 'found');

			const result = await handle.inTransaction(IsolationLevel.READ_COMMITTED, () => lookup());

			expect(result).toBe('found');
			expect(handle.statements).toEqual(['BEGIN ISOLATION LEVEL READ COMMITTED', 'COMMIT']);
		});

		test('should reject a conflicting level before the call runs', async () => {
			const { handle, transactions } = setup();
			const audit = vi.fn(async () => 'audited');
			const inner = transactions.decorate('Accounts.audit', IsolationLevel.SERIALIZABLE, audit);
			const outer = transactions.decorate('Accounts.update', IsolationLevel.READ_COMMITTED, () => inner());

			const error = await outer().then(
				() => undefined,
				(failure: unknown) => failure
			);

			expect(error).toBeInstanceOf(TransactionIsolationConflictError);
			expect(error).toMatchObject({
				requested: IsolationLevel.SERIALIZABLE,
				current: IsolationLevel.READ_COMMITTED,
				method: 'Accounts.audit',
				message:
					'[Accounts.audit] requested isolation level SERIALIZABLE inside a transaction running at READ COMMITTED'
			});
			expect(audit).not.toHaveBeenCalled();
			expect(handle.statements).toEqual(['BEGIN ISOLATION LEVEL READ COMMITTED', 'ROLLBACK']);
		});
	});

	describe('inTransaction()', () => {
		test('should pass the handle to the callback', async () => {
			const { handle, transactions } = setup();

			const same = await transactions.inTransaction(IsolationLevel.SERIALIZABLE, async (inner) => inner === handle);

			expect(same).toBe(true);
			expect(handle.statements).toEqual(['BEGIN ISOLATION LEVEL SERIALIZABLE', 'COMMIT']);
		});

		test('should apply the same joining rules', async () => {
			const { transactions } = setup();

			await expect(
				transactions.inTransaction(IsolationLevel.READ_UNCOMMITTED, () =>
					transactions.inTransaction(IsolationLevel.REPEATABLE_READ, async () => 'never')
				)
			).rejects.toMatchObject({ method: 'inTransaction' });
		});
	});
});
