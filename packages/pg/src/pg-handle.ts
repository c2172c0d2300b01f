import { Logger } from '@rowbound/logging';
import { ResultSet } from '@rowbound/mapper';
import { FrameTransactionHandle, IsolationLevel, type FrameTransactionHandleOptions } from '@rowbound/transaction';
import type { PgQueryable } from './types';

/**
 * Transaction handle over one pg connection.
 *
 * Queries run in array row mode so that result sets keep every column,
 * including duplicate labels, in select order.
 *
 * @example
 * ```typescript
 * const handle = new PgHandle(client);
 * const users = await handle.inTransaction(IsolationLevel.SERIALIZABLE, async (tx) =>
 *   mappers.mapAll(User, await tx.select('SELECT user_id, display_name FROM users'))
 * );
 * ```
 */
export class PgHandle extends FrameTransactionHandle {
	public constructor(
		private readonly client: PgQueryable,
		options: FrameTransactionHandleOptions = {}
	) {
		super({ ...options, logger: options.logger ?? new Logger('PgHandle') });
	}

	public async select(sql: string, params: readonly unknown[] = []): Promise<ResultSet> {
		const result = await this.client.query({ text: sql, values: [...params], rowMode: 'array' });
		return ResultSet.of(
			result.fields.map((field) => field.name),
			result.rows
		);
	}

	/**
	 * Runs a statement and returns the number of affected rows.
	 */
	public async execute(sql: string, params: readonly unknown[] = []): Promise<number> {
		const result = await this.client.query({ text: sql, values: [...params], rowMode: 'array' });
		return result.rowCount ?? 0;
	}

	protected async begin(level: IsolationLevel): Promise<void> {
		await this.execute(level === IsolationLevel.UNSPECIFIED ? 'BEGIN' : `BEGIN ISOLATION LEVEL ${level}`);
	}

	protected async commit(): Promise<void> {
		await this.execute('COMMIT');
	}

	protected async rollback(): Promise<void> {
		await this.execute('ROLLBACK');
	}
}
