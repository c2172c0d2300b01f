import { Logger } from '@rowbound/logging';
import { IsolationLevel, isCompatibleLevel } from './isolation-level';
import { TransactionIsolationConflictError } from './transaction-error';
import type { AsyncCall, HandleSupplier, TransactionHandle } from './types';

export interface TransactionDecoratorOptions {
	logger?: Logger;
}

/**
 * Wraps calls so they run inside a transaction.
 *
 * With no transaction open the call runs through `handle.inTransaction()`.
 * Inside a transaction the call joins it when it asks for no particular level
 * or for the level already in effect; any other level is rejected with
 * `TransactionIsolationConflictError` before the call runs.
 *
 * @example
 * ```typescript
 * const transactions = new TransactionDecorator(() => handle);
 * const transfer = transactions.decorate('Accounts.transfer', IsolationLevel.SERIALIZABLE, async (from, to, amount) => {
 *   await debit(from, amount);
 *   await credit(to, amount);
 * });
 * ```
 */
export class TransactionDecorator {
	private readonly logger: Logger;

	public constructor(
		private readonly handles: HandleSupplier,
		options: TransactionDecoratorOptions = {}
	) {
		this.logger = options.logger ?? new Logger('TransactionDecorator');
	}

	public decorate<A extends unknown[], R>(name: string, level: IsolationLevel, call: AsyncCall<A, R>): AsyncCall<A, R> {
		return (...args: A) => this.run(name, level, () => call(...args));
	}

	/**
	 * Runs `callback` in a transaction at `level`, under the same joining
	 * rules as decorated calls.
	 */
	public inTransaction<T>(level: IsolationLevel, callback: (handle: TransactionHandle) => Promise<T>): Promise<T> {
		return this.run('inTransaction', level, callback);
	}

	private async run<T>(
		name: string,
		level: IsolationLevel,
		body: (handle: TransactionHandle) => Promise<T>
	): Promise<T> {
		const handle = this.handles();

		if (handle.isInTransaction()) {
			const current = handle.getTransactionIsolationLevel();
			if (!isCompatibleLevel(level, current)) {
				throw new TransactionIsolationConflictError(level, current, name);
			}
			this.logger.debug('Transaction Joined', { method: name, isolationLevel: current });
			return body(handle);
		}

		this.logger.debug('Transaction Started', { method: name, isolationLevel: level });
		return handle.inTransaction(level, body);
	}
}
