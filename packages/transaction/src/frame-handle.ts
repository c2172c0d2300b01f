import { Logger } from '@rowbound/logging';
import { IsolationLevel, isCompatibleLevel } from './isolation-level';
import { TransactionIsolationConflictError } from './transaction-error';
import type { TransactionFrame, TransactionHandle } from './types';

export interface FrameTransactionHandleOptions {
	/** Level reported for `UNSPECIFIED` transactions and outside a transaction (default: READ COMMITTED) */
	defaultIsolationLevel?: IsolationLevel;
	logger?: Logger;
}

/**
 * Base for handles over a single session. Owns the transaction frame and the
 * begin/commit/rollback sequence; subclasses issue the statements.
 *
 * Nested `inTransaction` calls join the open frame. A rollback that fails is
 * logged and the callback's error is rethrown.
 */
export abstract class FrameTransactionHandle implements TransactionHandle {
	protected readonly logger: Logger;
	protected readonly defaultIsolationLevel: IsolationLevel;
	private frame: TransactionFrame | null = null;
	private rollbackFailure: Error | undefined;

	protected constructor(options: FrameTransactionHandleOptions = {}) {
		this.logger = options.logger ?? new Logger('TransactionHandle');
		this.defaultIsolationLevel = options.defaultIsolationLevel ?? IsolationLevel.READ_COMMITTED;
	}

	/** `level` is what the caller asked for, possibly `UNSPECIFIED`. */
	protected abstract begin(level: IsolationLevel): Promise<void>;
	protected abstract commit(): Promise<void>;
	protected abstract rollback(): Promise<void>;

	public isInTransaction(): boolean {
		return this.frame !== null;
	}

	/**
	 * The error of the last failed rollback. Once set, the session may still
	 * be inside a transaction and should not be reused.
	 */
	public get brokenBy(): Error | undefined {
		return this.rollbackFailure;
	}

	public getTransactionIsolationLevel(): IsolationLevel {
		return this.frame?.isolationLevel ?? this.defaultIsolationLevel;
	}

	public async inTransaction<T>(level: IsolationLevel, callback: (handle: this) => Promise<T>): Promise<T> {
		if (this.frame) {
			if (!isCompatibleLevel(level, this.frame.isolationLevel)) {
				throw new TransactionIsolationConflictError(level, this.frame.isolationLevel, 'inTransaction');
			}
			return callback(this);
		}

		const frame: TransactionFrame = {
			isolationLevel: level === IsolationLevel.UNSPECIFIED ? this.defaultIsolationLevel : level,
			startedAt: Date.now()
		};
		// Claimed before BEGIN resolves; overlapping calls join this frame.
		this.frame = frame;
		try {
			await this.begin(level);
		} catch (error) {
			this.frame = null;
			throw error;
		}

		try {
			const result = await callback(this);
			await this.commit();
			this.logger.debug('Transaction Committed', {
				isolationLevel: frame.isolationLevel,
				durationMs: Date.now() - frame.startedAt
			});
			return result;
		} catch (error) {
			await this.rollbackAfter(error, frame);
			throw error;
		} finally {
			this.frame = null;
		}
	}

	private async rollbackAfter(cause: unknown, frame: TransactionFrame): Promise<void> {
		try {
			await this.rollback();
			this.logger.debug('Transaction Rolled Back', {
				isolationLevel: frame.isolationLevel,
				reason: cause instanceof Error ? cause.message : String(cause)
			});
		} catch (rollbackError) {
			this.rollbackFailure =
				rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError), { cause: rollbackError });
			this.logger.error('Transaction Rollback Failed', {
				isolationLevel: frame.isolationLevel,
				err: rollbackError
			});
		}
	}
}
