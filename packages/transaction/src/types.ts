import type { IsolationLevel } from './isolation-level';

/**
 * The transaction primitive a session exposes.
 *
 * `inTransaction` begins a transaction at `level`, runs the callback, commits
 * when it resolves and rolls back when it rejects.
 */
export interface TransactionHandle {
	isInTransaction(): boolean;
	getTransactionIsolationLevel(): IsolationLevel;
	inTransaction<T>(level: IsolationLevel, callback: (handle: TransactionHandle) => Promise<T>): Promise<T>;
}

/** Returns the handle for the session the current call belongs to. */
export type HandleSupplier = () => TransactionHandle;

/** State of an open transaction on a handle. */
export interface TransactionFrame {
	readonly isolationLevel: IsolationLevel;
	readonly startedAt: number;
}

export type AsyncCall<A extends unknown[], R> = (...args: A) => Promise<R>;
