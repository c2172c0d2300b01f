import type { IsolationLevel } from './isolation-level';

/**
 * Thrown when a call asks for an isolation level different from the one the
 * enclosing transaction runs at. The wrapped call never runs.
 */
export class TransactionIsolationConflictError extends Error {
	public override readonly name = 'TransactionIsolationConflictError';

	public constructor(
		public readonly requested: IsolationLevel,
		public readonly current: IsolationLevel,
		public readonly method: string
	) {
		super(
			`[${method}] requested isolation level ${requested} inside a transaction running at ${current}`
		);
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, TransactionIsolationConflictError);
		}
	}
}
