/**
 * Transaction isolation levels. Values are the SQL spelling used in
 * `BEGIN ISOLATION LEVEL ...`; `UNSPECIFIED` defers to the handle's default.
 */
export const IsolationLevel = {
	UNSPECIFIED: 'UNSPECIFIED',
	READ_UNCOMMITTED: 'READ UNCOMMITTED',
	READ_COMMITTED: 'READ COMMITTED',
	REPEATABLE_READ: 'REPEATABLE READ',
	SERIALIZABLE: 'SERIALIZABLE'
} as const;

export type IsolationLevel = (typeof IsolationLevel)[keyof typeof IsolationLevel];

const knownLevels: ReadonlySet<string> = new Set(Object.values(IsolationLevel));

export function isIsolationLevel(value: unknown): value is IsolationLevel {
	return typeof value === 'string' && knownLevels.has(value);
}

/**
 * True when a call asking for `requested` may run inside a transaction
 * already open at `current`.
 */
export function isCompatibleLevel(requested: IsolationLevel, current: IsolationLevel): boolean {
	return requested === IsolationLevel.UNSPECIFIED || requested === current;
}
