/**
 * SQLSTATE classes after which a session cannot be trusted: connection
 * exceptions (08) and operator intervention (57P).
 */
const SESSION_ENDING_CODES = /^(08|57P)/;

/**
 * True when `error` means the connection itself failed, rather than one
 * statement on it.
 */
export function isConnectionError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	if ('code' in error && typeof error.code === 'string') {
		return SESSION_ENDING_CODES.test(error.code);
	}
	return /^Connection terminated/.test(error.message);
}
