/**
 * Logging level utilities.
 */

export type LevelName = 'debug' | 'info' | 'warn' | 'error';

export type LevelNumber = 10 | 20 | 30 | 40;

/**
 * Mapping of log level names to their numeric values
 */
export type LogLevels = Record<LevelName, LevelNumber>;

/**
 * Log level constants (Pino-compatible numbering)
 */
export const levels: LogLevels = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40
};

const levelNames: Record<LevelNumber, LevelName> = {
	10: 'debug',
	20: 'info',
	30: 'warn',
	40: 'error'
};

export function getLevelName(level: LevelNumber): LevelName {
	return levelNames[level];
}

export function isLevelEnabled(current: LevelNumber, threshold: LevelNumber): boolean {
	return current >= threshold;
}

/**
 * Narrows an arbitrary string (env value, CLI flag) to a level name.
 * Matching is case-insensitive; unknown values yield undefined.
 */
export function parseLevelName(value: string | undefined): LevelName | undefined {
	if (!value) return undefined;
	const normalized = value.trim().toLowerCase();
	return isLevelName(normalized) ? normalized : undefined;
}

function isLevelName(value: string): value is LevelName {
	return Object.hasOwn(levels, value);
}
