import type { LevelName, LevelNumber } from './levels';

/**
 * A single structured log record as handed to transports.
 */
export interface LogObject {
	time: number;
	level: LevelNumber;
	msg: string;
	name?: string;
	[key: string]: unknown;
}

/**
 * Destination for log records.
 */
export interface Transport {
	write(obj: LogObject): void;
	flush(): Promise<void>;
	close(): Promise<void>;
}

export interface LoggerOptions {
	level?: LevelName;
	/** Explicit transports; when omitted the global transports are used at write time */
	transports?: Transport[];
}

export interface LoggerGlobalOptions {
	level?: LevelName;
	transports?: Transport[];
}
