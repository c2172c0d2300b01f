export { Logger, type LogObject, type Transport, type LoggerOptions, type LoggerGlobalOptions } from './logger';
export {
	levels,
	getLevelName,
	isLevelEnabled,
	parseLevelName,
	type LevelName,
	type LevelNumber,
	type LogLevels
} from './levels';
export {
	transports,
	consoleTransport,
	filterTransport,
	formatPretty,
	formatJson
} from './transports/index';
export type { ConsoleTransportOptions, FilterOptions } from './transports/index';
export { readLogConfig, buildLoggerOptions, type LogConfig } from './config';
