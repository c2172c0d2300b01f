import type { LoggerOptions, Transport } from './types';
import { parseLevelName, type LevelName } from './levels';
import { consoleTransport } from './transports/console';
import { filterTransport } from './transports/filter';

/**
 * Minimal ConfigProvider interface for logging configuration.
 * Defined locally to avoid a circular dependency with @rowbound/config.
 */
interface ConfigProvider {
	loadKeys(keys: string[]): Promise<Record<string, string | undefined>>;
}

/**
 * Logging configuration read from a config provider.
 */
export interface LogConfig {
	/** Log level threshold. Default: 'info' */
	level: LevelName;
	/** Logger names to include (empty = all) */
	includeNames: string[];
	/** Logger names to exclude */
	excludeNames: string[];
	/** JSON lines instead of pretty output */
	jsonFormat: boolean;
}

const LOG_CONFIG_KEYS = ['LOG_LEVEL', 'LOG_INCLUDE_NAMES', 'LOG_EXCLUDE_NAMES', 'LOG_JSON'];

function parseList(value: string | undefined): string[] {
	if (!value || value.trim() === '') return [];
	return value
		.split(',')
		.map((s) => s.trim())
		.filter(Boolean);
}

/**
 * Read logging configuration from a config provider.
 *
 * Reads these keys:
 * - LOG_LEVEL: debug | info | warn | error (default: info)
 * - LOG_INCLUDE_NAMES: comma-separated logger names to include
 * - LOG_EXCLUDE_NAMES: comma-separated logger names to exclude
 * - LOG_JSON: true | false (default: false)
 */
export async function readLogConfig(config: ConfigProvider): Promise<LogConfig> {
	const values = await config.loadKeys(LOG_CONFIG_KEYS);

	return {
		level: parseLevelName(values.LOG_LEVEL) ?? 'info',
		includeNames: parseList(values.LOG_INCLUDE_NAMES),
		excludeNames: parseList(values.LOG_EXCLUDE_NAMES),
		jsonFormat: values.LOG_JSON === 'true'
	};
}

/**
 * Build logger options from a LogConfig.
 *
 * @example
 * ```ts
 * const logConfig = await readLogConfig(new EnvConfigProvider());
 * Logger.configure(buildLoggerOptions(logConfig));
 * ```
 */
export function buildLoggerOptions(config: LogConfig, output?: (line: string) => void): LoggerOptions {
	let transport: Transport = consoleTransport({
		json: config.jsonFormat,
		pretty: !config.jsonFormat,
		output
	});

	if (config.includeNames.length > 0 || config.excludeNames.length > 0) {
		transport = filterTransport(transport, {
			includeNames: config.includeNames.length > 0 ? config.includeNames : undefined,
			excludeNames: config.excludeNames.length > 0 ? config.excludeNames : undefined
		});
	}

	return {
		level: config.level,
		transports: [transport]
	};
}
