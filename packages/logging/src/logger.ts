import { levels, getLevelName, isLevelEnabled, type LevelName, type LevelNumber } from './levels';
import { consoleTransport } from './transports/console';
import type { LogObject, Transport, LoggerOptions, LoggerGlobalOptions } from './types';

export type { LogObject, Transport, LoggerOptions, LoggerGlobalOptions };

/**
 * Structured logger with Pino-inspired design.
 *
 * - Produces structured log objects
 * - Writes to configurable transports
 * - Immutable context via with()
 *
 * Loggers created without explicit transports resolve the global transports
 * on every write, so `Logger.configure()` affects loggers created earlier
 * (mappers and decorators build their default logger at construction time).
 */
export class Logger {
	private static globalTransports: Transport[] | null = null;
	private static globalLevel: LevelName = 'info';
	private static fallbackTransport: Transport | null = null;

	private readonly name: string;
	private readonly explicitLevel: LevelNumber | null;
	private readonly explicitTransports: Transport[] | null;
	private readonly context: Record<string, unknown>;

	constructor(name: string, options: LoggerOptions = {}, context: Record<string, unknown> = {}) {
		this.name = name;
		this.explicitLevel = options.level ? levels[options.level] : null;
		this.explicitTransports = options.transports ?? null;
		this.context = context;
	}

	/**
	 * Configure global defaults for all Logger instances.
	 * Call this once at startup.
	 */
	static configure(options: LoggerGlobalOptions): void {
		if (options.level) {
			Logger.globalLevel = options.level;
		}
		if (options.transports) {
			Logger.globalTransports = options.transports;
		}
	}

	/**
	 * Reset global configuration to defaults.
	 *
	 * Tests that call Logger.configure() must call Logger.reset() in afterEach()
	 * to prevent leaking transports into other suites.
	 */
	static reset(): void {
		Logger.globalLevel = 'info';
		Logger.globalTransports = null;
	}

	/**
	 * Flushes and closes the global transports.
	 *
	 * Uses Promise.allSettled so one failing transport does not keep the
	 * others from closing.
	 */
	static async shutdown(): Promise<void> {
		const transports = Logger.globalTransports ?? [];
		await Promise.allSettled(transports.map((transport) => transport.flush()));
		await Promise.allSettled(transports.map((transport) => transport.close()));
	}

	/**
	 * Creates a simple console-based logger at debug level.
	 */
	static console(name = 'App'): Logger {
		return new Logger(name, { level: 'debug' });
	}

	get level(): LevelName {
		return getLevelName(this.threshold);
	}

	isLevelEnabled(level: LevelName): boolean {
		return isLevelEnabled(levels[level], this.threshold);
	}

	debug(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.debug, msg, data);
	}

	info(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.info, msg, data);
	}

	warn(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.warn, msg, data);
	}

	error(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.error, msg, data);
	}

	/**
	 * Creates a new logger with additional context (immutable)
	 */
	with(data: Record<string, unknown>): Logger {
		return new Logger(this.name, this.inheritedOptions(), { ...this.context, ...data });
	}

	/**
	 * Creates a child logger with a new name (immutable).
	 * Inherits context, level and transports from the parent.
	 */
	child(name: string): Logger {
		return new Logger(name, this.inheritedOptions(), { ...this.context });
	}

	private get threshold(): LevelNumber {
		return this.explicitLevel ?? levels[Logger.globalLevel];
	}

	private get transports(): Transport[] {
		return this.explicitTransports ?? Logger.globalTransports ?? [Logger.defaultTransport()];
	}

	private inheritedOptions(): LoggerOptions {
		const options: LoggerOptions = {};
		if (this.explicitLevel !== null) {
			options.level = getLevelName(this.explicitLevel);
		}
		if (this.explicitTransports) {
			options.transports = this.explicitTransports;
		}
		return options;
	}

	private log(level: LevelNumber, msg: string, data?: Record<string, unknown>): void {
		if (!isLevelEnabled(level, this.threshold)) {
			return;
		}

		const logObj: LogObject = {
			time: Date.now(),
			level,
			msg,
			name: this.name,
			...this.context,
			...data
		};

		for (const transport of this.transports) {
			transport.write(logObj);
		}
	}

	private static defaultTransport(): Transport {
		Logger.fallbackTransport ??= consoleTransport();
		return Logger.fallbackTransport;
	}
}
