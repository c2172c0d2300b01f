import { inspect } from 'node:util';
import type { Transport, LogObject } from '../types';
import type { LevelNumber } from '../levels';

export interface ConsoleTransportOptions {
	pretty?: boolean;
	json?: boolean;
	/** Depth for object inspection (default: 4) */
	depth?: number;
	/** Show colors in pretty mode (default: auto-detect TTY) */
	colors?: boolean;
	/** Line sink (default: console.log) */
	output?: (line: string) => void;
}

const ANSI = {
	reset: '\x1b[0m',
	gray: '\x1b[90m',
	red: '\x1b[31m',
	yellow: '\x1b[33m',
	magenta: '\x1b[35m',
	cyan: '\x1b[36m',
	white: '\x1b[37m'
} as const;

const levelColors: Record<LevelNumber, string> = {
	10: ANSI.magenta,
	20: ANSI.cyan,
	30: ANSI.yellow,
	40: ANSI.red
};

const levelChars: Record<LevelNumber, string> = {
	10: 'D',
	20: 'I',
	30: 'W',
	40: 'E'
};

export interface FormatOptions {
	colors: boolean;
	depth: number;
}

function paint(text: string, color: string, options: FormatOptions): string {
	return options.colors ? `${color}${text}${ANSI.reset}` : text;
}

function formatTime(timestamp: number): string {
	const date = new Date(timestamp);
	const hours = date.getHours().toString().padStart(2, '0');
	const minutes = date.getMinutes().toString().padStart(2, '0');
	const seconds = date.getSeconds().toString().padStart(2, '0');
	return `${hours}:${minutes}:${seconds}`;
}

function formatValue(value: unknown, options: FormatOptions): string {
	if (value === null || value === undefined) {
		return String(value);
	}
	if (typeof value === 'string') {
		return value;
	}
	if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
		return String(value);
	}
	return inspect(value, { colors: options.colors, depth: options.depth, breakLength: Infinity });
}

/**
 * Renders one record as `HH:MM:SS:L:Name message: key:value ...`, followed by
 * the error's stack on its own line when the record carries an `error` or `err`.
 */
export function formatPretty(obj: LogObject, options: FormatOptions): string {
	const { time, level, msg, name, error, err, ...context } = obj;

	const parts = Object.entries(context).map(
		([key, value]) => `${paint(`${key}:`, ANSI.white, options)}${formatValue(value, options)}`
	);
	const contextStr = parts.length > 0 ? `: ${parts.join(' ')}` : '';

	const message =
		level === 40 ? paint(msg, ANSI.red, options) : level === 30 ? paint(msg, ANSI.yellow, options) : msg;

	let output =
		`${paint(formatTime(time), ANSI.gray, options)}:` +
		`${paint(levelChars[level], levelColors[level], options)}:` +
		`${paint(name ?? 'Application', ANSI.yellow, options)} ${message}${contextStr}`;

	const errorObj = error ?? err;
	if (errorObj instanceof Error) {
		output += '\n' + inspect(errorObj, { colors: options.colors, depth: options.depth });
	}

	return output;
}

/**
 * JSON line output. Errors are expanded to name/message/stack and bigints
 * are written as strings, since JSON.stringify rejects both as-is.
 */
export function formatJson(obj: LogObject): string {
	return JSON.stringify(obj, (_key, value: unknown) => {
		if (value instanceof Error) {
			return { name: value.name, message: value.message, stack: value.stack };
		}
		if (typeof value === 'bigint') {
			return value.toString();
		}
		return value;
	});
}

function isPrettyMode(options: ConsoleTransportOptions): boolean {
	if (options.pretty !== undefined) return options.pretty;
	if (options.json !== undefined) return !options.json;
	return process.env.NODE_ENV !== 'production';
}

function shouldUseColors(options: ConsoleTransportOptions): boolean {
	if (options.colors !== undefined) return options.colors;
	return process.stdout.isTTY ?? false;
}

/**
 * Console transport - outputs to stdout with pretty or JSON formatting.
 *
 * @example
 * ```ts
 * // Auto-detect mode (pretty outside production)
 * consoleTransport()
 *
 * // JSON for production
 * consoleTransport({ json: true })
 * ```
 */
export function consoleTransport(options: ConsoleTransportOptions = {}): Transport {
	const pretty = isPrettyMode(options);
	const formatOptions: FormatOptions = {
		colors: shouldUseColors(options),
		depth: options.depth ?? 4
	};
	const output = options.output ?? ((line: string) => console.log(line));

	return {
		write(obj: LogObject): void {
			output(pretty ? formatPretty(obj, formatOptions) : formatJson(obj));
		},

		async flush(): Promise<void> {
			// Console writes are synchronous
		},

		async close(): Promise<void> {
			// Nothing to release
		}
	};
}
