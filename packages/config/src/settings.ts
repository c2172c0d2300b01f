import type { Static, TObject } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { Logger } from '@rowbound/logging';
import type { ConfigProvider } from './types';

/**
 * One failed setting, keyed by the config key it came from.
 */
export interface ConfigIssue {
	key: string;
	message: string;
	value: unknown;
}

/**
 * Thrown when settings read from a provider do not satisfy their schema.
 * Carries every issue, not only the first.
 */
export class ConfigError extends Error {
	public override readonly name = 'ConfigError';

	constructor(public readonly issues: readonly ConfigIssue[]) {
		super(`Invalid configuration: ${issues.map((issue) => `${issue.key}: ${issue.message}`).join('; ')}`);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, ConfigError);
		}
	}
}

/**
 * Reads the keys of a TypeBox object schema from a provider and returns the
 * typed settings.
 *
 * Unset and empty values are dropped so schema defaults apply; remaining
 * strings are converted to the declared types ("true" to boolean, "10" to
 * number) before validation.
 *
 * @example
 * ```ts
 * const PoolSettings = Type.Object({
 *   PG_POOL_SIZE: Type.Integer({ default: 10, minimum: 1 }),
 *   PG_HOST: Type.String()
 * });
 * const settings = await readSettings(new EnvConfigProvider(), PoolSettings);
 * ```
 *
 * @throws ConfigError listing every key that failed validation
 */
export async function readSettings<T extends TObject>(
	provider: ConfigProvider,
	schema: T,
	logger: Logger = new Logger('Settings')
): Promise<Static<T>> {
	const keys = Object.keys(schema.properties);
	const raw = await provider.loadKeys(keys);

	const present: Record<string, string> = {};
	for (const key of keys) {
		const value = raw[key];
		if (value !== undefined && value !== '') {
			present[key] = value;
		}
	}

	const converted = Value.Convert(schema, Value.Default(schema, present));
	if (Value.Check(schema, converted)) {
		logger.debug('Settings Loaded', { keys: Object.keys(present) });
		return converted;
	}

	const issues = [...Value.Errors(schema, converted)].map((error) => ({
		key: error.path.replace(/^\//, ''),
		message: error.message,
		value: error.value
	}));
	throw new ConfigError(issues);
}
