import type { ConfigProvider } from './types';

/**
 * Configuration provider that reads from environment variables.
 *
 * Reads `process.env` by default. Pass a record to pin the values, which is
 * how tests supply settings without touching the real environment.
 *
 * @example
 * ```ts
 * const config = new EnvConfigProvider();
 * const url = await config.getRequired('DATABASE_URL');
 *
 * const fixed = new EnvConfigProvider({ ROWBOUND_STRICT_MATCHING: 'true' });
 * ```
 */
export class EnvConfigProvider implements ConfigProvider {
	constructor(private readonly env: Record<string, string | undefined> = process.env) {}

	async get(key: string): Promise<string | undefined> {
		return this.env[key];
	}

	/**
	 * Gets a required environment variable.
	 * @throws Error if the variable is not set or empty
	 */
	async getRequired(key: string): Promise<string> {
		const value = this.env[key];
		if (value === undefined || value === '') {
			throw new Error(`Required config '${key}' is not set. Add it to your .env file or environment.`);
		}
		return value;
	}

	async loadKeys(keys: string[]): Promise<Record<string, string | undefined>> {
		const result: Record<string, string | undefined> = {};
		for (const key of keys) {
			result[key] = this.env[key];
		}
		return result;
	}
}
