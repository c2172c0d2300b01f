/**
 * Configuration provider interface.
 *
 * Settings are read through a provider so the source can be swapped per
 * environment: `EnvConfigProvider` for local runs and tests, a secrets
 * manager or file-backed provider in production.
 *
 * @example
 * ```ts
 * const provider = new EnvConfigProvider();
 * const mapping = await MappingConfig.fromProvider(provider);
 * const mappers = new RowMappers({ config: mapping });
 * ```
 */
export interface ConfigProvider {
	/**
	 * Gets a configuration value by key.
	 * @returns The value, or undefined if not found
	 */
	get(key: string): Promise<string | undefined>;

	/**
	 * Gets a required configuration value.
	 * @throws Error if the value is not found or empty
	 */
	getRequired(key: string): Promise<string>;

	/**
	 * Loads multiple configuration values at once.
	 */
	loadKeys(keys: string[]): Promise<Record<string, string | undefined>>;
}
