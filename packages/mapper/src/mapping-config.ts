import { Type } from '@sinclair/typebox';
import { readSettings, type ConfigProvider } from '@rowbound/config';
import { columnNameMatches } from './naming';
import type { NamingConfig, NamingRules } from './types';

export interface MappingSettings {
	/** Require exact case when matching column labels (default: false) */
	readonly caseSensitive: boolean;
	/** Treat `user_id` and `userId` as the same name (default: true) */
	readonly camelCaseToUnderscore: boolean;
	/** Fail resolution when any column is left unmatched (default: false) */
	readonly strictMatching: boolean;
	/** Fail resolution when a property's type has no converter instead of passing raw values through (default: false) */
	readonly requireConverters: boolean;
}

export const defaultMappingSettings: MappingSettings = Object.freeze({
	caseSensitive: false,
	camelCaseToUnderscore: true,
	strictMatching: false,
	requireConverters: false
});

/**
 * Environment keys read by `MappingConfig.fromProvider()`.
 */
export const MappingSettingsSchema = Type.Object({
	ROWBOUND_CASE_SENSITIVE: Type.Boolean({ default: defaultMappingSettings.caseSensitive }),
	ROWBOUND_CAMEL_TO_UNDERSCORE: Type.Boolean({ default: defaultMappingSettings.camelCaseToUnderscore }),
	ROWBOUND_STRICT_MATCHING: Type.Boolean({ default: defaultMappingSettings.strictMatching }),
	ROWBOUND_REQUIRE_CONVERTERS: Type.Boolean({ default: defaultMappingSettings.requireConverters })
});

/**
 * Immutable mapping configuration. Doubles as the naming configuration the
 * plan resolver consults.
 *
 * @example
 * ```typescript
 * const config = new MappingConfig({ strictMatching: true });
 * const relaxed = config.with({ strictMatching: false });
 * const fromEnv = await MappingConfig.fromProvider(new EnvConfigProvider());
 * ```
 */
export class MappingConfig implements NamingConfig {
	public readonly settings: MappingSettings;

	public constructor(settings: Partial<MappingSettings> = {}) {
		this.settings = Object.freeze({ ...defaultMappingSettings, ...settings });
	}

	/**
	 * @throws ConfigError when a key holds something other than a boolean
	 */
	public static async fromProvider(provider: ConfigProvider): Promise<MappingConfig> {
		const values = await readSettings(provider, MappingSettingsSchema);
		return new MappingConfig({
			caseSensitive: values.ROWBOUND_CASE_SENSITIVE,
			camelCaseToUnderscore: values.ROWBOUND_CAMEL_TO_UNDERSCORE,
			strictMatching: values.ROWBOUND_STRICT_MATCHING,
			requireConverters: values.ROWBOUND_REQUIRE_CONVERTERS
		});
	}

	public get rules(): NamingRules {
		return {
			caseSensitive: this.settings.caseSensitive,
			camelCaseToUnderscore: this.settings.camelCaseToUnderscore
		};
	}

	public get requireConverters(): boolean {
		return this.settings.requireConverters;
	}

	public columnNameMatches(label: string, propertyName: string): boolean {
		return columnNameMatches(label, propertyName, this.settings);
	}

	public isStrictMatching(): boolean {
		return this.settings.strictMatching;
	}

	public with(overrides: Partial<MappingSettings>): MappingConfig {
		return new MappingConfig({ ...this.settings, ...overrides });
	}
}
