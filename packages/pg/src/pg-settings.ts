import { Type, type Static } from '@sinclair/typebox';
import { readSettings, type ConfigProvider } from '@rowbound/config';
import type { PoolConfig } from 'pg';

export const PgSettingsSchema = Type.Object({
	PG_HOST: Type.String({ default: 'localhost' }),
	PG_PORT: Type.Integer({ default: 5432, minimum: 1, maximum: 65535 }),
	PG_DATABASE: Type.String({ minLength: 1 }),
	PG_USER: Type.String({ minLength: 1 }),
	PG_PASSWORD: Type.Optional(Type.String()),
	PG_POOL_SIZE: Type.Integer({ default: 10, minimum: 1 })
});

export type PgSettings = Static<typeof PgSettingsSchema>;

/**
 * Reads connection settings from `PG_*` keys.
 *
 * @throws ConfigError when a required key is missing or a value is invalid
 */
export function readPgSettings(provider: ConfigProvider): Promise<PgSettings> {
	return readSettings(provider, PgSettingsSchema);
}

export function toPoolConfig(settings: PgSettings): PoolConfig {
	return {
		host: settings.PG_HOST,
		port: settings.PG_PORT,
		database: settings.PG_DATABASE,
		user: settings.PG_USER,
		password: settings.PG_PASSWORD,
		max: settings.PG_POOL_SIZE
	};
}
