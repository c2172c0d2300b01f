import { describe, test, expect } from 'vitest';
import { Type } from '@sinclair/typebox';
import { EnvConfigProvider } from '../src/env-config';
import { readSettings, ConfigError } from '../src/settings';

const PoolSettings = Type.Object({
	PG_HOST: Type.String(),
	PG_POOL_SIZE: Type.Integer({ default: 10 }),
	PG_SSL: Type.Boolean({ default: false })
});

describe('readSettings', () => {
	test('should apply defaults for unset keys', async () => {
		const settings = await readSettings(new EnvConfigProvider({ PG_HOST: 'localhost' }), PoolSettings);
		expect(settings).toEqual({ PG_HOST: 'localhost', PG_POOL_SIZE: 10, PG_SSL: false });
	});

	test('should convert strings to the declared types', async () => {
		const settings = await readSettings(
			new EnvConfigProvider({ PG_HOST: 'db', PG_POOL_SIZE: '25', PG_SSL: 'true' }),
			PoolSettings
		);
		expect(settings).toEqual({ PG_HOST: 'db', PG_POOL_SIZE: 25, PG_SSL: true });
	});

	test('should treat empty values as unset', async () => {
		const settings = await readSettings(
			new EnvConfigProvider({ PG_HOST: 'db', PG_POOL_SIZE: '' }),
			PoolSettings
		);
		expect(settings.PG_POOL_SIZE).toBe(10);
	});

	test('should throw ConfigError naming the invalid key', async () => {
		const provider = new EnvConfigProvider({ PG_HOST: 'db', PG_SSL: 'sometimes' });

		const error = await readSettings(provider, PoolSettings).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ConfigError);
		if (!(error instanceof ConfigError)) return;
		expect(error.issues.map((issue) => issue.key)).toEqual(['PG_SSL']);
		expect(error.issues[0]?.value).toBe('sometimes');
		expect(error.message).toBe('Invalid configuration: PG_SSL: Expected boolean');
	});

	test('should report a missing required key', async () => {
		const error = await readSettings(new EnvConfigProvider({}), PoolSettings).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ConfigError);
		if (!(error instanceof ConfigError)) return;
		expect(error.issues.map((issue) => issue.key)).toContain('PG_HOST');
	});
});
