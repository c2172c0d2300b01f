import pg, { type PoolConfig } from 'pg';
import { Logger } from '@rowbound/logging';
import type { ConfigProvider } from '@rowbound/config';
import type { IsolationLevel } from '@rowbound/transaction';
import { isConnectionError } from './connection-error';
import { PgHandle } from './pg-handle';
import { readPgSettings, toPoolConfig } from './pg-settings';
import type { PgPool } from './types';

export interface PgDatabaseOptions {
	/** Level reported for transactions begun without one (default: READ COMMITTED) */
	defaultIsolationLevel?: IsolationLevel;
	logger?: Logger;
}

/**
 * Pool wrapper handing out one `PgHandle` per unit of work.
 *
 * @example
 * ```typescript
 * const db = await PgDatabase.fromProvider(new EnvConfigProvider());
 * const count = await db.withHandle((handle) => handle.execute('DELETE FROM sessions WHERE expired'));
 * await db.close();
 * ```
 */
export class PgDatabase {
	private readonly logger: Logger;

	public constructor(
		private readonly pool: PgPool,
		private readonly options: PgDatabaseOptions = {}
	) {
		this.logger = options.logger ?? new Logger('PgDatabase');
	}

	public static create(config: PoolConfig, options: PgDatabaseOptions = {}): PgDatabase {
		return new PgDatabase(new pg.Pool(config), options);
	}

	public static async fromProvider(provider: ConfigProvider, options: PgDatabaseOptions = {}): Promise<PgDatabase> {
		const settings = await readPgSettings(provider);
		return PgDatabase.create(toPoolConfig(settings), options);
	}

	/**
	 * Acquires a connection, runs `fn` with a handle over it and releases the
	 * connection when `fn` settles.
	 *
	 * A connection whose rollback failed, or that failed at the connection
	 * level, is released with the error so the pool destroys it.
	 */
	public async withHandle<T>(fn: (handle: PgHandle) => Promise<T>): Promise<T> {
		const client = await this.pool.connect();
		const handle = new PgHandle(client, {
			defaultIsolationLevel: this.options.defaultIsolationLevel,
			logger: this.logger.child('PgHandle')
		});
		let discard: Error | undefined;
		try {
			return await fn(handle);
		} catch (error) {
			if (error instanceof Error && isConnectionError(error)) {
				discard = error;
			}
			throw error;
		} finally {
			discard ??= handle.brokenBy;
			if (discard) {
				this.logger.warn('Connection Discarded', { err: discard });
			}
			client.release(discard);
		}
	}

	public async close(): Promise<void> {
		await this.pool.end();
		this.logger.info('Pool Closed');
	}
}
