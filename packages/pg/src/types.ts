import type { QueryArrayConfig, QueryArrayResult } from 'pg';

/**
 * The part of a pg client the handle talks to. `pg.Client` and
 * `pg.PoolClient` both satisfy it.
 */
export interface PgQueryable {
	query(config: QueryArrayConfig): Promise<QueryArrayResult>;
}

export interface PgPoolClient extends PgQueryable {
	release(err?: Error | boolean): void;
}

/** The part of `pg.Pool` the database wrapper uses. */
export interface PgPool {
	connect(): Promise<PgPoolClient>;
	end(): Promise<void>;
}
