/**
 * @rowbound/pg - node-postgres adapter
 */

export type { PgQueryable, PgPool, PgPoolClient } from './types';
export { PgHandle } from './pg-handle';
export { PgDatabase, type PgDatabaseOptions } from './pg-database';
export { PgSettingsSchema, readPgSettings, toPoolConfig, type PgSettings } from './pg-settings';
export { queryAs } from './query';
export { isConnectionError } from './connection-error';
