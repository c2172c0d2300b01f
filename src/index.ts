/**
 * rowbound - Reflective row mapping and declarative transactions
 *
 * This file re-exports all packages for convenience. Individual packages can
 * be imported directly:
 *
 * @example
 * import { RowMappers, BeanMapper } from '@rowbound/mapper';
 * import { TransactionDecorator, IsolationLevel } from '@rowbound/transaction';
 * import { PgDatabase } from '@rowbound/pg';
 */

export * from '@rowbound/logging';
export * from '@rowbound/config';
export * from '@rowbound/mapper';
export * from '@rowbound/transaction';
export * from '@rowbound/pg';
