import type { RowMappers, TargetType } from '@rowbound/mapper';
import type { PgHandle } from './pg-handle';

/**
 * Runs a select and maps every row to `type`.
 */
export async function queryAs<T extends object>(
	handle: PgHandle,
	mappers: RowMappers,
	type: TargetType<T>,
	sql: string,
	params: readonly unknown[] = []
): Promise<T[]> {
	const rows = await handle.select(sql, params);
	return mappers.mapAll(type, rows);
}
