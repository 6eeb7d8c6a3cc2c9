// =============================================================================
// SQL ADAPTER METHODS -- Shared CRUD logic for SQL-based adapters
// =============================================================================
// The SQL is the same whichever driver runs it, so an adapter only has to
// provide a two-method SqlExecutor.

import type { SortBy, StrataTransactionAdapter, Where } from "./adapter.js";
import {
	buildOrderByClause,
	buildWhereClause,
	keysToCamel,
	keysToSnake,
	toSnakeCase,
} from "./adapter-utils.js";
import { createTableResolver } from "./schema-prefix.js";

// =============================================================================
// SQL EXECUTOR INTERFACE
// =============================================================================

export interface SqlExecutor {
	/** Execute a SELECT (or RETURNING) statement and return rows. */
	query<T = Record<string, unknown>>(sql: string, params: unknown[]): Promise<T[]>;
	/** Execute an INSERT/UPDATE/DELETE and return the affected row count. */
	mutate(sql: string, params: unknown[]): Promise<number>;
}

/** PostgreSQL accepts at most 65535 bind parameters per statement. */
const MAX_BIND_PARAMS = 65_535;

// =============================================================================
// SHARED CRUD BUILDER
// =============================================================================

/**
 * Build the standard adapter methods from a SqlExecutor.
 * Returns everything a StrataTransactionAdapter needs except `id` and `options`.
 */
export function buildSqlAdapterMethods(
	executor: SqlExecutor,
	getSchema: () => string,
): Omit<StrataTransactionAdapter, "id" | "options"> {
	return {
		create: async <T extends Record<string, unknown>>({
			model,
			data,
		}: {
			model: string;
			data: T;
		}): Promise<T> => {
			const t = createTableResolver(getSchema());
			const snakeData = keysToSnake(data);
			const columns = Object.keys(snakeData);
			const values = Object.values(snakeData);

			if (columns.length === 0) {
				throw new Error(`Cannot insert empty data into ${model}`);
			}

			const columnList = columns.map((c) => `"${c}"`).join(", ");
			const placeholders = columns.map((_, i) => `$${i + 1}`).join(", ");
			const query = `INSERT INTO ${t(model)} (${columnList}) VALUES (${placeholders}) RETURNING *`;

			const rows = await executor.query(query, values);
			const row = rows[0];
			if (!row) {
				throw new Error(`Insert into ${model} returned no rows`);
			}
			return keysToCamel(row) as T;
		},

		createMany: async ({
			model,
			data,
		}: {
			model: string;
			data: Record<string, unknown>[];
		}): Promise<number> => {
			const first = data[0];
			if (!first) return 0;

			const t = createTableResolver(getSchema());
			const fields = Object.keys(first);
			const columnList = fields.map((f) => `"${toSnakeCase(f)}"`).join(", ");
			const rowsPerStatement = Math.max(1, Math.floor(MAX_BIND_PARAMS / fields.length));

			let inserted = 0;
			for (let start = 0; start < data.length; start += rowsPerStatement) {
				const chunk = data.slice(start, start + rowsPerStatement);
				const params: unknown[] = [];
				const tuples = chunk.map((row) => {
					const placeholders = fields.map((field) => {
						params.push(row[field] ?? null);
						return `$${params.length}`;
					});
					return `(${placeholders.join(", ")})`;
				});
				inserted += await executor.mutate(
					`INSERT INTO ${t(model)} (${columnList}) VALUES ${tuples.join(", ")}`,
					params,
				);
			}
			return inserted;
		},

		findOne: async <T>({
			model,
			where,
			forUpdate,
		}: {
			model: string;
			where: Where[];
			forUpdate?: boolean;
		}): Promise<T | null> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where);
			let query = `SELECT * FROM ${t(model)} WHERE ${clause} LIMIT 1`;
			if (forUpdate) {
				query += " FOR UPDATE";
			}

			const rows = await executor.query(query, params);
			const row = rows[0];
			if (!row) return null;
			return keysToCamel(row) as T;
		},

		findMany: async <T>({
			model,
			where,
			limit,
			offset,
			sortBy,
		}: {
			model: string;
			where?: Where[];
			limit?: number;
			offset?: number;
			sortBy?: SortBy | SortBy[];
		}): Promise<T[]> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where ?? []);
			let query = `SELECT * FROM ${t(model)} WHERE ${clause}`;

			const orderBy = buildOrderByClause(sortBy);
			if (orderBy) {
				query += ` ORDER BY ${orderBy}`;
			}

			if (limit !== undefined) {
				params.push(limit);
				query += ` LIMIT $${params.length}`;
			}

			if (offset !== undefined) {
				params.push(offset);
				query += ` OFFSET $${params.length}`;
			}

			const rows = await executor.query(query, params);
			return rows.map((r) => keysToCamel(r) as T);
		},

		update: async <T>({
			model,
			where,
			update: updateData,
		}: {
			model: string;
			where: Where[];
			update: Record<string, unknown>;
		}): Promise<T | null> => {
			const snakeData = keysToSnake(updateData);
			const setCols = Object.keys(snakeData);
			const setValues = Object.values(snakeData);

			if (setCols.length === 0) {
				throw new Error(`Cannot update ${model} with empty data`);
			}

			const setClause = setCols.map((c, i) => `"${c}" = $${i + 1}`).join(", ");
			const { clause: whereClause, params: whereParams } = buildWhereClause(
				where,
				setCols.length + 1,
			);

			const t = createTableResolver(getSchema());
			const query = `UPDATE ${t(model)} SET ${setClause} WHERE ${whereClause} RETURNING *`;

			const rows = await executor.query(query, [...setValues, ...whereParams]);
			const row = rows[0];
			if (!row) return null;
			return keysToCamel(row) as T;
		},

		delete: async ({ model, where }: { model: string; where: Where[] }): Promise<number> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where);
			return executor.mutate(`DELETE FROM ${t(model)} WHERE ${clause}`, params);
		},

		count: async ({ model, where }: { model: string; where?: Where[] }): Promise<number> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where ?? []);
			const query = `SELECT COUNT(*)::int AS count FROM ${t(model)} WHERE ${clause}`;

			const rows = await executor.query<{ count: number }>(query, params);
			return rows[0]?.count ?? 0;
		},

		distinct: async <T>({
			model,
			field,
			where,
		}: {
			model: string;
			field: string;
			where?: Where[];
		}): Promise<T[]> => {
			const t = createTableResolver(getSchema());
			const col = `"${toSnakeCase(field)}"`;
			const { clause, params } = buildWhereClause(where ?? []);
			const query = `SELECT DISTINCT ${col} AS value FROM ${t(model)} WHERE ${clause} AND ${col} IS NOT NULL`;

			const rows = await executor.query<{ value: T }>(query, params);
			return rows.map((r) => r.value);
		},
	};
}
