// =============================================================================
// DRIZZLE ADAPTER -- StrataAdapter implementation backed by Drizzle ORM
// =============================================================================
// Every statement is raw SQL sent through drizzle-orm's `sql` template. The
// partition tables are created at run time and never appear in a Drizzle
// schema, so the typed column API has nothing to bind to.

import type {
	StrataAdapter,
	StrataAdapterOptions,
	StrataTransactionAdapter,
} from "@strata/core/db";
import { buildSqlAdapterMethods, type SqlExecutor } from "@strata/core/db";
import { StrataError } from "@strata/core/error";
import { type SQL, sql } from "drizzle-orm";
import { createPostgresCatalog } from "./catalog.js";

// =============================================================================
// DRIZZLE HANDLE TYPES
// =============================================================================

/** The part of a Drizzle database or transaction handle the adapter uses. */
export interface DrizzleExecutor {
	execute(query: SQL): Promise<unknown>;
}

/** A Drizzle database, e.g. `drizzle(pool)` from `drizzle-orm/node-postgres`. */
export interface DrizzleDatabase extends DrizzleExecutor {
	transaction<T>(fn: (tx: DrizzleExecutor) => Promise<T>): Promise<T>;
}

const PG_UNIQUE_VIOLATION = "23505";
/** Also raised when no partition accepts the row. */
const PG_CHECK_VIOLATION = "23514";

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Rows from a driver result: node-postgres returns `{ rows }`, postgres.js an array. */
export function rowsOf(result: unknown): Record<string, unknown>[] {
	const rows = Array.isArray(result) ? result : isRecord(result) ? result.rows : undefined;
	return Array.isArray(rows) ? rows.filter(isRecord) : [];
}

function rowCountOf(result: unknown): number {
	if (isRecord(result) && typeof result.rowCount === "number") {
		return result.rowCount;
	}
	if (Array.isArray(result)) {
		const count: unknown = Reflect.get(result, "count");
		return typeof count === "number" ? count : result.length;
	}
	return 0;
}

/**
 * Turn `$1, $2, ...` placeholders plus params into a drizzle `sql` object.
 * Placeholders must appear in ascending order, which the shared SQL builders
 * guarantee.
 */
export function buildDrizzleSql(query: string, params: unknown[]): SQL {
	const parts = query.split(/\$(\d+)/);
	const chunks: SQL[] = [];
	for (let i = 0; i < parts.length; i++) {
		const part = parts[i] ?? "";
		if (i % 2 === 0) {
			if (part) chunks.push(sql.raw(part));
		} else {
			chunks.push(sql`${params[Number.parseInt(part, 10) - 1]}`);
		}
	}
	return sql.join(chunks);
}

/** SQLSTATE of a pg error, also when a driver wrapper carries it as `cause`. */
function pgErrorCode(error: unknown): string | undefined {
	let current: unknown = error;
	for (let depth = 0; depth < 4 && isRecord(current); depth++) {
		const code: unknown = current.code;
		if (typeof code === "string" && /^[0-9A-Z]{5}$/.test(code)) return code;
		current = current.cause;
	}
	return undefined;
}

/** Map integrity errors raised by PostgreSQL onto StrataError codes. */
export function translateError(error: unknown): unknown {
	const code = pgErrorCode(error);
	if (code === PG_UNIQUE_VIOLATION) {
		return StrataError.constraintViolation("Duplicate key", { sqlState: code }, error);
	}
	if (code === PG_CHECK_VIOLATION) {
		return StrataError.constraintViolation("Check constraint violated", { sqlState: code }, error);
	}
	return error;
}

function createExecutor(db: DrizzleExecutor): SqlExecutor {
	return {
		query: async <T = Record<string, unknown>>(query: string, params: unknown[]): Promise<T[]> => {
			try {
				const result = await db.execute(buildDrizzleSql(query, params));
				return rowsOf(result) as T[];
			} catch (error) {
				throw translateError(error);
			}
		},
		mutate: async (query: string, params: unknown[]): Promise<number> => {
			try {
				return rowCountOf(await db.execute(buildDrizzleSql(query, params)));
			} catch (error) {
				throw translateError(error);
			}
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a StrataAdapter backed by a Drizzle database instance.
 *
 * @example
 * ```ts
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { Pool } from "pg";
 * import { drizzleAdapter } from "@strata/drizzle-adapter";
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const adapter = drizzleAdapter(drizzle(pool));
 * ```
 */
export function drizzleAdapter(db: DrizzleDatabase): StrataAdapter {
	const options: StrataAdapterOptions = { dialectName: "postgres" };
	const getSchema = () => options.schema ?? "public";
	const executor = createExecutor(db);

	return {
		id: "drizzle",
		...buildSqlAdapterMethods(executor, getSchema),
		catalog: createPostgresCatalog(executor, getSchema),

		transaction: async <T>(fn: (tx: StrataTransactionAdapter) => Promise<T>): Promise<T> => {
			return db.transaction(async (tx) => {
				const txAdapter: StrataTransactionAdapter = {
					id: "drizzle",
					...buildSqlAdapterMethods(createExecutor(tx), getSchema),
					options,
				};
				return fn(txAdapter);
			});
		},

		options,
	};
}
