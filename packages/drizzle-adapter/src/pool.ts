// =============================================================================
// CONNECTION POOL
// =============================================================================
// Builds a pg Pool and Drizzle instance for Strata, or wraps existing ones,
// and exposes pool stats plus graceful shutdown.
//
// Usage:
//   const { adapter, close } = createPostgresAdapter({ connectionString: process.env.DATABASE_URL });
//   const strata = createStrata({ database: adapter });

import type { StrataAdapter } from "@strata/core/db";
import { drizzle } from "drizzle-orm/node-postgres";
import pg, { type PoolConfig } from "pg";
import { type DrizzleDatabase, drizzleAdapter } from "./adapter.js";

// =============================================================================
// TYPES
// =============================================================================

/** The part of a `pg.Pool` used for shutdown and monitoring. */
export interface PoolLike {
	end(): Promise<void>;
	totalCount: number;
	idleCount: number;
	waitingCount: number;
}

export interface PooledAdapterConfig {
	/** A pg.Pool instance (or compatible pool) */
	pool: PoolLike;
	/** A Drizzle database created from the same pool, e.g. `drizzle(pool)` */
	drizzle: DrizzleDatabase;
}

export interface PooledAdapterResult {
	adapter: StrataAdapter;
	/** Wait for active queries to finish, then close every connection. */
	close: () => Promise<void>;
	stats: () => PoolStats;
}

export interface PoolStats {
	totalCount: number;
	idleCount: number;
	/** Clients checked out */
	activeCount: number;
	/** Callers waiting for a client */
	waitingCount: number;
}

// =============================================================================
// RECOMMENDED POOL SETTINGS
// =============================================================================

/**
 * Pool settings for a Strata deployment. Maintenance jobs hold one client for
 * the length of an archive batch, so the statement timeout is generous.
 */
export const RECOMMENDED_POOL_CONFIG = {
	max: 10,
	idleTimeoutMillis: 30_000,
	connectionTimeoutMillis: 10_000,
	/** Per-statement cap; VACUUM of a large partition may need more. */
	statement_timeout: 300_000,
} as const;

// =============================================================================
// FACTORIES
// =============================================================================

/** Wrap a pool and a Drizzle instance built on it into a StrataAdapter. */
export function createPooledAdapter(config: PooledAdapterConfig): PooledAdapterResult {
	const { pool, drizzle: db } = config;
	const adapter = drizzleAdapter(db);

	return {
		adapter,

		close: async () => {
			await pool.end();
		},

		stats: () => ({
			totalCount: pool.totalCount,
			idleCount: pool.idleCount,
			activeCount: pool.totalCount - pool.idleCount,
			waitingCount: pool.waitingCount,
		}),
	};
}

export interface PostgresAdapterConfig extends PoolConfig {
	connectionString?: string;
}

/**
 * Create a pg Pool with the recommended settings and a Strata adapter on top.
 *
 * @example
 * ```ts
 * const { adapter, close } = createPostgresAdapter({
 *   connectionString: "postgres://localhost:5432/todos",
 * });
 * ```
 */
export function createPostgresAdapter(config: PostgresAdapterConfig): PooledAdapterResult {
	const pool = new pg.Pool({ ...RECOMMENDED_POOL_CONFIG, ...config });
	return createPooledAdapter({ pool, drizzle: drizzle(pool) });
}
