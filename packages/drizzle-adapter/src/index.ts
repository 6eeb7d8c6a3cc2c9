export {
	buildDrizzleSql,
	type DrizzleDatabase,
	type DrizzleExecutor,
	drizzleAdapter,
	translateError,
} from "./adapter.js";
export {
	createPostgresCatalog,
	parsePartitionBound,
	renderPartitionBound,
} from "./catalog.js";
export {
	createPooledAdapter,
	createPostgresAdapter,
	type PooledAdapterConfig,
	type PooledAdapterResult,
	type PoolLike,
	type PoolStats,
	type PostgresAdapterConfig,
	RECOMMENDED_POOL_CONFIG,
} from "./pool.js";
export type { RawPartitionRow, RawPartitionStatsRow } from "./types.js";
