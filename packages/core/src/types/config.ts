import type { StrataAdapter } from "../db/adapter.js";

export interface StrataLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}

export interface MaintenanceWorkerOptions {
	/** Daily job: reconcile, provision, archive, analyze. Default: enabled, 1d interval */
	daily?: boolean | { interval?: string };
	/** Weekly job: vacuum, health, retention. Default: enabled, 7d interval */
	weekly?: boolean | { interval?: string };
}

export interface HealthOptions {
	/** Days without an analyze before statistics count as stale. Default: 7 */
	statsStaleAfterDays?: number;
	/** Dead/live row ratio above which a partition is reported. Default: 0.2 */
	deadRowRatioThreshold?: number;
}

export interface StrataOptions {
	/** Database adapter instance or factory function */
	database: StrataAdapter | (() => StrataAdapter);

	/** Hash partitions of `todo_active`. Fixed at deployment time. Default: 16 */
	activePartitionCount?: number;

	/** Hash partitions of `ai_todo_interaction`. Fixed at deployment time. Default: 8 */
	interactionPartitionCount?: number;

	/** Months of archive to keep. `null` disables retention. Default: null */
	archiveRetentionMonths?: number | null;

	/** Age in days of `completedAt` before a done item is archived. Default: 30 */
	archivalAgeThresholdDays?: number;

	/** Legacy rows copied per migration batch. Default: 1000 */
	migrationBatchSize?: number;

	/** Rows moved per archival transaction. Default: 1000 */
	archiveBatchSize?: number;

	/** Monthly archive partitions kept provisioned beyond the current month. Default: 3 */
	archivePartitionsAhead?: number;

	/** Deepest allowed item nesting (roots are depth 0). Default: 10 */
	maxDepth?: number;

	/** Health thresholds */
	health?: HealthOptions;

	/** Background maintenance workers. Both enabled by default; nothing runs until `workers.start()`. */
	workers?: MaintenanceWorkerOptions;

	/** Custom logger */
	logger?: StrataLogger;

	/** PostgreSQL schema name for all Strata tables. Default: "public" */
	schema?: string;

	/** Clock. Default: `() => new Date()` */
	now?: () => Date;
}
