import type { StrataAdapter } from "../db/adapter.js";
import type { MaintenanceWorkerOptions, StrataLogger } from "./config.js";

export interface StrataContext {
	adapter: StrataAdapter;
	options: ResolvedStrataOptions;
	logger: StrataLogger;
	now: () => Date;
}

export interface ResolvedStrataOptions {
	activePartitionCount: number;
	interactionPartitionCount: number;
	archiveRetentionMonths: number | null;
	archivalAgeThresholdDays: number;
	migrationBatchSize: number;
	archiveBatchSize: number;
	archivePartitionsAhead: number;
	maxDepth: number;
	statsStaleAfterDays: number;
	deadRowRatioThreshold: number;
	/** PostgreSQL schema for all Strata tables. Default: "public" */
	schema: string;
	workers: MaintenanceWorkerOptions;
}
