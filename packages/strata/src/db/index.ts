export {
	activePartitionName,
	archivePartitionName,
	archivePartitionSpec,
	archiveSpecsFrom,
	ensureHashPartitions,
	generatePartitionDDL,
	hashPartitionSpecs,
	interactionPartitionName,
	type PartitionDDLOptions,
	parseArchivePartitionName,
} from "./partitioning.js";
export {
	ACTIVE_TABLE,
	ARCHIVE_TABLE,
	getStrataTables,
	INTERACTION_TABLE,
	LEGACY_TABLE,
	MAINTENANCE_RUN_TABLE,
	MIGRATION_PROGRESS_TABLE,
	PARTITIONED_TABLES,
	WORKER_LEASE_TABLE,
} from "./schema.js";
