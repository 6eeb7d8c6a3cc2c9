// =============================================================================
// PARTITION CATALOG
// =============================================================================
// Knows which physical partitions exist for a logical table and performs the
// DDL-level upkeep on them. The PostgreSQL catalog reads pg_inherits and
// pg_stat_user_tables; the memory catalog tracks the same facts in process.

export interface HashPartitionSpec {
	strategy: "hash";
	name: string;
	parent: string;
	modulus: number;
	remainder: number;
}

export interface RangePartitionSpec {
	strategy: "range";
	name: string;
	parent: string;
	/** Inclusive lower bound. */
	from: Date;
	/** Exclusive upper bound. */
	to: Date;
}

export type PartitionSpec = HashPartitionSpec | RangePartitionSpec;

export interface PartitionStats {
	partitionName: string;
	parentTable: string;
	rowCount: number;
	deadRowCount: number;
	sizeBytes: number;
	lastVacuum: Date | null;
	lastAnalyze: Date | null;
}

export interface PartitionCatalog {
	/** Partitions attached to `parent`, in no particular order. */
	listPartitions(parent: string): Promise<PartitionSpec[]>;

	/** Create and attach a partition. Returns `false` when it already existed. */
	createPartition(spec: PartitionSpec): Promise<boolean>;

	/** Detach and drop a partition with its rows. Returns `false` when it did not exist. */
	dropPartition(name: string): Promise<boolean>;

	/** Statistics for every partition of the given parents. */
	statistics(parents: string[]): Promise<PartitionStats[]>;

	/** Refresh planner statistics. */
	analyze(name: string): Promise<void>;

	/** Reclaim dead rows. */
	vacuum(name: string): Promise<void>;
}
