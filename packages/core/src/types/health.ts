export interface PartitionStatistics {
	partitionName: string;
	parentTable: string;
	rowCount: number;
	deadRowCount: number;
	sizeBytes: number;
	lastVacuum: Date | null;
	lastAnalyze: Date | null;
}

export type HealthIssueType =
	| "stale_statistics"
	| "dead_rows"
	| "missing_future_partition"
	| "maintenance_failed";

export type HealthSeverity = "warning" | "critical";

export interface HealthIssue {
	issueType: HealthIssueType;
	/** Partition (or job name, for `maintenance_failed`) the issue is about. */
	partitionName: string;
	description: string;
	severity: HealthSeverity;
}
