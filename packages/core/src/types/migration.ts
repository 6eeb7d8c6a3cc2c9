// =============================================================================
// MIGRATION TYPES
// =============================================================================

export type MigrationBatchStatus = "running" | "completed" | "failed";

/** One row of `migration_progress`: the audit record of a single batch. */
export interface MigrationProgressRecord {
	id: string;
	batchStartOffset: number;
	rowsProcessed: number;
	rowsMigrated: number;
	lastCreatedAt: Date | null;
	lastId: string | null;
	startedAt: Date;
	completedAt: Date | null;
	status: MigrationBatchStatus;
	error: string | null;
}

export interface MigrateBatchOptions {
	batchSize?: number;
	/** Batches to run in this call. Default: 1 */
	maxBatches?: number;
	/** Checked between batches; an aborted signal stops the run cleanly. */
	signal?: AbortSignal;
}

export interface MigrateBatchResult {
	rowsMigrated: number;
	/** Rows already present in one of the stores. */
	rowsSkipped: number;
	batchesRun: number;
	/** True once the offset has reached the legacy row count. */
	done: boolean;
	/** Offset the next call resumes from. */
	offset: number;
}

export type ValidationCheckName =
	| "total_rows"
	| "status_todo"
	| "status_in_progress"
	| "status_done"
	| "tenant_count"
	| "orphaned_parents"
	| "id_coverage";

export interface ValidationCheck {
	name: ValidationCheckName;
	/** Value measured on the legacy table. */
	expected: number;
	/** Value measured across Active and Archive. */
	actual: number;
	pass: boolean;
	message: string;
}

export interface ValidationReport {
	checks: ValidationCheck[];
	passed: boolean;
}

export interface MigrationProgress {
	totalLegacyRows: number;
	offset: number;
	completedBatches: number;
	failedBatches: number;
	lastRun: MigrationProgressRecord | null;
}
