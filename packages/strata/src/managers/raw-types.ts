// =============================================================================
// RAW ROW TYPES
// =============================================================================
// Rows as adapters return them: camelCase keys, timestamps as Date (pg,
// memory) or ISO strings, counts occasionally as strings (pg bigint).

type Timestamp = Date | string;

export interface RawItemRow {
	id: string;
	userId: string;
	parentId?: string | null;
	projectId?: string | null;
	title: string;
	description?: string | null;
	status: string;
	priority: number | string;
	dueDate?: Timestamp | null;
	completedAt?: Timestamp | null;
	aiGenerated?: boolean | null;
	depth?: number | string | null;
	createdAt: Timestamp;
	updatedAt: Timestamp;
}

export interface RawArchivedItemRow extends RawItemRow {
	archivedAt: Timestamp;
}

/** A row of the legacy `todos` table, where `updated_at` is nullable. */
export interface RawLegacyItemRow extends Omit<RawItemRow, "depth" | "updatedAt"> {
	updatedAt?: Timestamp | null;
}

export interface RawInteractionRow {
	id: string;
	userId: string;
	todoId?: string | null;
	interactionType: string;
	prompt: string;
	response?: string | null;
	subtasksGenerated?: number | string | null;
	modelUsed?: string | null;
	createdAt: Timestamp;
}

export interface RawMigrationProgressRow {
	id: string;
	batchStartOffset: number | string;
	rowsProcessed: number | string;
	rowsMigrated: number | string;
	lastCreatedAt?: Timestamp | null;
	lastId?: string | null;
	startedAt: Timestamp;
	completedAt?: Timestamp | null;
	status: string;
	error?: string | null;
}

export interface RawMaintenanceRunRow {
	id: string;
	jobName: string;
	startedAt: Timestamp;
	completedAt?: Timestamp | null;
	status: string;
	details?: string | null;
	failedStep?: string | null;
}

export interface RawWorkerLeaseRow {
	id: string;
	leaseHolder: string;
	leaseUntil: Timestamp;
}
