// =============================================================================
// TABLE DEFINITIONS
// =============================================================================
// Logical tables of the partitioned layout plus the bookkeeping tables.
// Keys are SQL table names; partitioned tables list their partition key in
// the primary key, which PostgreSQL requires.

import type { ColumnDefinition, TableDefinition } from "@strata/core";
import { MAX_PRIORITY, MAX_TITLE_LENGTH, MIN_PRIORITY } from "@strata/core";

export const ACTIVE_TABLE = "todo_active";
export const ARCHIVE_TABLE = "todo_archived";
export const INTERACTION_TABLE = "ai_todo_interaction";
export const LEGACY_TABLE = "todos";
export const MIGRATION_PROGRESS_TABLE = "migration_progress";
export const MAINTENANCE_RUN_TABLE = "maintenance_run";
export const WORKER_LEASE_TABLE = "worker_lease";

/** Parents whose partitions the health monitor and weekly vacuum cover. */
export const PARTITIONED_TABLES = [ACTIVE_TABLE, ARCHIVE_TABLE, INTERACTION_TABLE] as const;

const COMPLETED_AT_CHECK = {
	name: "chk_completed_at_status",
	expression: "(status = 'done') = (completed_at IS NOT NULL)",
};

function itemColumns(): Record<string, ColumnDefinition> {
	return {
		id: { type: "uuid", notNull: true },
		user_id: { type: "uuid", notNull: true },
		parent_id: { type: "uuid" },
		project_id: { type: "uuid" },
		title: { type: "varchar", length: MAX_TITLE_LENGTH, notNull: true },
		description: { type: "text" },
		status: {
			type: "varchar",
			length: 20,
			notNull: true,
			default: "'todo'",
			check: "status IN ('todo', 'in_progress', 'done')",
		},
		priority: {
			type: "integer",
			notNull: true,
			default: "3",
			check: `priority BETWEEN ${MIN_PRIORITY} AND ${MAX_PRIORITY}`,
		},
		due_date: { type: "timestamp" },
		completed_at: { type: "timestamp" },
		ai_generated: { type: "boolean", notNull: true, default: "false" },
		depth: { type: "integer", notNull: true, default: "0" },
		created_at: { type: "timestamp", notNull: true, default: "NOW()" },
		updated_at: { type: "timestamp", notNull: true, default: "NOW()" },
	};
}

/** The monolithic table predates the cached depth column; `updated_at` may be null. */
function legacyColumns(): Record<string, ColumnDefinition> {
	const { depth: _depth, updated_at: _updatedAt, ...columns } = itemColumns();
	return { ...columns, updated_at: { type: "timestamp" } };
}

const STRATA_TABLES: Record<string, TableDefinition> = {
	[ACTIVE_TABLE]: {
		columns: itemColumns(),
		primaryKey: ["id", "user_id"],
		partitionBy: { strategy: "hash", column: "user_id" },
		checks: [COMPLETED_AT_CHECK],
		indexes: [
			{ name: "idx_todo_active_user_status", columns: ["user_id", "status"] },
			{ name: "idx_todo_active_parent", columns: ["user_id", "parent_id"] },
			{ name: "idx_todo_active_project", columns: ["project_id"] },
			{
				name: "idx_todo_active_archivable",
				columns: ["completed_at"],
				where: "status = 'done'",
			},
		],
	},
	[ARCHIVE_TABLE]: {
		columns: { ...itemColumns(), archived_at: { type: "timestamp", notNull: true } },
		primaryKey: ["id", "archived_at"],
		partitionBy: { strategy: "range", column: "archived_at" },
		checks: [COMPLETED_AT_CHECK, { name: "chk_archived_done", expression: "status = 'done'" }],
		indexes: [
			{ name: "idx_todo_archived_id", columns: ["id"] },
			{ name: "idx_todo_archived_user", columns: ["user_id", "archived_at"] },
		],
	},
	[INTERACTION_TABLE]: {
		columns: {
			id: { type: "uuid", notNull: true },
			user_id: { type: "uuid", notNull: true },
			todo_id: { type: "uuid" },
			interaction_type: { type: "varchar", length: 50, notNull: true },
			prompt: { type: "text", notNull: true },
			response: { type: "text" },
			subtasks_generated: { type: "integer", notNull: true, default: "0" },
			model_used: { type: "varchar", length: 100 },
			created_at: { type: "timestamp", notNull: true, default: "NOW()" },
		},
		primaryKey: ["id", "user_id"],
		partitionBy: { strategy: "hash", column: "user_id" },
		indexes: [
			{ name: "idx_ai_interaction_user_created", columns: ["user_id", "created_at"] },
			{ name: "idx_ai_interaction_todo", columns: ["todo_id"] },
		],
	},
	[LEGACY_TABLE]: {
		columns: legacyColumns(),
		primaryKey: ["id"],
		indexes: [{ name: "idx_todos_created_id", columns: ["created_at", "id"] }],
	},
	[MIGRATION_PROGRESS_TABLE]: {
		columns: {
			id: { type: "uuid", notNull: true },
			batch_start_offset: { type: "integer", notNull: true },
			rows_processed: { type: "integer", notNull: true, default: "0" },
			rows_migrated: { type: "integer", notNull: true, default: "0" },
			last_created_at: { type: "timestamp" },
			last_id: { type: "uuid" },
			started_at: { type: "timestamp", notNull: true, default: "NOW()" },
			completed_at: { type: "timestamp" },
			status: {
				type: "varchar",
				length: 20,
				notNull: true,
				check: "status IN ('running', 'completed', 'failed')",
			},
			error: { type: "text" },
		},
		primaryKey: ["id"],
		indexes: [{ name: "idx_migration_progress_status", columns: ["status", "batch_start_offset"] }],
	},
	[MAINTENANCE_RUN_TABLE]: {
		columns: {
			id: { type: "uuid", notNull: true },
			job_name: { type: "varchar", length: 20, notNull: true },
			started_at: { type: "timestamp", notNull: true, default: "NOW()" },
			completed_at: { type: "timestamp" },
			status: {
				type: "varchar",
				length: 20,
				notNull: true,
				check: "status IN ('running', 'completed', 'failed')",
			},
			details: { type: "text", notNull: true, default: "''" },
			failed_step: { type: "varchar", length: 50 },
		},
		primaryKey: ["id"],
		indexes: [{ name: "idx_maintenance_run_job_started", columns: ["job_name", "started_at"] }],
	},
	[WORKER_LEASE_TABLE]: {
		columns: {
			id: { type: "text", notNull: true },
			lease_holder: { type: "text", notNull: true },
			lease_until: { type: "timestamp", notNull: true },
		},
		primaryKey: ["id"],
	},
};

/** All table definitions keyed by SQL table name. */
export function getStrataTables(): Record<string, TableDefinition> {
	return STRATA_TABLES;
}
