export type {
	HealthOptions,
	MaintenanceWorkerOptions,
	StrataLogger,
	StrataOptions,
} from "./config.js";
export type { ResolvedStrataOptions, StrataContext } from "./context.js";
export type { HealthIssue, HealthIssueType, HealthSeverity, PartitionStatistics } from "./health.js";
export type { AppendInteractionInput, Interaction, InteractionQuery } from "./interaction.js";
export type {
	ArchivedItem,
	ArchiveQuery,
	CreateItemInput,
	Item,
	ItemLocation,
	ItemOrder,
	ItemPage,
	ItemQuery,
	ItemStats,
	ItemStatus,
	LegacyItem,
	LocatedItem,
	UpdateItemInput,
} from "./item.js";
export {
	DEFAULT_PRIORITY,
	ITEM_STATUSES,
	MAX_PRIORITY,
	MAX_TITLE_LENGTH,
	MIN_PRIORITY,
} from "./item.js";
export type {
	MaintenanceHistoryQuery,
	MaintenanceJobName,
	MaintenanceJobState,
	MaintenanceRun,
	MaintenanceRunStatus,
} from "./maintenance.js";
export { MAINTENANCE_JOBS } from "./maintenance.js";
export type {
	MigrateBatchOptions,
	MigrateBatchResult,
	MigrationBatchStatus,
	MigrationProgress,
	MigrationProgressRecord,
	ValidationCheck,
	ValidationCheckName,
	ValidationReport,
} from "./migration.js";
export type {
	ColumnDefinition,
	IndexDefinition,
	PartitionScheme,
	TableDefinition,
} from "./schema.js";
export type { StrataWorkerDefinition } from "./worker.js";
