// =============================================================================
// HEALTH MONITOR
// =============================================================================
// Read-only view over partition statistics and the maintenance history.
// Never mutates anything; safe to call at any frequency.

import type {
	HealthIssue,
	MaintenanceHistoryQuery,
	MaintenanceJobName,
	MaintenanceRun,
	MaintenanceRunStatus,
	PartitionStatistics,
	StrataContext,
	Where,
} from "@strata/core";
import { MAINTENANCE_JOBS, StrataError } from "@strata/core";
import { addUtcMonths, monthOf, resolveLimit, subtractDays } from "@strata/core/utils";
import { archivePartitionName } from "../db/partitioning.js";
import { MAINTENANCE_RUN_TABLE, PARTITIONED_TABLES } from "../db/schema.js";
import { listArchivePartitions } from "../managers/archive-store.js";
import { toDate, toOptionalDate } from "../managers/item-helpers.js";
import type { RawMaintenanceRunRow } from "../managers/raw-types.js";

const CRITICAL_DEAD_ROW_RATIO = 0.5;
const DEFAULT_HISTORY_LIMIT = 20;
const MAX_HISTORY_LIMIT = 500;

// =============================================================================
// STATISTICS
// =============================================================================

const byPartition = new Intl.Collator("en", { numeric: true });

/** Statistics for every partition of the three partitioned tables. */
export async function partitionStatistics(ctx: StrataContext): Promise<PartitionStatistics[]> {
	const stats = await ctx.adapter.catalog.statistics([...PARTITIONED_TABLES]);
	return stats.sort(
		(a, b) =>
			byPartition.compare(a.parentTable, b.parentTable) ||
			byPartition.compare(a.partitionName, b.partitionName),
	);
}

// =============================================================================
// MAINTENANCE HISTORY
// =============================================================================

function isJobName(value: string): value is MaintenanceJobName {
	return value === "daily" || value === "weekly";
}

function isRunStatus(value: string): value is MaintenanceRunStatus {
	return value === "running" || value === "completed" || value === "failed";
}

export function rawRowToMaintenanceRun(row: RawMaintenanceRunRow): MaintenanceRun {
	if (!isJobName(row.jobName) || !isRunStatus(row.status)) {
		throw StrataError.internal(`Malformed maintenance run record ${row.id}`);
	}
	return {
		id: row.id,
		jobName: row.jobName,
		startedAt: toDate(row.startedAt),
		completedAt: toOptionalDate(row.completedAt),
		status: row.status,
		details: row.details ?? "",
		failedStep: row.failedStep ?? null,
	};
}

/** Maintenance runs, newest first. */
export async function maintenanceHistory(
	ctx: StrataContext,
	query: MaintenanceHistoryQuery = {},
): Promise<MaintenanceRun[]> {
	const limit = resolveLimit(query.limit, DEFAULT_HISTORY_LIMIT, MAX_HISTORY_LIMIT);
	const where: Where[] = [];
	if (query.jobName !== undefined) {
		where.push({ field: "jobName", operator: "eq", value: query.jobName });
	}
	const rows = await ctx.adapter.findMany<RawMaintenanceRunRow>({
		model: MAINTENANCE_RUN_TABLE,
		where,
		sortBy: [
			{ field: "startedAt", direction: "desc" },
			{ field: "id", direction: "desc" },
		],
		limit,
	});
	return rows.map(rawRowToMaintenanceRun);
}

// =============================================================================
// HEALTH CHECK
// =============================================================================

function statisticsIssues(ctx: StrataContext, stats: PartitionStatistics[]): HealthIssue[] {
	const issues: HealthIssue[] = [];
	const staleBefore = subtractDays(ctx.now(), ctx.options.statsStaleAfterDays);

	for (const partition of stats) {
		if (partition.lastAnalyze === null || partition.lastAnalyze.getTime() < staleBefore.getTime()) {
			issues.push({
				issueType: "stale_statistics",
				partitionName: partition.partitionName,
				description:
					partition.lastAnalyze === null
						? "Partition has never been analyzed"
						: `Last analyzed ${partition.lastAnalyze.toISOString()}, more than ${ctx.options.statsStaleAfterDays} days ago`,
				severity: "warning",
			});
		}

		const tuples = partition.rowCount + partition.deadRowCount;
		const ratio = tuples === 0 ? 0 : partition.deadRowCount / tuples;
		if (ratio > ctx.options.deadRowRatioThreshold) {
			issues.push({
				issueType: "dead_rows",
				partitionName: partition.partitionName,
				description: `${partition.deadRowCount} dead rows (${(ratio * 100).toFixed(1)}% of ${tuples})`,
				severity: ratio > CRITICAL_DEAD_ROW_RATIO ? "critical" : "warning",
			});
		}
	}
	return issues;
}

async function futurePartitionIssues(ctx: StrataContext): Promise<HealthIssue[]> {
	const expected = archivePartitionName(monthOf(addUtcMonths(ctx.now(), 1)));
	const partitions = await listArchivePartitions(ctx);
	if (partitions.some((p) => p.name === expected)) return [];
	return [
		{
			issueType: "missing_future_partition",
			partitionName: expected,
			description: "Next month's archive partition is not provisioned",
			severity: "critical",
		},
	];
}

async function maintenanceIssues(ctx: StrataContext): Promise<HealthIssue[]> {
	const issues: HealthIssue[] = [];
	for (const jobName of MAINTENANCE_JOBS) {
		const [latest] = await maintenanceHistory(ctx, { jobName, limit: 1 });
		if (latest?.status !== "failed") continue;
		issues.push({
			issueType: "maintenance_failed",
			partitionName: jobName,
			description: `Last ${jobName} run failed at step "${latest.failedStep ?? "unknown"}"`,
			severity: "warning",
		});
	}
	return issues;
}

export async function healthCheck(ctx: StrataContext): Promise<HealthIssue[]> {
	const stats = await partitionStatistics(ctx);
	return [
		...statisticsIssues(ctx, stats),
		...(await futurePartitionIssues(ctx)),
		...(await maintenanceIssues(ctx)),
	];
}
