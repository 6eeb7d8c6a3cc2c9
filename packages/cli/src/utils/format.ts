// =============================================================================
// Plain-text formatting for command output
// =============================================================================
// Colour is applied by the commands; everything here returns plain strings.

import type {
	HealthIssue,
	MaintenanceRun,
	MigrateBatchResult,
	MigrationProgress,
	PartitionStatistics,
	ValidationCheck,
} from "@strata/core";

export function formatBytes(bytes: number): string {
	if (bytes === 0) return "0 B";
	const units = ["B", "KB", "MB", "GB", "TB"];
	const i = Math.min(units.length - 1, Math.floor(Math.log(bytes) / Math.log(1024)));
	const value = bytes / 1024 ** i;
	return `${value.toFixed(i > 0 ? 1 : 0)} ${units[i]}`;
}

export function formatDate(date: Date | null): string {
	return date ? date.toISOString() : "never";
}

/** Left-aligned columns separated by two spaces. */
export function formatTable(header: string[], rows: string[][]): string[] {
	const widths = header.map((h, i) => Math.max(h.length, ...rows.map((row) => (row[i] ?? "").length)));
	const line = (cells: string[]) =>
		cells
			.map((cell, i) => cell.padEnd(widths[i] ?? 0))
			.join("  ")
			.trimEnd();
	return [line(header), ...rows.map(line)];
}

export function statisticsTable(stats: PartitionStatistics[]): string[] {
	return formatTable(
		["partition", "rows", "dead", "size", "last analyze"],
		stats.map((s) => [
			s.partitionName,
			String(s.rowCount),
			String(s.deadRowCount),
			formatBytes(s.sizeBytes),
			formatDate(s.lastAnalyze),
		]),
	);
}

/** One row per parent table: partitions, live rows, dead rows, size. */
export function parentSummaryTable(stats: PartitionStatistics[]): string[] {
	const totals = new Map<string, { partitions: number; rows: number; dead: number; size: number }>();
	for (const s of stats) {
		const total = totals.get(s.parentTable) ?? { partitions: 0, rows: 0, dead: 0, size: 0 };
		total.partitions++;
		total.rows += s.rowCount;
		total.dead += s.deadRowCount;
		total.size += s.sizeBytes;
		totals.set(s.parentTable, total);
	}
	return formatTable(
		["table", "partitions", "rows", "dead", "size"],
		[...totals].map(([table, t]) => [
			table,
			String(t.partitions),
			String(t.rows),
			String(t.dead),
			formatBytes(t.size),
		]),
	);
}

export function formatIssue(issue: HealthIssue): string {
	return `[${issue.severity}] ${issue.partitionName}: ${issue.description}`;
}

/** Counts per severity, e.g. `1 critical, 3 warning`. */
export function issueSummary(issues: HealthIssue[]): string {
	if (issues.length === 0) return "no issues";
	const critical = issues.filter((i) => i.severity === "critical").length;
	return `${critical} critical, ${issues.length - critical} warning`;
}

export function formatRun(run: MaintenanceRun): string {
	const failed = run.failedStep ? ` (failed at ${run.failedStep})` : "";
	return `${formatDate(run.startedAt)}  ${run.jobName}  ${run.status}${failed}  ${run.details}`;
}

export function formatCheck(check: ValidationCheck): string {
	return `${check.pass ? "pass" : "FAIL"}  ${check.name}: ${check.message}`;
}

export function formatBatchResult(result: MigrateBatchResult): string {
	const state = result.done ? "done" : `next offset ${result.offset}`;
	return `migrated ${result.rowsMigrated} rows, skipped ${result.rowsSkipped} in ${result.batchesRun} batches; ${state}`;
}

export function formatProgress(progress: MigrationProgress): string[] {
	const percent =
		progress.totalLegacyRows === 0
			? 100
			: Math.min(100, (progress.offset / progress.totalLegacyRows) * 100);
	const lines = [
		`offset ${progress.offset} of ${progress.totalLegacyRows} legacy rows (${percent.toFixed(1)}%)`,
		`${progress.completedBatches} completed batches, ${progress.failedBatches} failed`,
	];
	const last = progress.lastRun;
	if (last) {
		const error = last.error ? `: ${last.error}` : "";
		lines.push(`last batch at offset ${last.batchStartOffset} ${last.status}${error}`);
	}
	return lines;
}
