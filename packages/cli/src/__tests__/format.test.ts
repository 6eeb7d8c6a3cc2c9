import type { MaintenanceRun, PartitionStatistics } from "@strata/core";
import { describe, expect, it } from "vitest";
import {
	formatBatchResult,
	formatBytes,
	formatCheck,
	formatIssue,
	formatProgress,
	formatRun,
	formatTable,
	issueSummary,
	parentSummaryTable,
} from "../utils/format.js";

function stat(partitionName: string, parentTable: string, rowCount: number, deadRowCount: number, sizeBytes: number): PartitionStatistics {
	return { partitionName, parentTable, rowCount, deadRowCount, sizeBytes, lastVacuum: null, lastAnalyze: null };
}

describe("formatBytes", () => {
	it("uses binary units", () => {
		expect(formatBytes(0)).toBe("0 B");
		expect(formatBytes(512)).toBe("512 B");
		expect(formatBytes(1536)).toBe("1.5 KB");
		expect(formatBytes(5 * 1024 * 1024 + 300_000)).toBe("5.3 MB");
	});
});

describe("formatTable", () => {
	it("pads every column to its widest cell", () => {
		expect(formatTable(["a", "bb"], [["xxx", "y"], ["z", ""]])).toEqual(["a    bb", "xxx  y", "z"]);
	});
});

describe("parentSummaryTable", () => {
	it("sums partitions per parent table", () => {
		const stats = [
			stat("ai_todo_interaction_p0", "ai_todo_interaction", 1, 0, 9216),
			stat("todo_active_p0", "todo_active", 2, 1, 8704),
			stat("todo_active_p1", "todo_active", 0, 0, 8192),
		];

		expect(parentSummaryTable(stats)).toEqual([
			"table                partitions  rows  dead  size",
			"ai_todo_interaction  1           1     0     9.0 KB",
			"todo_active          2           2     1     16.5 KB",
		]);
	});
});

describe("health output", () => {
	it("formats an issue", () => {
		expect(
			formatIssue({
				issueType: "missing_future_partition",
				partitionName: "todo_archived_y2025m10",
				description: "Next month's archive partition is not provisioned",
				severity: "critical",
			}),
		).toBe("[critical] todo_archived_y2025m10: Next month's archive partition is not provisioned");
	});

	it("summarizes severities", () => {
		expect(issueSummary([])).toBe("no issues");
		expect(
			issueSummary([
				{ issueType: "dead_rows", partitionName: "todo_active_p1", description: "", severity: "critical" },
				{ issueType: "stale_statistics", partitionName: "todo_active_p2", description: "", severity: "warning" },
				{ issueType: "stale_statistics", partitionName: "todo_active_p3", description: "", severity: "warning" },
			]),
		).toBe("1 critical, 2 warning");
	});

	it("formats a failed maintenance run", () => {
		const run: MaintenanceRun = {
			id: "run-1",
			jobName: "daily",
			startedAt: new Date("2025-09-15T12:00:00.000Z"),
			completedAt: new Date("2025-09-15T12:00:05.000Z"),
			status: "failed",
			details: "reconciled 0 duplicates",
			failedStep: "analyze",
		};
		expect(formatRun(run)).toBe(
			"2025-09-15T12:00:00.000Z  daily  failed (failed at analyze)  reconciled 0 duplicates",
		);
	});
});

describe("migration output", () => {
	it("formats a check", () => {
		expect(
			formatCheck({ name: "total_rows", expected: 3, actual: 2, pass: false, message: "3 legacy, 2 partitioned" }),
		).toBe("FAIL  total_rows: 3 legacy, 2 partitioned");
	});

	it("formats a batch result", () => {
		expect(formatBatchResult({ rowsMigrated: 5, rowsSkipped: 1, batchesRun: 2, done: false, offset: 6 })).toBe(
			"migrated 5 rows, skipped 1 in 2 batches; next offset 6",
		);
		expect(formatBatchResult({ rowsMigrated: 0, rowsSkipped: 0, batchesRun: 0, done: true, offset: 17 })).toBe(
			"migrated 0 rows, skipped 0 in 0 batches; done",
		);
	});

	it("formats progress with the last batch", () => {
		expect(
			formatProgress({
				totalLegacyRows: 17,
				offset: 5,
				completedBatches: 1,
				failedBatches: 1,
				lastRun: {
					id: "batch-2",
					batchStartOffset: 5,
					rowsProcessed: 0,
					rowsMigrated: 0,
					lastCreatedAt: null,
					lastId: null,
					startedAt: new Date("2025-09-15T12:00:00.000Z"),
					completedAt: null,
					status: "failed",
					error: "boom",
				},
			}),
		).toEqual([
			"offset 5 of 17 legacy rows (29.4%)",
			"1 completed batches, 1 failed",
			"last batch at offset 5 failed: boom",
		]);
	});

	it("treats an empty legacy table as complete", () => {
		expect(
			formatProgress({ totalLegacyRows: 0, offset: 0, completedBatches: 0, failedBatches: 0, lastRun: null }),
		).toEqual(["offset 0 of 0 legacy rows (100.0%)", "0 completed batches, 0 failed"]);
	});
});
