// =============================================================================
// MAINTENANCE SCHEDULER
// =============================================================================
// Daily and weekly jobs over the partitioned layout. Each job moves through
// idle -> running -> completed | failed -> idle and leaves a `maintenance_run`
// record. A failed step stops the job; the failure is recorded and returned,
// never thrown, and the next scheduled run is the retry. A run holds the job's
// `worker_lease` row, so the CLI and a worker in another process cannot
// overlap.

import type {
	Item,
	MaintenanceJobName,
	MaintenanceJobState,
	MaintenanceRun,
	StrataContext,
	Where,
} from "@strata/core";
import { StrataError } from "@strata/core";
import { chunk, generateId, IN_LIST_CHUNK_SIZE, subtractDays } from "@strata/core/utils";
import { MAINTENANCE_RUN_TABLE, PARTITIONED_TABLES } from "../db/schema.js";
import {
	dropPartitionsOlderThan,
	findArchivedIds,
	insertArchivedMany,
	provisionAhead,
	requireArchivePartition,
} from "../managers/archive-store.js";
import { rawRowToItem } from "../managers/item-helpers.js";
import { allActivePartitions } from "../managers/partition-router.js";
import type { RawItemRow, RawMaintenanceRunRow } from "../managers/raw-types.js";
import { healthCheck, rawRowToMaintenanceRun } from "./health-monitor.js";
import { releaseLease, tryAcquireLease } from "./lease.js";

/** A crashed run stops blocking its job after this long. */
export const JOB_LEASE_MS = 6 * 3_600_000;

/** `worker_lease` row held for the length of a job run, across processes. */
export function jobLeaseId(jobName: MaintenanceJobName): string {
	return `maintenance:${jobName}`;
}

export interface MaintenanceResult {
	run: MaintenanceRun;
	/** `MAINTENANCE_JOB_FAILED` when a step failed, otherwise null. */
	error: StrataError | null;
}

interface MaintenanceStep {
	name: string;
	/** Returns a fragment of the run details, e.g. `archived 3 items`. */
	run: () => Promise<string>;
}

function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

// =============================================================================
// DAILY STEPS
// =============================================================================

/** Done ids of one Active partition, a page at a time in id order. */
async function* doneIdPages(ctx: StrataContext, model: string): AsyncGenerator<string[]> {
	let after: string | null = null;
	for (;;) {
		const where: Where[] = [{ field: "status", operator: "eq", value: "done" }];
		if (after !== null) where.push({ field: "id", operator: "gt", value: after });
		const rows = await ctx.adapter.findMany<Pick<RawItemRow, "id">>({
			model,
			where,
			sortBy: { field: "id", direction: "asc" },
			limit: IN_LIST_CHUNK_SIZE,
		});
		const ids = rows.map((row) => row.id);
		if (ids.length > 0) yield ids;
		const last = ids[ids.length - 1];
		if (last === undefined || ids.length < IN_LIST_CHUNK_SIZE) return;
		after = last;
	}
}

/** Ids present in both stores lose their Active copy. */
async function reconcileDuplicates(ctx: StrataContext, touched: Set<string>): Promise<number> {
	let removed = 0;
	for (const model of allActivePartitions(ctx)) {
		let deleted = 0;
		for await (const doneIds of doneIdPages(ctx, model)) {
			const archived = await findArchivedIds(ctx, doneIds);
			if (archived.size === 0) continue;
			deleted += await ctx.adapter.delete({
				model,
				where: [{ field: "id", operator: "in", value: [...archived] }],
			});
		}
		if (deleted > 0) {
			touched.add(model);
			removed += deleted;
			ctx.logger.warn("Removed Active copies of archived items", { partition: model, count: deleted });
		}
	}
	return removed;
}

/**
 * Move done items whose `completedAt` is at least the configured age from
 * each Active partition into Archive, one transaction per batch.
 */
async function archiveEligible(ctx: StrataContext, touched: Set<string>): Promise<number> {
	const now = ctx.now();
	const cutoff = subtractDays(now, ctx.options.archivalAgeThresholdDays);
	const batchSize = ctx.options.archiveBatchSize;
	let archived = 0;

	for (const model of allActivePartitions(ctx)) {
		for (;;) {
			const rows = await ctx.adapter.findMany<RawItemRow>({
				model,
				where: [
					{ field: "status", operator: "eq", value: "done" },
					{ field: "completedAt", operator: "lte", value: cutoff },
				],
				sortBy: [
					{ field: "completedAt", direction: "asc" },
					{ field: "id", direction: "asc" },
				],
				limit: batchSize,
			});
			if (rows.length === 0) break;

			const items: Item[] = rows.map(rawRowToItem);
			const moved = await ctx.adapter.transaction(async (tx) => {
				await insertArchivedMany(ctx, items, now, tx);
				let count = 0;
				for (const ids of chunk(items.map((item) => item.id))) {
					count += await tx.delete({ model, where: [{ field: "id", operator: "in", value: ids }] });
				}
				return count;
			});

			archived += moved;
			touched.add(model);
			touched.add(await requireArchivePartition(ctx, now));
			ctx.logger.info("Archived batch", { partition: model, count: moved });
			if (rows.length < batchSize) break;
		}
	}
	return archived;
}

// =============================================================================
// SCHEDULER
// =============================================================================

export class MaintenanceScheduler {
	private readonly ctx: StrataContext;
	private readonly states = new Map<MaintenanceJobName, MaintenanceJobState>();

	constructor(ctx: StrataContext) {
		this.ctx = ctx;
	}

	state(jobName: MaintenanceJobName): MaintenanceJobState {
		return this.states.get(jobName) ?? "idle";
	}

	/** Reconcile, provision, archive, analyze. */
	runDaily(): Promise<MaintenanceResult> {
		const ctx = this.ctx;
		const touched = new Set<string>();

		return this.runJob("daily", [
			{
				name: "reconcile",
				run: async () => `reconciled ${plural(await reconcileDuplicates(ctx, touched), "duplicate")}`,
			},
			{
				name: "provision",
				run: async () => {
					const created = await provisionAhead(ctx);
					for (const name of created) touched.add(name);
					return `created ${plural(created.length, "partition")}`;
				},
			},
			{
				name: "archive",
				run: async () => `archived ${plural(await archiveEligible(ctx, touched), "item")}`,
			},
			{
				name: "analyze",
				run: async () => {
					for (const name of touched) await ctx.adapter.catalog.analyze(name);
					return `analyzed ${plural(touched.size, "partition")}`;
				},
			},
		]);
	}

	/** Vacuum, health check, retention. */
	runWeekly(): Promise<MaintenanceResult> {
		const ctx = this.ctx;

		return this.runJob("weekly", [
			{
				name: "vacuum",
				run: async () => {
					let vacuumed = 0;
					for (const parent of PARTITIONED_TABLES) {
						for (const partition of await ctx.adapter.catalog.listPartitions(parent)) {
							await ctx.adapter.catalog.vacuum(partition.name);
							vacuumed++;
						}
					}
					return `vacuumed ${plural(vacuumed, "partition")}`;
				},
			},
			{
				name: "health",
				run: async () => {
					const issues = await healthCheck(ctx);
					const critical = issues.filter((i) => i.severity === "critical").length;
					return `found ${plural(issues.length, "health issue")} (${critical} critical, ${issues.length - critical} warning)`;
				},
			},
			{
				name: "retention",
				run: async () => {
					const months = ctx.options.archiveRetentionMonths;
					if (months === null) return "retention disabled";
					const dropped = await dropPartitionsOlderThan(ctx, months);
					return `dropped ${plural(dropped.length, "partition")}`;
				},
			},
		]);
	}

	// ---------------------------------------------------------------------------
	// JOB EXECUTION
	// ---------------------------------------------------------------------------

	private async runJob(jobName: MaintenanceJobName, steps: MaintenanceStep[]): Promise<MaintenanceResult> {
		if (this.state(jobName) === "running") {
			throw StrataError.conflict(`Maintenance job "${jobName}" is already running`, { jobName });
		}
		this.states.set(jobName, "running");

		const runId = generateId();
		const leaseId = jobLeaseId(jobName);
		let leased = false;
		try {
			const startedAt = this.ctx.now();
			leased = await tryAcquireLease(
				this.ctx,
				leaseId,
				runId,
				new Date(startedAt.getTime() + JOB_LEASE_MS),
			);
			if (!leased) {
				throw StrataError.conflict(`Maintenance job "${jobName}" is already running in another process`, {
					jobName,
				});
			}

			await this.ctx.adapter.create({
				model: MAINTENANCE_RUN_TABLE,
				data: {
					id: runId,
					jobName,
					startedAt,
					completedAt: null,
					status: "running",
					details: "",
					failedStep: null,
				},
			});
			this.ctx.logger.info("Maintenance job started", { jobName, runId });

			const progress: string[] = [];
			for (const step of steps) {
				try {
					progress.push(await step.run());
				} catch (cause) {
					const details = progress.join("; ");
					this.states.set(jobName, "failed");
					const run = await this.finishRun(runId, "failed", details, step.name);
					const error = StrataError.maintenanceJobFailed(jobName, step.name, details, cause);
					this.ctx.logger.error("Maintenance job failed", {
						jobName,
						runId,
						step: step.name,
						progress: details,
						error: cause instanceof Error ? cause.message : String(cause),
					});
					return { run, error };
				}
			}

			const details = progress.join("; ");
			this.states.set(jobName, "completed");
			const run = await this.finishRun(runId, "completed", details, null);
			this.ctx.logger.info("Maintenance job completed", { jobName, runId, details });
			return { run, error: null };
		} finally {
			this.states.set(jobName, "idle");
			if (leased) await this.releaseJobLease(leaseId, runId);
		}
	}

	private async releaseJobLease(leaseId: string, runId: string): Promise<void> {
		try {
			await releaseLease(this.ctx.adapter, leaseId, runId);
		} catch (error) {
			this.ctx.logger.error("Failed to release maintenance lease", {
				leaseId,
				runId,
				error: error instanceof Error ? error.message : String(error),
			});
		}
	}

	private async finishRun(
		runId: string,
		status: "completed" | "failed",
		details: string,
		failedStep: string | null,
	): Promise<MaintenanceRun> {
		const row = await this.ctx.adapter.update<RawMaintenanceRunRow>({
			model: MAINTENANCE_RUN_TABLE,
			where: [{ field: "id", operator: "eq", value: runId }],
			update: { status, details, failedStep, completedAt: this.ctx.now() },
		});
		if (!row) {
			throw StrataError.internal(`Maintenance run ${runId} disappeared`);
		}
		return rawRowToMaintenanceRun(row);
	}
}
