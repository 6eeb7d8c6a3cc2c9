// =============================================================================
// MIGRATION ENGINE
// =============================================================================
// Copies the monolithic `todos` table into the partitioned stores in
// resumable batches. Legacy rows are never deleted; every batch leaves one
// `migration_progress` record and the next call resumes after the last
// completed one. Cutover is gated on `validate()`.

import type {
	Item,
	MigrateBatchOptions,
	MigrateBatchResult,
	MigrationBatchStatus,
	MigrationProgress,
	MigrationProgressRecord,
	StrataContext,
	StrataTransactionAdapter,
	ValidationCheck,
	ValidationCheckName,
	ValidationReport,
} from "@strata/core";
import { StrataError } from "@strata/core";
import { generateId, requirePositiveInteger, subtractDays } from "@strata/core/utils";
import { LEGACY_TABLE, MIGRATION_PROGRESS_TABLE } from "../db/schema.js";
import { findActiveIds } from "../managers/active-store.js";
import {
	findArchivedIds,
	insertArchivedMany,
	listArchivePartitions,
	provisionAhead,
} from "../managers/archive-store.js";
import { itemToRow, rawRowToItem, toDate, toOptionalDate } from "../managers/item-helpers.js";
import { activePartitionFor, allActivePartitions } from "../managers/partition-router.js";
import type { RawLegacyItemRow, RawMigrationProgressRow } from "../managers/raw-types.js";

// =============================================================================
// PROGRESS RECORDS
// =============================================================================

function parseBatchStatus(value: string): MigrationBatchStatus {
	if (value === "running" || value === "completed" || value === "failed") return value;
	throw StrataError.internal(`Unknown migration batch status "${value}"`);
}

function rawRowToProgress(row: RawMigrationProgressRow): MigrationProgressRecord {
	return {
		id: row.id,
		batchStartOffset: Number(row.batchStartOffset),
		rowsProcessed: Number(row.rowsProcessed),
		rowsMigrated: Number(row.rowsMigrated),
		lastCreatedAt: toOptionalDate(row.lastCreatedAt),
		lastId: row.lastId ?? null,
		startedAt: toDate(row.startedAt),
		completedAt: toOptionalDate(row.completedAt),
		status: parseBatchStatus(row.status),
		error: row.error ?? null,
	};
}

/** Offset just past the furthest completed batch. */
async function resumeOffset(ctx: StrataContext): Promise<number> {
	const [last] = await ctx.adapter.findMany<RawMigrationProgressRow>({
		model: MIGRATION_PROGRESS_TABLE,
		where: [{ field: "status", operator: "eq", value: "completed" }],
		sortBy: { field: "batchStartOffset", direction: "desc" },
		limit: 1,
	});
	if (!last) return 0;
	const record = rawRowToProgress(last);
	return record.batchStartOffset + record.rowsProcessed;
}

// =============================================================================
// ROW NORMALIZATION
// =============================================================================

/**
 * A missing `updatedAt` takes `createdAt`. A done row without a completion
 * time takes `updatedAt`, then `createdAt`; other rows lose it.
 */
function normalizeLegacyRow(row: RawLegacyItemRow): Item {
	const updatedAt = row.updatedAt ?? row.createdAt;
	const item = rawRowToItem({ ...row, updatedAt });
	if (item.status !== "done") return { ...item, completedAt: null };
	return { ...item, completedAt: toOptionalDate(row.completedAt ?? updatedAt) };
}

/** Depth from the legacy parent chain. Missing parents end the chain. */
async function legacyDepth(
	db: StrataTransactionAdapter,
	item: Item,
	parents: Map<string, string | null>,
): Promise<number> {
	const seen = new Set<string>([item.id]);
	let depth = 0;
	let current = item.parentId;

	while (current !== null) {
		if (seen.has(current)) {
			throw StrataError.constraintViolation(`Legacy item ${item.id} has a cyclic parent chain`, {
				itemId: item.id,
			});
		}
		seen.add(current);

		let next = parents.get(current);
		if (next === undefined) {
			const parent = await db.findOne<RawLegacyItemRow>({
				model: LEGACY_TABLE,
				where: [{ field: "id", operator: "eq", value: current }],
			});
			if (!parent) break;
			next = parent.parentId ?? null;
			parents.set(current, next);
		}
		depth++;
		current = next;
	}
	return depth;
}

// =============================================================================
// BATCHES
// =============================================================================

interface BatchOutcome {
	rowsProcessed: number;
	rowsMigrated: number;
	rowsSkipped: number;
}

async function copyBatch(
	ctx: StrataContext,
	tx: StrataTransactionAdapter,
	progressId: string,
	offset: number,
	batchSize: number,
): Promise<BatchOutcome> {
	const rows = await tx.findMany<RawLegacyItemRow>({
		model: LEGACY_TABLE,
		sortBy: [
			{ field: "createdAt", direction: "asc" },
			{ field: "id", direction: "asc" },
		],
		limit: batchSize,
		offset,
	});

	const now = ctx.now();
	const archiveBefore = subtractDays(now, ctx.options.archivalAgeThresholdDays);
	const items = rows.map(normalizeLegacyRow);
	const ids = items.map((item) => item.id);
	const [inActive, inArchive] = await Promise.all([
		findActiveIds(ctx, ids, tx),
		findArchivedIds(ctx, ids, tx),
	]);

	const parents = new Map<string, string | null>();
	for (const item of items) parents.set(item.id, item.parentId);

	const toActive = new Map<string, Record<string, unknown>[]>();
	const toArchive: Item[] = [];
	let rowsSkipped = 0;

	for (const item of items) {
		if (inActive.has(item.id) || inArchive.has(item.id)) {
			rowsSkipped++;
			continue;
		}
		const migrated = { ...item, depth: await legacyDepth(tx, item, parents) };
		if (
			migrated.completedAt !== null &&
			migrated.status === "done" &&
			migrated.completedAt.getTime() <= archiveBefore.getTime()
		) {
			toArchive.push(migrated);
			continue;
		}
		const { name } = activePartitionFor(ctx, migrated.userId);
		const bucket = toActive.get(name) ?? [];
		bucket.push(itemToRow(migrated));
		toActive.set(name, bucket);
	}

	for (const [model, data] of toActive) {
		await tx.createMany({ model, data });
	}
	await insertArchivedMany(ctx, toArchive, now, tx);

	const last = items[items.length - 1];
	const rowsMigrated = items.length - rowsSkipped;
	await tx.update({
		model: MIGRATION_PROGRESS_TABLE,
		where: [{ field: "id", operator: "eq", value: progressId }],
		update: {
			rowsProcessed: items.length,
			rowsMigrated,
			lastCreatedAt: last?.createdAt ?? null,
			lastId: last?.id ?? null,
			completedAt: ctx.now(),
			status: "completed",
		},
	});

	return { rowsProcessed: items.length, rowsMigrated, rowsSkipped };
}

async function runBatch(ctx: StrataContext, offset: number, batchSize: number): Promise<BatchOutcome> {
	const progressId = generateId();
	await ctx.adapter.create({
		model: MIGRATION_PROGRESS_TABLE,
		data: {
			id: progressId,
			batchStartOffset: offset,
			rowsProcessed: 0,
			rowsMigrated: 0,
			lastCreatedAt: null,
			lastId: null,
			startedAt: ctx.now(),
			completedAt: null,
			status: "running",
			error: null,
		},
	});

	try {
		return await ctx.adapter.transaction((tx) => copyBatch(ctx, tx, progressId, offset, batchSize));
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		await ctx.adapter.update({
			model: MIGRATION_PROGRESS_TABLE,
			where: [{ field: "id", operator: "eq", value: progressId }],
			update: { status: "failed", error: message, completedAt: ctx.now() },
		});
		ctx.logger.error("Migration batch failed", { offset, batchSize, error: message });
		throw error;
	}
}

/**
 * Copy up to `maxBatches` batches of legacy rows. Rows whose id already
 * exists in either store are skipped, so re-running is safe.
 */
export async function migrateBatch(
	ctx: StrataContext,
	options: MigrateBatchOptions = {},
): Promise<MigrateBatchResult> {
	const batchSize = requirePositiveInteger("batchSize", options.batchSize ?? ctx.options.migrationBatchSize);
	const maxBatches = requirePositiveInteger("maxBatches", options.maxBatches ?? 1);

	const total = await ctx.adapter.count({ model: LEGACY_TABLE });
	let offset = await resumeOffset(ctx);

	if (offset < total) {
		const created = await provisionAhead(ctx, 0);
		ctx.logger.info("Migration run starting", {
			offset,
			totalLegacyRows: total,
			batchSize,
			maxBatches,
			provisioned: created,
		});
	}

	const result: MigrateBatchResult = {
		rowsMigrated: 0,
		rowsSkipped: 0,
		batchesRun: 0,
		done: false,
		offset,
	};

	while (result.batchesRun < maxBatches && offset < total) {
		if (options.signal?.aborted) {
			ctx.logger.warn("Migration aborted between batches", { offset });
			break;
		}
		const outcome = await runBatch(ctx, offset, batchSize);
		result.batchesRun++;
		result.rowsMigrated += outcome.rowsMigrated;
		result.rowsSkipped += outcome.rowsSkipped;
		ctx.logger.info("Migration batch completed", { offset, ...outcome });
		if (outcome.rowsProcessed === 0) break;
		offset += outcome.rowsProcessed;
	}

	result.offset = offset;
	result.done = offset >= total;
	return result;
}

export async function migrationProgress(ctx: StrataContext): Promise<MigrationProgress> {
	const [totalLegacyRows, offset, completedBatches, failedBatches, latest] = await Promise.all([
		ctx.adapter.count({ model: LEGACY_TABLE }),
		resumeOffset(ctx),
		ctx.adapter.count({
			model: MIGRATION_PROGRESS_TABLE,
			where: [{ field: "status", operator: "eq", value: "completed" }],
		}),
		ctx.adapter.count({
			model: MIGRATION_PROGRESS_TABLE,
			where: [{ field: "status", operator: "eq", value: "failed" }],
		}),
		ctx.adapter.findMany<RawMigrationProgressRow>({
			model: MIGRATION_PROGRESS_TABLE,
			sortBy: [
				{ field: "startedAt", direction: "desc" },
				{ field: "batchStartOffset", direction: "desc" },
			],
			limit: 1,
		}),
	]);
	const [last] = latest;
	return {
		totalLegacyRows,
		offset,
		completedBatches,
		failedBatches,
		lastRun: last ? rawRowToProgress(last) : null,
	};
}

// =============================================================================
// VALIDATION
// =============================================================================

interface StoreSnapshot {
	count: number;
	byStatus: Record<string, number>;
	tenants: Set<string>;
	ids: Set<string>;
	parentIds: string[];
}

async function snapshotModels(db: StrataTransactionAdapter, models: string[]): Promise<StoreSnapshot> {
	const snapshot: StoreSnapshot = {
		count: 0,
		byStatus: {},
		tenants: new Set(),
		ids: new Set(),
		parentIds: [],
	};
	for (const model of models) {
		const [count, todo, inProgress, done, tenants, ids, parentIds] = await Promise.all([
			db.count({ model }),
			db.count({ model, where: [{ field: "status", operator: "eq", value: "todo" }] }),
			db.count({ model, where: [{ field: "status", operator: "eq", value: "in_progress" }] }),
			db.count({ model, where: [{ field: "status", operator: "eq", value: "done" }] }),
			db.distinct<string>({ model, field: "userId" }),
			db.distinct<string>({ model, field: "id" }),
			db.distinct<string>({ model, field: "parentId" }),
		]);
		snapshot.count += count;
		snapshot.byStatus.todo = (snapshot.byStatus.todo ?? 0) + todo;
		snapshot.byStatus.in_progress = (snapshot.byStatus.in_progress ?? 0) + inProgress;
		snapshot.byStatus.done = (snapshot.byStatus.done ?? 0) + done;
		for (const tenant of tenants) snapshot.tenants.add(String(tenant));
		for (const id of ids) snapshot.ids.add(String(id));
		for (const parentId of parentIds) snapshot.parentIds.push(String(parentId));
	}
	return snapshot;
}

function check(
	name: ValidationCheckName,
	expected: number,
	actual: number,
	message: string,
	pass = expected === actual,
): ValidationCheck {
	return { name, expected, actual, pass, message };
}

/**
 * Compare the legacy table with the partitioned stores. Orphaned parents are
 * counted on both sides; the split must not add any.
 */
export async function validateMigration(ctx: StrataContext): Promise<ValidationReport> {
	const archiveModels = (await listArchivePartitions(ctx)).map((p) => p.name);
	const activeModels = allActivePartitions(ctx);

	const [legacy, active, archive] = await Promise.all([
		snapshotModels(ctx.adapter, [LEGACY_TABLE]),
		snapshotModels(ctx.adapter, activeModels),
		snapshotModels(ctx.adapter, archiveModels),
	]);

	const partitionedIds = new Set([...active.ids, ...archive.ids]);
	const partitionedTenants = new Set([...active.tenants, ...archive.tenants]);
	const statusCount = (status: string) =>
		(active.byStatus[status] ?? 0) + (archive.byStatus[status] ?? 0);

	const legacyOrphans = legacy.parentIds.filter((id) => !legacy.ids.has(id)).length;
	const partitionedOrphans = [...active.parentIds, ...archive.parentIds].filter(
		(id) => !partitionedIds.has(id),
	).length;

	let missing = 0;
	let duplicated = 0;
	for (const id of legacy.ids) {
		const inActive = active.ids.has(id);
		const inArchive = archive.ids.has(id);
		if (!inActive && !inArchive) missing++;
		if (inActive && inArchive) duplicated++;
	}
	const covered = legacy.ids.size - missing - duplicated;

	const checks: ValidationCheck[] = [
		check(
			"total_rows",
			legacy.count,
			active.count + archive.count,
			`legacy ${legacy.count}, active ${active.count} + archive ${archive.count}`,
		),
		check("status_todo", legacy.byStatus.todo ?? 0, statusCount("todo"), "items with status todo"),
		check(
			"status_in_progress",
			legacy.byStatus.in_progress ?? 0,
			statusCount("in_progress"),
			"items with status in_progress",
		),
		check("status_done", legacy.byStatus.done ?? 0, statusCount("done"), "items with status done"),
		check("tenant_count", legacy.tenants.size, partitionedTenants.size, "distinct tenant keys"),
		check(
			"orphaned_parents",
			legacyOrphans,
			partitionedOrphans,
			"parent references with no matching item",
		),
		check(
			"id_coverage",
			legacy.ids.size,
			covered,
			`${missing} ids missing from both stores, ${duplicated} ids in both`,
			missing === 0 && duplicated === 0,
		),
	];

	const report = { checks, passed: checks.every((c) => c.pass) };
	ctx.logger.info("Migration validated", {
		passed: report.passed,
		failed: checks.filter((c) => !c.pass).map((c) => c.name),
	});
	return report;
}

/** Validate and return the report; any failing check blocks cutover. */
export async function cutover(ctx: StrataContext): Promise<ValidationReport> {
	const report = await validateMigration(ctx);
	if (!report.passed) {
		const failed = report.checks.filter((c) => !c.pass);
		throw StrataError.validationFailed(
			failed.map((c) => c.name),
			{ checks: failed },
		);
	}
	ctx.logger.info("Migration cutover approved", { checks: report.checks.length });
	return report;
}
