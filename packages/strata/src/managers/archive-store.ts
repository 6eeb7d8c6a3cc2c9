// =============================================================================
// ARCHIVE STORE
// =============================================================================
// Monthly range partitions of completed items, keyed by `archived_at`.
// Partitions are provisioned explicitly; an insert into a month without a
// partition fails instead of creating one.

import type {
	ArchivedItem,
	ArchiveQuery,
	Item,
	ItemPage,
	RangePartitionSpec,
	StrataContext,
	StrataTransactionAdapter,
} from "@strata/core";
import { StrataError } from "@strata/core";
import {
	addUtcMonths,
	chunk,
	monthOf,
	requireNonNegativeInteger,
	requirePositiveInteger,
	resolveLimit,
	resolveOffset,
	startOfUtcMonth,
	type YearMonth,
} from "@strata/core/utils";
import {
	archivePartitionName,
	archivePartitionSpec,
	archiveSpecsFrom,
	parseArchivePartitionName,
} from "../db/partitioning.js";
import { ARCHIVE_TABLE } from "../db/schema.js";
import {
	archivedItemToRow,
	buildArchiveWhere,
	DEFAULT_QUERY_LIMIT,
	MAX_QUERY_LIMIT,
	queryPartitions,
	rawRowToArchivedItem,
} from "./item-helpers.js";
import type { RawArchivedItemRow } from "./raw-types.js";

export interface ArchivePartition extends YearMonth {
	name: string;
	/** Inclusive. */
	from: Date;
	/** Exclusive. */
	to: Date;
}

// =============================================================================
// PARTITION MANAGEMENT
// =============================================================================

/** Monthly archive partitions, oldest first. */
export async function listArchivePartitions(ctx: StrataContext): Promise<ArchivePartition[]> {
	const specs = await ctx.adapter.catalog.listPartitions(ARCHIVE_TABLE);
	const partitions: ArchivePartition[] = [];
	for (const spec of specs) {
		if (spec.strategy !== "range") continue;
		const yearMonth = parseArchivePartitionName(spec.name) ?? monthOf(spec.from);
		partitions.push({ name: spec.name, ...yearMonth, from: spec.from, to: spec.to });
	}
	return partitions.sort((a, b) => a.from.getTime() - b.from.getTime());
}

async function createArchivePartition(
	ctx: StrataContext,
	spec: RangePartitionSpec,
): Promise<boolean> {
	const created = await ctx.adapter.catalog.createPartition(spec);
	if (created) {
		ctx.logger.info("Archive partition created", {
			partition: spec.name,
			from: spec.from.toISOString(),
			to: spec.to.toISOString(),
		});
	}
	return created;
}

/** Create the partition for one month. Calling it again for the same month is a no-op. */
export async function createPartitionForMonth(
	ctx: StrataContext,
	year: number,
	month: number,
): Promise<{ name: string; created: boolean }> {
	const spec = archivePartitionSpec({ year, month });
	const created = await createArchivePartition(ctx, spec);
	return { name: spec.name, created };
}

/** Create the current month's partition and the `monthsAhead` after it. Returns the new names. */
export async function provisionAhead(
	ctx: StrataContext,
	monthsAhead: number = ctx.options.archivePartitionsAhead,
): Promise<string[]> {
	requireNonNegativeInteger("monthsAhead", monthsAhead);
	const created: string[] = [];
	for (const spec of archiveSpecsFrom(ctx.now(), monthsAhead)) {
		if (await createArchivePartition(ctx, spec)) created.push(spec.name);
	}
	return created;
}

/**
 * Drop every partition whose whole range ends at or before the first of the
 * current month minus `retentionMonths`. Rows go with the partition.
 */
export async function dropPartitionsOlderThan(
	ctx: StrataContext,
	retentionMonths: number,
): Promise<string[]> {
	requirePositiveInteger("retentionMonths", retentionMonths);
	const cutoff = addUtcMonths(startOfUtcMonth(ctx.now()), -retentionMonths);

	const dropped: string[] = [];
	for (const partition of await listArchivePartitions(ctx)) {
		if (partition.to.getTime() > cutoff.getTime()) continue;
		if (await ctx.adapter.catalog.dropPartition(partition.name)) {
			dropped.push(partition.name);
			ctx.logger.warn("Archive partition dropped", {
				partition: partition.name,
				cutoff: cutoff.toISOString(),
			});
		}
	}
	return dropped;
}

/** Name of the provisioned partition covering `archivedAt`. */
export async function requireArchivePartition(ctx: StrataContext, archivedAt: Date): Promise<string> {
	const name = archivePartitionName(monthOf(archivedAt));
	const partitions = await listArchivePartitions(ctx);
	if (!partitions.some((p) => p.name === name)) {
		throw StrataError.partitionNotProvisioned(name);
	}
	return name;
}

// =============================================================================
// WRITES
// =============================================================================

function requireArchivable(item: Item): void {
	if (item.status !== "done" || item.completedAt === null) {
		throw StrataError.constraintViolation(
			`Only done items with a completion time can be archived (item ${item.id})`,
			{ itemId: item.id, status: item.status },
		);
	}
}

/** Ids among `ids` that already exist in any archive partition. */
export async function findArchivedIds(
	ctx: StrataContext,
	ids: string[],
	db: StrataTransactionAdapter = ctx.adapter,
): Promise<Set<string>> {
	const found = new Set<string>();
	if (ids.length === 0) return found;
	for (const partition of await listArchivePartitions(ctx)) {
		for (const slice of chunk(ids)) {
			const existing = await db.distinct<string>({
				model: partition.name,
				field: "id",
				where: [{ field: "id", operator: "in", value: slice }],
			});
			for (const id of existing) found.add(id);
		}
	}
	return found;
}

/**
 * Copy completed items into the archive partition for `archivedAt`.
 * All-or-nothing: any failing check rejects the whole set.
 */
export async function insertArchivedMany(
	ctx: StrataContext,
	items: Item[],
	archivedAt: Date,
	db: StrataTransactionAdapter = ctx.adapter,
): Promise<ArchivedItem[]> {
	if (items.length === 0) return [];
	for (const item of items) requireArchivable(item);

	const partition = await requireArchivePartition(ctx, archivedAt);

	const ids = items.map((item) => item.id);
	if (new Set(ids).size !== ids.length) {
		throw StrataError.constraintViolation("Duplicate ids in archive batch");
	}
	const duplicates = await findArchivedIds(ctx, ids, db);
	if (duplicates.size > 0) {
		throw StrataError.constraintViolation("Item already archived", {
			itemIds: [...duplicates],
		});
	}

	await db.createMany({
		model: partition,
		data: items.map((item) => archivedItemToRow(item, archivedAt)),
	});

	return items.map((item) => rawRowToArchivedItem({ ...item, archivedAt }));
}

/** The only single-row write path into the archive. */
export async function insertArchived(
	ctx: StrataContext,
	item: Item,
	archivedAt: Date,
	db: StrataTransactionAdapter = ctx.adapter,
): Promise<ArchivedItem> {
	const [archived] = await insertArchivedMany(ctx, [item], archivedAt, db);
	if (!archived) {
		throw StrataError.internal(`Archiving item ${item.id} produced no row`);
	}
	return archived;
}

// =============================================================================
// READS
// =============================================================================

/**
 * Find an archived item. Archive partitions are keyed by time, so every
 * month is searched, newest first.
 */
export async function getArchivedItem(
	ctx: StrataContext,
	id: string,
	tenantKey?: string,
): Promise<ArchivedItem | null> {
	const where = buildArchiveWhere({ tenantKey });
	where.push({ field: "id", operator: "eq", value: id });

	const partitions = await listArchivePartitions(ctx);
	for (const partition of partitions.reverse()) {
		const row = await ctx.adapter.findOne<RawArchivedItemRow>({ model: partition.name, where });
		if (row) return rawRowToArchivedItem(row);
	}
	return null;
}

/** Partitions that can hold rows archived in `[from, to)`. */
function prunePartitions(
	partitions: ArchivePartition[],
	from: Date | undefined,
	to: Date | undefined,
): ArchivePartition[] {
	return partitions.filter(
		(p) =>
			(from === undefined || p.to.getTime() > from.getTime()) &&
			(to === undefined || p.from.getTime() < to.getTime()),
	);
}

export async function queryArchive(
	ctx: StrataContext,
	query: ArchiveQuery = {},
): Promise<ItemPage<ArchivedItem>> {
	const limit = resolveLimit(query.limit, DEFAULT_QUERY_LIMIT, MAX_QUERY_LIMIT);
	const offset = resolveOffset(query.offset);
	const where = buildArchiveWhere(query);

	const partitions = prunePartitions(
		await listArchivePartitions(ctx),
		query.archivedFrom,
		query.archivedTo,
	);
	if (partitions.length === 0) {
		return { items: [], total: 0, hasMore: false };
	}

	return queryPartitions<RawArchivedItemRow, ArchivedItem>(
		ctx.adapter,
		partitions.map((p) => p.name),
		{ where, order: query.order, limit, offset },
		rawRowToArchivedItem,
	);
}
