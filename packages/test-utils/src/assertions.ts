import type { StrataContext } from "@strata/core";
import type { Strata } from "strata";
import { ACTIVE_TABLE, ARCHIVE_TABLE } from "strata/db";

type Row = Record<string, unknown>;

async function rowsOf(ctx: StrataContext, parent: string): Promise<Map<string, Row[]>> {
	const byPartition = new Map<string, Row[]>();
	for (const partition of await ctx.adapter.catalog.listPartitions(parent)) {
		byPartition.set(partition.name, await ctx.adapter.findMany<Row>({ model: partition.name }));
	}
	return byPartition;
}

/**
 * Assert that every row in both stores is `done` exactly when it has a
 * `completedAt`.
 */
export async function assertCompletedAtInvariant(strata: Strata): Promise<void> {
	const ctx = await strata.$context;
	for (const parent of [ACTIVE_TABLE, ARCHIVE_TABLE]) {
		for (const [partition, rows] of await rowsOf(ctx, parent)) {
			for (const row of rows) {
				const done = row.status === "done";
				const completed = row.completedAt !== null && row.completedAt !== undefined;
				if (done !== completed) {
					throw new Error(
						`completedAt invariant violated in ${partition}: item ${String(row.id)} has status ${String(row.status)} and completedAt ${String(row.completedAt)}`,
					);
				}
			}
		}
	}
}

/** Assert that no item id is stored in both Active and Archive. */
export async function assertCrossStoreUniqueness(strata: Strata): Promise<void> {
	const ctx = await strata.$context;
	const activeIds = new Set<unknown>();
	for (const rows of (await rowsOf(ctx, ACTIVE_TABLE)).values()) {
		for (const row of rows) activeIds.add(row.id);
	}
	for (const [partition, rows] of await rowsOf(ctx, ARCHIVE_TABLE)) {
		for (const row of rows) {
			if (activeIds.has(row.id)) {
				throw new Error(`Item ${String(row.id)} is in Active and in ${partition}`);
			}
		}
	}
}

/** Number of Active rows per partition, keyed by partition name; empty partitions included. */
export async function activeRowCounts(strata: Strata): Promise<Record<string, number>> {
	const ctx = await strata.$context;
	const counts: Record<string, number> = {};
	for (const [partition, rows] of await rowsOf(ctx, ACTIVE_TABLE)) {
		counts[partition] = rows.length;
	}
	return counts;
}
