// =============================================================================
// ITEM VIEW
// =============================================================================
// Read side spanning both stores. Lookups try Active first, then Archive; the
// first match wins. Nothing enforces references to items from other tables,
// so collaborators that store item ids check them here before writing.

import type { ItemStats, LocatedItem, StrataContext, Where } from "@strata/core";
import { StrataError } from "@strata/core";
import { getItem } from "./active-store.js";
import { getArchivedItem, listArchivePartitions } from "./archive-store.js";
import { toActiveShape } from "./item-helpers.js";
import { activePartitionFor } from "./partition-router.js";

export async function findItem(
	ctx: StrataContext,
	id: string,
	tenantKey: string,
): Promise<LocatedItem | null> {
	const active = await getItem(ctx, id, tenantKey);
	if (active) return { location: "active", item: active, archivedAt: null };

	const archived = await getArchivedItem(ctx, id, tenantKey);
	if (archived) {
		return { location: "archive", item: toActiveShape(archived), archivedAt: archived.archivedAt };
	}
	return null;
}

/**
 * Referential check for collaborators holding item ids (attachments, links).
 * A reference can still dangle if the item is deleted later.
 */
export async function assertItemExists(
	ctx: StrataContext,
	id: string,
	tenantKey: string,
): Promise<LocatedItem> {
	const found = await findItem(ctx, id, tenantKey);
	if (!found) {
		throw StrataError.notFound(`Item ${id} not found`, { itemId: id });
	}
	return found;
}

function round2(value: number): number {
	return Math.round(value * 100) / 100;
}

/** Counts for one tenant across both stores. Archived items are all done. */
export async function itemStats(ctx: StrataContext, tenantKey: string): Promise<ItemStats> {
	const { name } = activePartitionFor(ctx, tenantKey);
	const tenant: Where = { field: "userId", operator: "eq", value: tenantKey };
	const now = ctx.now();

	const [active, activeDone, inProgress, overdue] = await Promise.all([
		ctx.adapter.count({ model: name, where: [tenant] }),
		ctx.adapter.count({
			model: name,
			where: [tenant, { field: "status", operator: "eq", value: "done" }],
		}),
		ctx.adapter.count({
			model: name,
			where: [tenant, { field: "status", operator: "eq", value: "in_progress" }],
		}),
		ctx.adapter.count({
			model: name,
			where: [
				tenant,
				{ field: "status", operator: "ne", value: "done" },
				{ field: "dueDate", operator: "lt", value: now },
			],
		}),
	]);

	let archived = 0;
	for (const partition of await listArchivePartitions(ctx)) {
		archived += await ctx.adapter.count({ model: partition.name, where: [tenant] });
	}

	const total = active + archived;
	const completed = activeDone + archived;
	return {
		total,
		active,
		archived,
		completed,
		inProgress,
		pending: active - activeDone - inProgress,
		overdue,
		completionRate: total === 0 ? 0 : round2((completed / total) * 100),
	};
}
