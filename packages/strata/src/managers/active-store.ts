// =============================================================================
// ACTIVE-ITEM STORE
// =============================================================================
// Hash-partitioned hot storage. Every tenant-scoped operation touches only the
// tenant's partition; administrative reads without a tenant key scan all of
// them.

import type {
	CreateItemInput,
	Item,
	ItemPage,
	ItemQuery,
	StrataContext,
	StrataTransactionAdapter,
	UpdateItemInput,
} from "@strata/core";
import { DEFAULT_PRIORITY, StrataError } from "@strata/core";
import {
	chunk,
	generateId,
	requireText,
	requireValidDate,
	resolveLimit,
	resolveOffset,
} from "@strata/core/utils";
import { findArchivedIds } from "./archive-store.js";
import {
	buildItemWhere,
	completedAtFor,
	DEFAULT_QUERY_LIMIT,
	isItemStatus,
	itemToRow,
	MAX_QUERY_LIMIT,
	queryPartitions,
	rawRowToItem,
	validateCreateInput,
	validatePriority,
	validateTitle,
} from "./item-helpers.js";
import { activePartitionFor, allActivePartitions } from "./partition-router.js";
import type { RawItemRow } from "./raw-types.js";

/** Fields derived by the store; callers cannot set them. */
const PROTECTED_FIELDS = ["id", "userId", "completedAt", "depth", "createdAt", "updatedAt", "archivedAt"];

// =============================================================================
// LOOKUPS
// =============================================================================

export async function getItem(
	ctx: StrataContext,
	id: string,
	tenantKey: string,
	db: StrataTransactionAdapter = ctx.adapter,
	forUpdate = false,
): Promise<Item | null> {
	const { name } = activePartitionFor(ctx, tenantKey);
	const row = await db.findOne<RawItemRow>({
		model: name,
		where: [
			{ field: "id", operator: "eq", value: id },
			{ field: "userId", operator: "eq", value: tenantKey },
		],
		forUpdate,
	});
	return row ? rawRowToItem(row) : null;
}

async function requireItem(
	ctx: StrataContext,
	id: string,
	tenantKey: string,
	db: StrataTransactionAdapter,
): Promise<Item> {
	const item = await getItem(ctx, id, tenantKey, db, true);
	if (!item) {
		throw StrataError.notFound(`Item ${id} not found`, { itemId: id });
	}
	return item;
}

/** Look an item up without its tenant key. Scans every Active partition. */
export async function getItemAnyTenant(ctx: StrataContext, id: string): Promise<Item | null> {
	for (const model of allActivePartitions(ctx)) {
		const row = await ctx.adapter.findOne<RawItemRow>({
			model,
			where: [{ field: "id", operator: "eq", value: id }],
		});
		if (row) return rawRowToItem(row);
	}
	return null;
}

/** Ids among `ids` present in any Active partition. */
export async function findActiveIds(
	ctx: StrataContext,
	ids: string[],
	db: StrataTransactionAdapter = ctx.adapter,
): Promise<Set<string>> {
	const found = new Set<string>();
	if (ids.length === 0) return found;
	for (const model of allActivePartitions(ctx)) {
		for (const slice of chunk(ids)) {
			const existing = await db.distinct<string>({
				model,
				field: "id",
				where: [{ field: "id", operator: "in", value: slice }],
			});
			for (const id of existing) found.add(id);
		}
	}
	return found;
}

async function assertIdAvailable(
	ctx: StrataContext,
	id: string,
	db: StrataTransactionAdapter,
): Promise<void> {
	const [active, archived] = await Promise.all([
		findActiveIds(ctx, [id], db),
		findArchivedIds(ctx, [id], db),
	]);
	if (active.size > 0 || archived.size > 0) {
		throw StrataError.constraintViolation(`Item ${id} already exists`, {
			itemId: id,
			store: active.size > 0 ? "active" : "archive",
		});
	}
}

// =============================================================================
// HIERARCHY
// =============================================================================

async function depthUnder(
	ctx: StrataContext,
	db: StrataTransactionAdapter,
	tenantKey: string,
	parentId: string,
): Promise<number> {
	const parent = await getItem(ctx, parentId, tenantKey, db);
	if (!parent) {
		throw StrataError.notFound(`Parent item ${parentId} not found`, { parentId });
	}
	const depth = parent.depth + 1;
	if (depth > ctx.options.maxDepth) {
		throw StrataError.constraintViolation(
			`Item would be nested ${depth} levels deep (maximum ${ctx.options.maxDepth})`,
			{ parentId, depth },
		);
	}
	return depth;
}

/**
 * Descendants of `root` in the tenant's partition, depth-first with children
 * before their parent. Enumeration stops at the configured maximum depth.
 */
export async function collectDescendants(
	ctx: StrataContext,
	db: StrataTransactionAdapter,
	root: Item,
): Promise<Item[]> {
	const { name } = activePartitionFor(ctx, root.userId);
	const result: Item[] = [];

	const visit = async (parentId: string, level: number): Promise<void> => {
		if (level > ctx.options.maxDepth) return;
		const rows = await db.findMany<RawItemRow>({
			model: name,
			where: [
				{ field: "userId", operator: "eq", value: root.userId },
				{ field: "parentId", operator: "eq", value: parentId },
			],
			sortBy: { field: "id", direction: "asc" },
		});
		for (const row of rows) {
			const child = rawRowToItem(row);
			await visit(child.id, level + 1);
			result.push(child);
		}
	};

	await visit(root.id, 1);
	return result;
}

/** Walk up from `parentId`; moving `item` under it must not close a loop. */
async function assertNoCycle(
	ctx: StrataContext,
	db: StrataTransactionAdapter,
	item: Item,
	parentId: string,
): Promise<void> {
	let current: string | null = parentId;
	for (let step = 0; current !== null && step <= ctx.options.maxDepth; step++) {
		if (current === item.id) {
			throw StrataError.constraintViolation(`Item ${item.id} cannot become its own descendant`, {
				itemId: item.id,
				parentId,
			});
		}
		const ancestor: Item | null = await getItem(ctx, current, item.userId, db);
		current = ancestor?.parentId ?? null;
	}
}

// =============================================================================
// WRITES
// =============================================================================

export async function createItem(ctx: StrataContext, input: CreateItemInput): Promise<Item> {
	validateCreateInput(input);
	const tenantKey = input.userId;
	const { name } = activePartitionFor(ctx, tenantKey);

	const item = await ctx.adapter.transaction(async (tx) => {
		if (input.id !== undefined) {
			await assertIdAvailable(ctx, input.id, tx);
		}
		const parentId = input.parentId ?? null;
		const depth = parentId === null ? 0 : await depthUnder(ctx, tx, tenantKey, parentId);

		const now = ctx.now();
		const status = input.status ?? "todo";
		const created: Item = {
			id: input.id ?? generateId(),
			userId: tenantKey,
			parentId,
			projectId: input.projectId ?? null,
			title: validateTitle(input.title),
			description: input.description ?? null,
			status,
			priority: input.priority ?? DEFAULT_PRIORITY,
			dueDate: input.dueDate ?? null,
			completedAt: status === "done" ? now : null,
			aiGenerated: input.aiGenerated ?? false,
			depth,
			createdAt: now,
			updatedAt: now,
		};
		await tx.create({ model: name, data: itemToRow(created) });
		return created;
	});

	ctx.logger.debug("Item created", { itemId: item.id, partition: name, depth: item.depth });
	return item;
}

function assertUpdatable(fields: UpdateItemInput): void {
	for (const field of PROTECTED_FIELDS) {
		if (field in fields) {
			throw StrataError.invalidArgument(`Field "${field}" cannot be updated`, { field });
		}
	}
}

export async function updateItem(
	ctx: StrataContext,
	id: string,
	tenantKey: string,
	fields: UpdateItemInput,
): Promise<Item> {
	assertUpdatable(fields);
	const { name } = activePartitionFor(ctx, tenantKey);

	return ctx.adapter.transaction(async (tx) => {
		const current = await requireItem(ctx, id, tenantKey, tx);
		const now = ctx.now();
		const patch: Record<string, unknown> = {};

		if (fields.title !== undefined) patch.title = validateTitle(fields.title);
		if (fields.description !== undefined) patch.description = fields.description;
		if (fields.priority !== undefined) patch.priority = validatePriority(fields.priority);
		if (fields.dueDate !== undefined) {
			patch.dueDate = fields.dueDate === null ? null : requireValidDate("dueDate", fields.dueDate);
		}
		if (fields.projectId !== undefined) patch.projectId = fields.projectId;
		if (fields.aiGenerated !== undefined) patch.aiGenerated = fields.aiGenerated;

		if (fields.status !== undefined) {
			if (!isItemStatus(fields.status)) {
				throw StrataError.invalidArgument(`Unknown item status "${String(fields.status)}"`);
			}
			patch.status = fields.status;
			patch.completedAt = completedAtFor(current, fields.status, now);
		}

		if (fields.parentId !== undefined && fields.parentId !== current.parentId) {
			patch.parentId = fields.parentId;
			await reparent(ctx, tx, current, fields.parentId, patch);
		}

		if (Object.keys(patch).length === 0) return current;
		patch.updatedAt = now;

		const row = await tx.update<RawItemRow>({
			model: name,
			where: [
				{ field: "id", operator: "eq", value: id },
				{ field: "userId", operator: "eq", value: tenantKey },
			],
			update: patch,
		});
		if (!row) {
			throw StrataError.notFound(`Item ${id} not found`, { itemId: id });
		}
		return rawRowToItem(row);
	});
}

/** Move `item` under `parentId` (or to the root) and shift its subtree's depth. */
async function reparent(
	ctx: StrataContext,
	tx: StrataTransactionAdapter,
	item: Item,
	parentId: string | null,
	patch: Record<string, unknown>,
): Promise<void> {
	let depth = 0;
	if (parentId !== null) {
		requireText("parentId", parentId);
		await assertNoCycle(ctx, tx, item, parentId);
		depth = await depthUnder(ctx, tx, item.userId, parentId);
	}

	const delta = depth - item.depth;
	patch.depth = depth;
	if (delta === 0) return;

	const descendants = await collectDescendants(ctx, tx, item);
	const deepest = descendants.reduce((max, d) => Math.max(max, d.depth + delta), depth);
	if (deepest > ctx.options.maxDepth) {
		throw StrataError.constraintViolation(
			`Moving item ${item.id} would nest its subtree ${deepest} levels deep (maximum ${ctx.options.maxDepth})`,
			{ itemId: item.id, parentId, depth: deepest },
		);
	}

	const { name } = activePartitionFor(ctx, item.userId);
	for (const descendant of descendants) {
		await tx.update({
			model: name,
			where: [
				{ field: "id", operator: "eq", value: descendant.id },
				{ field: "userId", operator: "eq", value: item.userId },
			],
			update: { depth: descendant.depth + delta },
		});
	}
}

/** `todo` or `in_progress` to `done`. Done items are rejected like any move out of `done`. */
export async function toggleItem(ctx: StrataContext, id: string, tenantKey: string): Promise<Item> {
	const current = await getItem(ctx, id, tenantKey);
	if (!current) {
		throw StrataError.notFound(`Item ${id} not found`, { itemId: id });
	}
	if (current.status === "done") {
		throw StrataError.constraintViolation(`Item ${id} is already done`, { itemId: id });
	}
	return updateItem(ctx, id, tenantKey, { status: "done" });
}

/**
 * Delete an item and its descendants from the tenant's partition in one
 * transaction. Returns the number of rows deleted.
 */
export async function deleteItem(ctx: StrataContext, id: string, tenantKey: string): Promise<number> {
	const { name } = activePartitionFor(ctx, tenantKey);

	const deleted = await ctx.adapter.transaction(async (tx) => {
		const root = await requireItem(ctx, id, tenantKey, tx);
		const descendants = await collectDescendants(ctx, tx, root);
		let count = 0;
		for (const slice of chunk([...descendants.map((d) => d.id), root.id])) {
			count += await tx.delete({
				model: name,
				where: [
					{ field: "userId", operator: "eq", value: tenantKey },
					{ field: "id", operator: "in", value: slice },
				],
			});
		}
		return count;
	});

	ctx.logger.debug("Item deleted", { itemId: id, partition: name, deleted });
	return deleted;
}

// =============================================================================
// QUERIES
// =============================================================================

/**
 * Page through Active items. With `tenantKey` only the tenant's partition is
 * read; without it every partition is scanned and merged.
 */
export async function queryItems(ctx: StrataContext, query: ItemQuery = {}): Promise<ItemPage<Item>> {
	const limit = resolveLimit(query.limit, DEFAULT_QUERY_LIMIT, MAX_QUERY_LIMIT);
	const offset = resolveOffset(query.offset);
	const models =
		query.tenantKey !== undefined
			? [activePartitionFor(ctx, query.tenantKey).name]
			: allActivePartitions(ctx);

	return queryPartitions<RawItemRow, Item>(
		ctx.adapter,
		models,
		{ where: buildItemWhere(query), order: query.order, limit, offset },
		rawRowToItem,
	);
}

/** Direct children, highest priority first, then oldest first. */
export async function listSubtasks(ctx: StrataContext, id: string, tenantKey: string): Promise<Item[]> {
	const { name } = activePartitionFor(ctx, tenantKey);
	const rows = await ctx.adapter.findMany<RawItemRow>({
		model: name,
		where: [
			{ field: "userId", operator: "eq", value: tenantKey },
			{ field: "parentId", operator: "eq", value: id },
		],
		sortBy: [
			{ field: "priority", direction: "desc" },
			{ field: "createdAt", direction: "asc" },
			{ field: "id", direction: "asc" },
		],
	});
	return rows.map(rawRowToItem);
}
