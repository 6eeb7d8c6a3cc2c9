// =============================================================================
// ITEM HELPERS
// =============================================================================
// Row mapping, filter building and ordering shared by the active store, the
// archive store and the union view.

import type {
	ArchivedItem,
	ArchiveQuery,
	CreateItemInput,
	Item,
	ItemOrder,
	ItemPage,
	ItemQuery,
	ItemStatus,
	SortBy,
	StrataTransactionAdapter,
	Where,
} from "@strata/core";
import { DEFAULT_PRIORITY, MAX_PRIORITY, MAX_TITLE_LENGTH, MIN_PRIORITY, StrataError } from "@strata/core";
import { requireIntegerInRange, requireTenantKey, requireText, requireValidDate } from "@strata/core/utils";
import type { RawArchivedItemRow, RawItemRow } from "./raw-types.js";

export const DEFAULT_QUERY_LIMIT = 50;
export const MAX_QUERY_LIMIT = 500;

// =============================================================================
// VALUE CONVERSION
// =============================================================================

export function toDate(value: Date | string): Date {
	return value instanceof Date ? value : new Date(value);
}

export function toOptionalDate(value: Date | string | null | undefined): Date | null {
	return value === null || value === undefined ? null : toDate(value);
}

export function isItemStatus(value: string): value is ItemStatus {
	return value === "todo" || value === "in_progress" || value === "done";
}

function parseStatus(value: string): ItemStatus {
	if (!isItemStatus(value)) {
		throw StrataError.internal(`Unknown item status "${value}"`);
	}
	return value;
}

export function rawRowToItem(row: RawItemRow): Item {
	return {
		id: row.id,
		userId: row.userId,
		parentId: row.parentId ?? null,
		projectId: row.projectId ?? null,
		title: row.title,
		description: row.description ?? null,
		status: parseStatus(row.status),
		priority: Number(row.priority),
		dueDate: toOptionalDate(row.dueDate),
		completedAt: toOptionalDate(row.completedAt),
		aiGenerated: row.aiGenerated ?? false,
		depth: Number(row.depth ?? 0),
		createdAt: toDate(row.createdAt),
		updatedAt: toDate(row.updatedAt),
	};
}

export function rawRowToArchivedItem(row: RawArchivedItemRow): ArchivedItem {
	const item = rawRowToItem(row);
	if (item.status !== "done" || item.completedAt === null) {
		throw StrataError.internal(`Archived item ${item.id} is not a completed item`);
	}
	return { ...item, status: "done", completedAt: item.completedAt, archivedAt: toDate(row.archivedAt) };
}

/** Column values for an Active row (camelCase; adapters convert). */
export function itemToRow(item: Item): Record<string, unknown> {
	return {
		id: item.id,
		userId: item.userId,
		parentId: item.parentId,
		projectId: item.projectId,
		title: item.title,
		description: item.description,
		status: item.status,
		priority: item.priority,
		dueDate: item.dueDate,
		completedAt: item.completedAt,
		aiGenerated: item.aiGenerated,
		depth: item.depth,
		createdAt: item.createdAt,
		updatedAt: item.updatedAt,
	};
}

export function archivedItemToRow(item: Item, archivedAt: Date): Record<string, unknown> {
	return { ...itemToRow(item), archivedAt };
}

/** Strip the archive-only field. */
export function toActiveShape(item: ArchivedItem): Item {
	const { archivedAt: _archivedAt, ...rest } = item;
	return rest;
}

// =============================================================================
// INPUT VALIDATION
// =============================================================================

export function validatePriority(priority: number): number {
	return requireIntegerInRange("priority", priority, MIN_PRIORITY, MAX_PRIORITY);
}

export function validateTitle(title: string): string {
	return requireText("title", title, MAX_TITLE_LENGTH);
}

/** Checks field values of a create request; structural checks need the store. */
export function validateCreateInput(input: CreateItemInput): void {
	requireTenantKey("userId", input.userId);
	validateTitle(input.title);
	if (input.id !== undefined) requireText("id", input.id);
	if (input.status !== undefined && !isItemStatus(input.status)) {
		throw StrataError.invalidArgument(`Unknown item status "${String(input.status)}"`);
	}
	validatePriority(input.priority ?? DEFAULT_PRIORITY);
	if (input.dueDate) requireValidDate("dueDate", input.dueDate);
}

/**
 * `completedAt` for a status change. Moving into `done` stamps `now`; staying
 * `done` keeps the original stamp; leaving `done` is rejected.
 */
export function completedAtFor(current: Item, next: ItemStatus, now: Date): Date | null {
	if (current.status === "done" && next !== "done") {
		throw StrataError.constraintViolation(
			`Item ${current.id} is done and cannot move back to "${next}"`,
			{ itemId: current.id, from: current.status, to: next },
		);
	}
	if (next !== "done") return null;
	return current.completedAt ?? now;
}

// =============================================================================
// FILTERS
// =============================================================================

export function buildItemWhere(query: ItemQuery): Where[] {
	const where: Where[] = [];

	if (query.tenantKey !== undefined) {
		where.push({ field: "userId", operator: "eq", value: requireTenantKey("tenantKey", query.tenantKey) });
	}
	if (query.status !== undefined) {
		where.push({ field: "status", operator: "eq", value: query.status });
	}
	if (query.projectId !== undefined) {
		where.push({ field: "projectId", operator: "eq", value: query.projectId });
	}
	if (query.parentId === null) {
		where.push({ field: "parentId", operator: "is_null", value: null });
	} else if (query.parentId !== undefined) {
		where.push({ field: "parentId", operator: "eq", value: query.parentId });
	}
	if (query.dueBefore !== undefined) {
		where.push({ field: "dueDate", operator: "lte", value: requireValidDate("dueBefore", query.dueBefore) });
	}
	if (query.dueAfter !== undefined) {
		where.push({ field: "dueDate", operator: "gte", value: requireValidDate("dueAfter", query.dueAfter) });
	}
	if (query.aiGenerated !== undefined) {
		where.push({ field: "aiGenerated", operator: "eq", value: query.aiGenerated });
	}
	if (query.priority !== undefined) {
		where.push({ field: "priority", operator: "eq", value: validatePriority(query.priority) });
	}

	const search = query.search?.trim();
	if (search) {
		where.push({ field: "title", operator: "contains", value: search, connector: "OR" });
		where.push({ field: "description", operator: "contains", value: search, connector: "OR" });
	}

	return where;
}

export function buildArchiveWhere(query: ArchiveQuery): Where[] {
	const where = buildItemWhere(query);
	if (query.archivedFrom !== undefined) {
		where.push({
			field: "archivedAt",
			operator: "gte",
			value: requireValidDate("archivedFrom", query.archivedFrom),
		});
	}
	if (query.archivedTo !== undefined) {
		where.push({
			field: "archivedAt",
			operator: "lt",
			value: requireValidDate("archivedTo", query.archivedTo),
		});
	}
	return where;
}

// =============================================================================
// ORDERING
// =============================================================================

type ItemSortField = "priority" | "createdAt" | "dueDate" | "id";

interface ItemSortBy extends SortBy {
	field: ItemSortField;
}

const ORDERS: Record<ItemOrder, ItemSortBy[]> = {
	priority_desc: [
		{ field: "priority", direction: "desc" },
		{ field: "createdAt", direction: "desc" },
	],
	created_asc: [{ field: "createdAt", direction: "asc" }],
	created_desc: [{ field: "createdAt", direction: "desc" }],
	due_asc: [
		{ field: "dueDate", direction: "asc", nulls: "last" },
		{ field: "createdAt", direction: "asc" },
	],
};

/** Sort keys for an order, with `id` as the final tie-breaker. */
export function sortForOrder(order: ItemOrder = "priority_desc"): ItemSortBy[] {
	const keys = ORDERS[order];
	if (!keys) {
		throw StrataError.invalidArgument(`Unknown order "${String(order)}"`);
	}
	return [...keys, { field: "id", direction: "asc" }];
}

function sortValue(item: Item, field: ItemSortField): number | string | null {
	switch (field) {
		case "priority":
			return item.priority;
		case "createdAt":
			return item.createdAt.getTime();
		case "dueDate":
			return item.dueDate?.getTime() ?? null;
		case "id":
			return item.id;
	}
}

/** Comparator matching the SQL ORDER BY of `sortForOrder`, for merging partitions. */
export function compareItems(order: ItemOrder = "priority_desc"): (a: Item, b: Item) => number {
	const keys = sortForOrder(order);
	return (a, b) => {
		for (const key of keys) {
			const left = sortValue(a, key.field);
			const right = sortValue(b, key.field);
			if (left === right) continue;

			const nullsFirst = (key.nulls ?? (key.direction === "desc" ? "first" : "last")) === "first";
			if (left === null) return nullsFirst ? -1 : 1;
			if (right === null) return nullsFirst ? 1 : -1;

			const comparison =
				typeof left === "number" && typeof right === "number"
					? left - right
					: String(left) < String(right)
						? -1
						: 1;
			return key.direction === "desc" ? -comparison : comparison;
		}
		return 0;
	};
}

// =============================================================================
// PARTITION FAN-OUT
// =============================================================================

export interface PageRequest {
	where: Where[];
	order?: ItemOrder;
	limit: number;
	offset: number;
}

/**
 * Page through one or more partitions. A single partition is paged by the
 * database; several are each read up to `offset + limit` rows and merged.
 */
export async function queryPartitions<R, T extends Item>(
	db: StrataTransactionAdapter,
	models: string[],
	request: PageRequest,
	map: (row: R) => T,
): Promise<ItemPage<T>> {
	const sortBy = sortForOrder(request.order);
	const { where, limit, offset } = request;

	if (models.length === 1 && models[0] !== undefined) {
		const model = models[0];
		const [rows, total] = await Promise.all([
			db.findMany<R>({ model, where, sortBy, limit, offset }),
			db.count({ model, where }),
		]);
		const items = rows.map(map);
		return { items, total, hasMore: offset + items.length < total };
	}

	let total = 0;
	const merged: T[] = [];
	for (const model of models) {
		const [rows, count] = await Promise.all([
			db.findMany<R>({ model, where, sortBy, limit: offset + limit }),
			db.count({ model, where }),
		]);
		total += count;
		for (const row of rows) merged.push(map(row));
	}
	merged.sort(compareItems(request.order));
	const items = merged.slice(offset, offset + limit);
	return { items, total, hasMore: offset + items.length < total };
}
