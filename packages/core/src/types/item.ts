// =============================================================================
// ITEM TYPES
// =============================================================================

export type ItemStatus = "todo" | "in_progress" | "done";

export const ITEM_STATUSES = ["todo", "in_progress", "done"] as const satisfies readonly ItemStatus[];

/** Longest accepted title. */
export const MAX_TITLE_LENGTH = 500;
export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 5;
export const DEFAULT_PRIORITY = 3;

export interface Item {
	id: string;
	/** Tenant key. Immutable; drives hash partition placement. */
	userId: string;
	parentId: string | null;
	projectId: string | null;
	title: string;
	description: string | null;
	status: ItemStatus;
	priority: number;
	dueDate: Date | null;
	/** Non-null exactly when `status` is `"done"`. */
	completedAt: Date | null;
	aiGenerated: boolean;
	/** 0 for roots, parent depth + 1 otherwise. */
	depth: number;
	createdAt: Date;
	updatedAt: Date;
}

export interface ArchivedItem extends Item {
	status: "done";
	completedAt: Date;
	archivedAt: Date;
}

/** A row of the monolithic pre-partitioning `todos` table. */
export interface LegacyItem extends Omit<Item, "depth" | "updatedAt"> {
	updatedAt: Date | null;
}

export interface CreateItemInput {
	/** Supplied ids are checked against both stores; otherwise a UUID is generated. */
	id?: string;
	userId: string;
	parentId?: string | null;
	projectId?: string | null;
	title: string;
	description?: string | null;
	status?: ItemStatus;
	priority?: number;
	dueDate?: Date | null;
	aiGenerated?: boolean;
}

/** Fields a caller may change. `completedAt` is always derived from `status`. */
export interface UpdateItemInput {
	title?: string;
	description?: string | null;
	status?: ItemStatus;
	priority?: number;
	dueDate?: Date | null;
	projectId?: string | null;
	parentId?: string | null;
	aiGenerated?: boolean;
}

export type ItemOrder = "priority_desc" | "created_asc" | "created_desc" | "due_asc";

export interface ItemQuery {
	/** Leading filter. Omitted only by administrative scans across every partition. */
	tenantKey?: string;
	status?: ItemStatus;
	projectId?: string;
	/** `null` restricts to root items. */
	parentId?: string | null;
	dueBefore?: Date;
	dueAfter?: Date;
	aiGenerated?: boolean;
	priority?: number;
	/** Case-insensitive substring match on title or description. */
	search?: string;
	order?: ItemOrder;
	limit?: number;
	offset?: number;
}

export interface ArchiveQuery extends ItemQuery {
	/** Inclusive lower bound on `archivedAt`. */
	archivedFrom?: Date;
	/** Exclusive upper bound on `archivedAt`. */
	archivedTo?: Date;
}

export interface ItemPage<T> {
	items: T[];
	total: number;
	hasMore: boolean;
}

export type ItemLocation = "active" | "archive";

/** An item resolved through the union view, tagged with the store it came from. */
export interface LocatedItem {
	location: ItemLocation;
	item: Item;
	archivedAt: Date | null;
}

export interface ItemStats {
	total: number;
	active: number;
	archived: number;
	completed: number;
	inProgress: number;
	pending: number;
	overdue: number;
	/** Percentage of items that are done, rounded to two decimals. */
	completionRate: number;
}
