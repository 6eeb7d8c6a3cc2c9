// =============================================================================
// STRATA ADAPTER INTERFACE
// =============================================================================
// Storage contract shared by the in-memory and PostgreSQL adapters. Models are
// physical table names: every partition (`todo_active_p9`,
// `todo_archived_y2025m03`) is addressed directly, so routing stays in the
// library and both adapters see the same model names.
//
// Field names are camelCase here and snake_case in SQL.

import type { PartitionCatalog } from "./catalog.js";

export interface Where {
	field: string;
	operator: WhereOperator;
	value: unknown;
	/**
	 * Conditions marked `"OR"` form a single disjunction that is ANDed with
	 * every other condition. Default: `"AND"`.
	 */
	connector?: "AND" | "OR";
}

export type WhereOperator =
	| "eq"
	| "ne"
	| "gt"
	| "gte"
	| "lt"
	| "lte"
	| "in"
	| "not_in"
	/** Case-insensitive substring match; the value is a plain string, not a pattern. */
	| "contains"
	| "is_null"
	| "is_not_null";

export interface SortBy {
	field: string;
	direction: "asc" | "desc";
	/** Where NULL values sort. Default: last for asc, first for desc (PostgreSQL default). */
	nulls?: "first" | "last";
}

export interface StrataAdapter {
	id: string;

	create<T extends Record<string, unknown>>(data: { model: string; data: T }): Promise<T>;

	/** Insert many rows; returns the number inserted. */
	createMany(data: { model: string; data: Record<string, unknown>[] }): Promise<number>;

	findOne<T>(data: { model: string; where: Where[]; forUpdate?: boolean }): Promise<T | null>;

	findMany<T>(data: {
		model: string;
		where?: Where[];
		limit?: number;
		offset?: number;
		sortBy?: SortBy | SortBy[];
	}): Promise<T[]>;

	update<T>(data: {
		model: string;
		where: Where[];
		update: Record<string, unknown>;
	}): Promise<T | null>;

	/** Delete matching rows; returns the number deleted. */
	delete(data: { model: string; where: Where[] }): Promise<number>;

	count(data: { model: string; where?: Where[] }): Promise<number>;

	/** Distinct non-null values of one field. */
	distinct<T>(data: { model: string; field: string; where?: Where[] }): Promise<T[]>;

	transaction<T>(fn: (tx: StrataTransactionAdapter) => Promise<T>): Promise<T>;

	/** Physical partitions and their upkeep. */
	catalog: PartitionCatalog;

	options?: StrataAdapterOptions;
}

export type StrataTransactionAdapter = Omit<StrataAdapter, "transaction" | "catalog">;

export interface StrataAdapterOptions {
	dialectName: "postgres" | "memory";
	/** PostgreSQL schema for table name qualification. Set by the Strata context. */
	schema?: string;
}
