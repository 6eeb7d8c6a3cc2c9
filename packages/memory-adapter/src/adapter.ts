// =============================================================================
// MEMORY ADAPTER -- StrataAdapter implementation backed by in-memory Maps
// =============================================================================
// For tests and embedded use; no database required.
// Data lives in nested Maps: model name -> record id -> record.
// Every partition is its own model, exactly as in PostgreSQL.

import type {
	SortBy,
	StrataAdapter,
	StrataTransactionAdapter,
	Where,
} from "@strata/core/db";
import { listValue, toSortList } from "@strata/core/db";
import { StrataError } from "@strata/core/error";
import { generateId } from "@strata/core/utils";
import { createMemoryCatalog, type MemoryCatalogState } from "./catalog.js";

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

type Row = Record<string, unknown>;
export type Store = Map<string, Map<string, Row>>;

export interface MemoryAdapterOptions {
	/** Clock used for vacuum/analyze timestamps. Default: `() => new Date()` */
	now?: () => Date;
}

/** Deep clone a store for copy-on-write transaction support. */
function cloneStore(store: Store): Store {
	const clone: Store = new Map();
	for (const [model, records] of store) {
		const recordClone = new Map<string, Row>();
		for (const [id, record] of records) {
			recordClone.set(id, { ...record });
		}
		clone.set(model, recordClone);
	}
	return clone;
}

function getModelStore(store: Store, model: string): Map<string, Row> {
	let modelStore = store.get(model);
	if (!modelStore) {
		modelStore = new Map();
		store.set(model, modelStore);
	}
	return modelStore;
}

function recordKey(record: Row): string {
	const id = record.id;
	if (typeof id === "string" || typeof id === "number") return String(id);
	throw new TypeError("Memory adapter records need a string or numeric id");
}

/** Comparable primitive for a stored value: Dates compare by instant. */
function comparable(value: unknown): unknown {
	return value instanceof Date ? value.getTime() : value;
}

function compare(a: unknown, b: unknown): number {
	const left = comparable(a);
	const right = comparable(b);
	if (typeof left === "number" && typeof right === "number") return left - right;
	if (typeof left === "string" && typeof right === "string") {
		return left < right ? -1 : left > right ? 1 : 0;
	}
	if (typeof left === "boolean" && typeof right === "boolean") {
		return Number(left) - Number(right);
	}
	return Number.NaN;
}

function isNullish(value: unknown): boolean {
	return value === null || value === undefined;
}

/** Evaluate a single Where condition against a record (SQL NULL semantics). */
function matchesCondition(record: Row, condition: Where): boolean {
	const value = record[condition.field];

	switch (condition.operator) {
		case "eq":
			return !isNullish(value) && compare(value, condition.value) === 0;
		case "ne":
			if (isNullish(value)) return !isNullish(condition.value);
			return isNullish(condition.value) || compare(value, condition.value) !== 0;
		case "gt":
			return !isNullish(value) && compare(value, condition.value) > 0;
		case "gte":
			return !isNullish(value) && compare(value, condition.value) >= 0;
		case "lt":
			return !isNullish(value) && compare(value, condition.value) < 0;
		case "lte":
			return !isNullish(value) && compare(value, condition.value) <= 0;
		case "in":
			return !isNullish(value) && listValue(condition).some((v) => compare(value, v) === 0);
		case "not_in":
			return !isNullish(value) && !listValue(condition).some((v) => compare(value, v) === 0);
		case "contains":
			return (
				typeof value === "string" &&
				value.toLowerCase().includes(String(condition.value).toLowerCase())
			);
		case "is_null":
			return isNullish(value);
		case "is_not_null":
			return !isNullish(value);
	}
}

/** AND conditions must all match; OR conditions form one group where any may match. */
export function matchesWhere(record: Row, where: Where[]): boolean {
	const orGroup = where.filter((w) => w.connector === "OR");
	const andGroup = where.filter((w) => w.connector !== "OR");
	if (!andGroup.every((w) => matchesCondition(record, w))) return false;
	return orGroup.length === 0 || orGroup.some((w) => matchesCondition(record, w));
}

function filterRecords(records: Map<string, Row>, where: Where[]): Row[] {
	const results: Row[] = [];
	for (const record of records.values()) {
		if (matchesWhere(record, where)) {
			results.push(record);
		}
	}
	return results;
}

/** Sort like PostgreSQL: NULLS LAST for asc and NULLS FIRST for desc unless overridden. */
function sortRecords(records: Row[], sortBy: SortBy[]): Row[] {
	return [...records].sort((a, b) => {
		for (const s of sortBy) {
			const aVal = a[s.field];
			const bVal = b[s.field];
			const nullsFirst = (s.nulls ?? (s.direction === "desc" ? "first" : "last")) === "first";

			if (isNullish(aVal) && isNullish(bVal)) continue;
			if (isNullish(aVal)) return nullsFirst ? -1 : 1;
			if (isNullish(bVal)) return nullsFirst ? 1 : -1;

			const comparison = compare(aVal, bVal);
			if (comparison !== 0 && !Number.isNaN(comparison)) {
				return s.direction === "desc" ? -comparison : comparison;
			}
		}
		return 0;
	});
}

function duplicateKey(model: string, id: string): StrataError {
	return StrataError.constraintViolation(`Duplicate key in ${model}: ${id}`, { model, id });
}

// =============================================================================
// ADAPTER METHODS BUILDER
// =============================================================================

/**
 * Build the adapter methods over a store reference. `getStore` is a closure
 * so that a transaction rollback can swap the store underneath.
 */
function buildAdapterMethods(
	getStore: () => Store,
	catalog: MemoryCatalogState,
): Omit<StrataTransactionAdapter, "id" | "options"> {
	const insert = (model: string, data: Row): Row => {
		const modelStore = getModelStore(getStore(), model);
		const record: Row = { ...data };
		if (isNullish(record.id)) {
			record.id = generateId();
		}
		const key = recordKey(record);
		if (modelStore.has(key)) {
			throw duplicateKey(model, key);
		}
		modelStore.set(key, record);
		return record;
	};

	return {
		create: async <T extends Record<string, unknown>>({
			model,
			data,
		}: {
			model: string;
			data: T;
		}): Promise<T> => {
			const record = insert(model, data);
			return { ...record } as T;
		},

		createMany: async ({ model, data }: { model: string; data: Row[] }): Promise<number> => {
			const modelStore = getModelStore(getStore(), model);
			const keys = new Set<string>();
			for (const row of data) {
				if (isNullish(row.id)) continue;
				const key = recordKey(row);
				if (modelStore.has(key) || keys.has(key)) throw duplicateKey(model, key);
				keys.add(key);
			}
			for (const row of data) {
				insert(model, row);
			}
			return data.length;
		},

		findOne: async <T>({
			model,
			where,
		}: {
			model: string;
			where: Where[];
			forUpdate?: boolean;
		}): Promise<T | null> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return null;

			const first = filterRecords(modelStore, where)[0];
			if (!first) return null;
			return { ...first } as T;
		},

		findMany: async <T>({
			model,
			where,
			limit,
			offset,
			sortBy,
		}: {
			model: string;
			where?: Where[];
			limit?: number;
			offset?: number;
			sortBy?: SortBy | SortBy[];
		}): Promise<T[]> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return [];

			let results = filterRecords(modelStore, where ?? []);

			const sortList = toSortList(sortBy);
			if (sortList.length > 0) {
				results = sortRecords(results, sortList);
			}

			if (offset !== undefined) {
				results = results.slice(offset);
			}

			if (limit !== undefined) {
				results = results.slice(0, limit);
			}

			return results.map((r) => ({ ...r }) as T);
		},

		update: async <T>({
			model,
			where,
			update: updateData,
		}: {
			model: string;
			where: Where[];
			update: Record<string, unknown>;
		}): Promise<T | null> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return null;

			const first = filterRecords(modelStore, where)[0];
			if (!first) return null;

			const updated = { ...first, ...updateData };
			modelStore.set(recordKey(first), updated);
			catalog.recordDeadRows(model, 1);
			return { ...updated } as T;
		},

		delete: async ({ model, where }: { model: string; where: Where[] }): Promise<number> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return 0;

			const matches = filterRecords(modelStore, where);
			for (const match of matches) {
				modelStore.delete(recordKey(match));
			}
			catalog.recordDeadRows(model, matches.length);
			return matches.length;
		},

		count: async ({ model, where }: { model: string; where?: Where[] }): Promise<number> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return 0;

			if (!where || where.length === 0) {
				return modelStore.size;
			}

			return filterRecords(modelStore, where).length;
		},

		distinct: async <T>({
			model,
			field,
			where,
		}: {
			model: string;
			field: string;
			where?: Where[];
		}): Promise<T[]> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return [];

			const seen = new Map<unknown, unknown>();
			for (const record of filterRecords(modelStore, where ?? [])) {
				const value = record[field];
				if (isNullish(value)) continue;
				const key = comparable(value);
				if (!seen.has(key)) seen.set(key, value);
			}
			return [...seen.values()] as T[];
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a StrataAdapter backed by an in-memory store.
 *
 * Transactions are copy-on-write: the store is snapshotted on entry and
 * restored if the callback throws. The partition catalog and its dead-row
 * counters live outside the snapshot.
 *
 * @example
 * ```ts
 * import { memoryAdapter } from "@strata/memory-adapter";
 *
 * const strata = createStrata({ database: memoryAdapter() });
 * ```
 */
export function memoryAdapter(options: MemoryAdapterOptions = {}): StrataAdapter {
	let store: Store = new Map();
	const getStore = () => store;

	const { catalog, state } = createMemoryCatalog(getStore, options.now ?? (() => new Date()));
	const methods = buildAdapterMethods(getStore, state);

	return {
		id: "memory",
		...methods,
		catalog,

		transaction: async <T>(fn: (tx: StrataTransactionAdapter) => Promise<T>): Promise<T> => {
			const snapshot = cloneStore(store);

			try {
				const txAdapter: StrataTransactionAdapter = {
					id: "memory",
					...buildAdapterMethods(getStore, state),
					options: { dialectName: "memory" },
				};
				return await fn(txAdapter);
			} catch (error) {
				store = snapshot;
				throw error;
			}
		},

		options: { dialectName: "memory" },
	};
}
