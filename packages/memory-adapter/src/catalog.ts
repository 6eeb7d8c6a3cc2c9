// =============================================================================
// MEMORY CATALOG -- PartitionCatalog over the in-memory store
// =============================================================================
// Tracks attached partitions and the bookkeeping PostgreSQL keeps in
// pg_stat_user_tables: dead tuples (one per updated or deleted row) and the
// last vacuum / analyze times.

import type { PartitionCatalog, PartitionSpec, PartitionStats } from "@strata/core/db";
import { StrataError } from "@strata/core/error";
import type { Store } from "./adapter.js";

/** Rough per-row footprint used for `sizeBytes`. */
const ESTIMATED_ROW_BYTES = 256;
/** An empty heap still occupies one page. */
const PAGE_BYTES = 8192;

interface PartitionMeta {
	deadRows: number;
	lastVacuum: Date | null;
	lastAnalyze: Date | null;
}

export interface MemoryCatalogState {
	recordDeadRows(model: string, count: number): void;
}

function overlaps(a: PartitionSpec, b: PartitionSpec): boolean {
	if (a.strategy === "range" && b.strategy === "range") {
		return a.from.getTime() < b.to.getTime() && b.from.getTime() < a.to.getTime();
	}
	if (a.strategy === "hash" && b.strategy === "hash") {
		return a.modulus === b.modulus && a.remainder === b.remainder;
	}
	return true;
}

export function createMemoryCatalog(
	getStore: () => Store,
	now: () => Date,
): { catalog: PartitionCatalog; state: MemoryCatalogState } {
	const partitions = new Map<string, PartitionSpec>();
	const meta = new Map<string, PartitionMeta>();

	const metaFor = (name: string): PartitionMeta => {
		let entry = meta.get(name);
		if (!entry) {
			entry = { deadRows: 0, lastVacuum: null, lastAnalyze: null };
			meta.set(name, entry);
		}
		return entry;
	};

	const requirePartition = (name: string): void => {
		if (!partitions.has(name)) {
			throw StrataError.notFound(`Partition ${name} does not exist`, { partitionName: name });
		}
	};

	const catalog: PartitionCatalog = {
		listPartitions: async (parent) =>
			[...partitions.values()].filter((p) => p.parent === parent).map((p) => ({ ...p })),

		createPartition: async (spec) => {
			if (partitions.has(spec.name)) return false;
			for (const existing of partitions.values()) {
				if (existing.parent === spec.parent && overlaps(existing, spec)) {
					throw StrataError.constraintViolation(
						`Partition ${spec.name} would overlap partition ${existing.name}`,
						{ partitionName: spec.name, overlapping: existing.name },
					);
				}
			}
			partitions.set(spec.name, { ...spec });
			metaFor(spec.name);
			return true;
		},

		dropPartition: async (name) => {
			if (!partitions.delete(name)) return false;
			meta.delete(name);
			getStore().delete(name);
			return true;
		},

		statistics: async (parents) => {
			const stats: PartitionStats[] = [];
			for (const spec of partitions.values()) {
				if (!parents.includes(spec.parent)) continue;
				const rowCount = getStore().get(spec.name)?.size ?? 0;
				const info = metaFor(spec.name);
				stats.push({
					partitionName: spec.name,
					parentTable: spec.parent,
					rowCount,
					deadRowCount: info.deadRows,
					sizeBytes: PAGE_BYTES + rowCount * ESTIMATED_ROW_BYTES,
					lastVacuum: info.lastVacuum,
					lastAnalyze: info.lastAnalyze,
				});
			}
			return stats;
		},

		analyze: async (name) => {
			requirePartition(name);
			metaFor(name).lastAnalyze = now();
		},

		vacuum: async (name) => {
			requirePartition(name);
			const info = metaFor(name);
			info.deadRows = 0;
			info.lastVacuum = now();
		},
	};

	const state: MemoryCatalogState = {
		recordDeadRows: (model, count) => {
			if (count > 0) metaFor(model).deadRows += count;
		},
	};

	return { catalog, state };
}
