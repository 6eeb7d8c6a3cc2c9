// =============================================================================
// POSTGRES CATALOG -- PartitionCatalog over pg_inherits and pg_stat_user_tables
// =============================================================================
// Partition DDL cannot bind parameters, so identifiers go through
// quoteIdentifier and bounds are rendered from numbers and ISO timestamps only.

import type {
	PartitionCatalog,
	PartitionSpec,
	PartitionStats,
	SqlExecutor,
} from "@strata/core/db";
import { createTableResolver } from "@strata/core/db";
import type { RawExistsRow, RawPartitionRow, RawPartitionStatsRow } from "./types.js";

const HASH_BOUND = /modulus\s+(\d+),\s*remainder\s+(\d+)/i;
const RANGE_BOUND = /FROM\s+\('([^']+)'\)\s+TO\s+\('([^']+)'\)/i;

/**
 * Parse a timestamptz literal as printed by pg_get_expr, e.g.
 * `2025-03-01 00:00:00+00`, into a Date.
 */
export function parseBoundTimestamp(literal: string): Date {
	let iso = literal.trim().replace(" ", "T");
	if (/[+-]\d{2}$/.test(iso)) iso += ":00";
	const date = new Date(iso);
	if (Number.isNaN(date.getTime())) {
		throw new Error(`Unrecognised partition bound timestamp: ${literal}`);
	}
	return date;
}

/** Rebuild a PartitionSpec from the output of `pg_get_expr(relpartbound, oid)`. */
export function parsePartitionBound(name: string, parent: string, bound: string): PartitionSpec | null {
	const hash = HASH_BOUND.exec(bound);
	if (hash) {
		return {
			strategy: "hash",
			name,
			parent,
			modulus: Number(hash[1]),
			remainder: Number(hash[2]),
		};
	}
	const range = RANGE_BOUND.exec(bound);
	if (range?.[1] && range[2]) {
		return {
			strategy: "range",
			name,
			parent,
			from: parseBoundTimestamp(range[1]),
			to: parseBoundTimestamp(range[2]),
		};
	}
	return null;
}

/** `FOR VALUES ...` clause for a partition spec. */
export function renderPartitionBound(spec: PartitionSpec): string {
	if (spec.strategy === "hash") {
		return `FOR VALUES WITH (MODULUS ${Math.trunc(spec.modulus)}, REMAINDER ${Math.trunc(spec.remainder)})`;
	}
	return `FOR VALUES FROM ('${spec.from.toISOString()}') TO ('${spec.to.toISOString()}')`;
}

function toNumber(value: string | number | null): number {
	return value === null ? 0 : Number(value);
}

function toDate(value: Date | string | null): Date | null {
	if (value === null) return null;
	return value instanceof Date ? value : new Date(value);
}

export function createPostgresCatalog(
	executor: SqlExecutor,
	getSchema: () => string,
): PartitionCatalog {
	const tableExists = async (name: string): Promise<boolean> => {
		const rows = await executor.query<RawExistsRow>(
			`SELECT EXISTS (
				SELECT 1 FROM pg_class c
				JOIN pg_namespace n ON n.oid = c.relnamespace
				WHERE c.relname = $1 AND n.nspname = $2
			) AS exists`,
			[name, getSchema()],
		);
		return rows[0]?.exists === true;
	};

	return {
		listPartitions: async (parent) => {
			const rows = await executor.query<RawPartitionRow>(
				`SELECT c.relname AS name, pg_get_expr(c.relpartbound, c.oid) AS bound
				FROM pg_inherits i
				JOIN pg_class c ON c.oid = i.inhrelid
				JOIN pg_class p ON p.oid = i.inhparent
				JOIN pg_namespace n ON n.oid = p.relnamespace
				WHERE p.relname = $1 AND n.nspname = $2`,
				[parent, getSchema()],
			);
			const specs: PartitionSpec[] = [];
			for (const row of rows) {
				const spec = parsePartitionBound(row.name, parent, row.bound);
				if (spec) specs.push(spec);
			}
			return specs;
		},

		createPartition: async (spec) => {
			if (await tableExists(spec.name)) return false;
			const t = createTableResolver(getSchema());
			await executor.mutate(
				`CREATE TABLE IF NOT EXISTS ${t(spec.name)} PARTITION OF ${t(spec.parent)} ${renderPartitionBound(spec)}`,
				[],
			);
			return true;
		},

		dropPartition: async (name) => {
			if (!(await tableExists(name))) return false;
			const t = createTableResolver(getSchema());
			await executor.mutate(`DROP TABLE IF EXISTS ${t(name)}`, []);
			return true;
		},

		statistics: async (parents) => {
			if (parents.length === 0) return [];
			const parentList = parents.map((_, i) => `$${i + 2}`).join(", ");
			const rows = await executor.query<RawPartitionStatsRow>(
				`SELECT
					c.relname AS partition_name,
					p.relname AS parent_table,
					s.n_live_tup AS row_count,
					s.n_dead_tup AS dead_row_count,
					pg_total_relation_size(c.oid) AS size_bytes,
					GREATEST(s.last_vacuum, s.last_autovacuum) AS last_vacuum,
					GREATEST(s.last_analyze, s.last_autoanalyze) AS last_analyze
				FROM pg_inherits i
				JOIN pg_class c ON c.oid = i.inhrelid
				JOIN pg_class p ON p.oid = i.inhparent
				JOIN pg_namespace n ON n.oid = p.relnamespace
				LEFT JOIN pg_stat_user_tables s ON s.relid = c.oid
				WHERE n.nspname = $1 AND p.relname IN (${parentList})
				ORDER BY c.relname`,
				[getSchema(), ...parents],
			);
			return rows.map(
				(row): PartitionStats => ({
					partitionName: row.partition_name,
					parentTable: row.parent_table,
					rowCount: toNumber(row.row_count),
					deadRowCount: toNumber(row.dead_row_count),
					sizeBytes: toNumber(row.size_bytes),
					lastVacuum: toDate(row.last_vacuum),
					lastAnalyze: toDate(row.last_analyze),
				}),
			);
		},

		analyze: async (name) => {
			const t = createTableResolver(getSchema());
			await executor.mutate(`ANALYZE ${t(name)}`, []);
		},

		vacuum: async (name) => {
			const t = createTableResolver(getSchema());
			await executor.mutate(`VACUUM ${t(name)}`, []);
		},
	};
}
