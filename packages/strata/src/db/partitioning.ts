// =============================================================================
// PARTITION LAYOUT
// =============================================================================
// Physical partition names, their bounds, and the DDL that creates the whole
// layout. Operators run the generated DDL once (see `strata partition
// generate`); afterwards the archive store and the daily job create monthly
// partitions through the adapter's catalog.

import type { HashPartitionSpec, RangePartitionSpec, StrataContext, YearMonth } from "@strata/core";
import { quoteIdentifier } from "@strata/core/db";
import { addUtcMonths, monthOf, monthStart, requireIntegerInRange } from "@strata/core/utils";
import {
	ACTIVE_TABLE,
	ARCHIVE_TABLE,
	getStrataTables,
	INTERACTION_TABLE,
	LEGACY_TABLE,
} from "./schema.js";

// =============================================================================
// NAMES
// =============================================================================

export function activePartitionName(index: number): string {
	return `${ACTIVE_TABLE}_p${index}`;
}

export function interactionPartitionName(index: number): string {
	return `${INTERACTION_TABLE}_p${index}`;
}

/** `todo_archived_y2025m09` */
export function archivePartitionName({ year, month }: YearMonth): string {
	return `${ARCHIVE_TABLE}_y${year}m${String(month).padStart(2, "0")}`;
}

const ARCHIVE_NAME_PATTERN = new RegExp(`^${ARCHIVE_TABLE}_y(\\d{4})m(\\d{2})$`);

export function parseArchivePartitionName(name: string): YearMonth | null {
	const match = ARCHIVE_NAME_PATTERN.exec(name);
	if (!match) return null;
	const month = Number(match[2]);
	if (month < 1 || month > 12) return null;
	return { year: Number(match[1]), month };
}

// =============================================================================
// SPECS
// =============================================================================

export function hashPartitionSpecs(
	parent: string,
	count: number,
	nameFor: (index: number) => string,
): HashPartitionSpec[] {
	return Array.from({ length: count }, (_, remainder) => ({
		strategy: "hash",
		name: nameFor(remainder),
		parent,
		modulus: count,
		remainder,
	}));
}

/** Monthly archive window `[first of month, first of next month)` in UTC. */
export function archivePartitionSpec(yearMonth: YearMonth): RangePartitionSpec {
	requireIntegerInRange("year", yearMonth.year, 1970, 9999);
	requireIntegerInRange("month", yearMonth.month, 1, 12);
	const from = monthStart(yearMonth);
	return {
		strategy: "range",
		name: archivePartitionName(yearMonth),
		parent: ARCHIVE_TABLE,
		from,
		to: addUtcMonths(from, 1),
	};
}

/** Archive specs for the month of `date` and the `monthsAhead` months after it. */
export function archiveSpecsFrom(date: Date, monthsAhead: number): RangePartitionSpec[] {
	return Array.from({ length: monthsAhead + 1 }, (_, offset) =>
		archivePartitionSpec(monthOf(addUtcMonths(date, offset))),
	);
}

/**
 * Make sure every hash partition of the Active and Interaction tables exists.
 * Idempotent; run when the context is built.
 */
export async function ensureHashPartitions(ctx: StrataContext): Promise<number> {
	const specs = [
		...hashPartitionSpecs(ACTIVE_TABLE, ctx.options.activePartitionCount, activePartitionName),
		...hashPartitionSpecs(
			INTERACTION_TABLE,
			ctx.options.interactionPartitionCount,
			interactionPartitionName,
		),
	];
	let created = 0;
	for (const spec of specs) {
		if (await ctx.adapter.catalog.createPartition(spec)) created++;
	}
	if (created > 0) {
		ctx.logger.info("Hash partitions created", { created });
	}
	return created;
}

// =============================================================================
// DDL GENERATION
// =============================================================================

export interface PartitionDDLOptions {
	/** PostgreSQL schema name. Default: "public" */
	schema?: string;
	/** Default: 16 */
	activePartitionCount?: number;
	/** Default: 8 */
	interactionPartitionCount?: number;
	/** Archive partitions after the current month. Default: 3 */
	monthsAhead?: number;
	/** Reference date for the current month. Default: now */
	now?: Date;
	/** Include the legacy `todos` table. Default: false */
	includeLegacy?: boolean;
}

const COLUMN_TYPES = {
	text: "TEXT",
	varchar: "VARCHAR",
	integer: "INTEGER",
	bigint: "BIGINT",
	boolean: "BOOLEAN",
	timestamp: "TIMESTAMPTZ",
	uuid: "UUID",
} as const;

function qualify(schema: string, table: string): string {
	return schema === "public"
		? quoteIdentifier(table)
		: `${quoteIdentifier(schema)}.${quoteIdentifier(table)}`;
}

function createTableStatement(schema: string, tableName: string): string[] {
	const def = getStrataTables()[tableName];
	if (!def) throw new Error(`Unknown table: ${tableName}`);

	const lines: string[] = [];
	for (const [column, col] of Object.entries(def.columns)) {
		let line = `\t${quoteIdentifier(column)} ${COLUMN_TYPES[col.type]}`;
		if (col.type === "varchar" && col.length !== undefined) line += `(${col.length})`;
		if (col.notNull) line += " NOT NULL";
		if (col.default !== undefined) line += ` DEFAULT ${col.default}`;
		if (col.check) line += ` CHECK (${col.check})`;
		lines.push(line);
	}
	for (const check of def.checks ?? []) {
		lines.push(`\tCONSTRAINT ${quoteIdentifier(check.name)} CHECK (${check.expression})`);
	}
	lines.push(`\tPRIMARY KEY (${def.primaryKey.map(quoteIdentifier).join(", ")})`);

	const partitionBy = def.partitionBy
		? ` PARTITION BY ${def.partitionBy.strategy.toUpperCase()} (${quoteIdentifier(def.partitionBy.column)})`
		: "";

	const statements = [
		`CREATE TABLE IF NOT EXISTS ${qualify(schema, tableName)} (\n${lines.join(",\n")}\n)${partitionBy};`,
	];
	for (const index of def.indexes ?? []) {
		const unique = index.unique ? "UNIQUE " : "";
		const where = index.where ? ` WHERE ${index.where}` : "";
		statements.push(
			`CREATE ${unique}INDEX IF NOT EXISTS ${quoteIdentifier(index.name)} ON ${qualify(schema, tableName)} (${index.columns.map(quoteIdentifier).join(", ")})${where};`,
		);
	}
	return statements;
}

function partitionStatement(schema: string, spec: HashPartitionSpec | RangePartitionSpec): string {
	const bound =
		spec.strategy === "hash"
			? `FOR VALUES WITH (MODULUS ${spec.modulus}, REMAINDER ${spec.remainder})`
			: `FOR VALUES FROM ('${spec.from.toISOString()}') TO ('${spec.to.toISOString()}')`;
	return `CREATE TABLE IF NOT EXISTS ${qualify(schema, spec.name)} PARTITION OF ${qualify(schema, spec.parent)} ${bound};`;
}

/**
 * Generate the DDL for the partitioned layout: parent tables with their
 * indexes and checks, every hash partition, the archive partitions of the
 * current month and `monthsAhead` months after it, and the bookkeeping tables.
 *
 * Returns an array of SQL statements to execute in order.
 */
export function generatePartitionDDL(options: PartitionDDLOptions = {}): string[] {
	const schema = options.schema ?? "public";
	const activeCount = options.activePartitionCount ?? 16;
	const interactionCount = options.interactionPartitionCount ?? 8;
	const monthsAhead = options.monthsAhead ?? 3;
	const now = options.now ?? new Date();

	const statements: string[] = [
		"-- Strata partitioned layout",
		`-- Generated for schema: ${schema}`,
		"",
	];

	if (schema !== "public") {
		statements.push(`CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(schema)};`, "");
	}

	statements.push(`-- === ${ACTIVE_TABLE} (hash on user_id, ${activeCount} partitions) ===`);
	statements.push(...createTableStatement(schema, ACTIVE_TABLE));
	for (const spec of hashPartitionSpecs(ACTIVE_TABLE, activeCount, activePartitionName)) {
		statements.push(partitionStatement(schema, spec));
	}
	statements.push("");

	statements.push(`-- === ${ARCHIVE_TABLE} (monthly range on archived_at) ===`);
	statements.push(...createTableStatement(schema, ARCHIVE_TABLE));
	for (const spec of archiveSpecsFrom(now, monthsAhead)) {
		statements.push(partitionStatement(schema, spec));
	}
	statements.push("");

	statements.push(
		`-- === ${INTERACTION_TABLE} (hash on user_id, ${interactionCount} partitions) ===`,
	);
	statements.push(...createTableStatement(schema, INTERACTION_TABLE));
	for (const spec of hashPartitionSpecs(
		INTERACTION_TABLE,
		interactionCount,
		interactionPartitionName,
	)) {
		statements.push(partitionStatement(schema, spec));
	}
	statements.push("");

	statements.push("-- === bookkeeping ===");
	for (const table of ["migration_progress", "maintenance_run", "worker_lease"]) {
		statements.push(...createTableStatement(schema, table));
	}

	if (options.includeLegacy) {
		statements.push("", `-- === ${LEGACY_TABLE} (legacy, unpartitioned) ===`);
		statements.push(...createTableStatement(schema, LEGACY_TABLE));
	}

	return statements;
}
