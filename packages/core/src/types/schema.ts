// =============================================================================
// TABLE DEFINITIONS
// =============================================================================
// Dialect-neutral description of a table, rendered to DDL by the partitioning
// module. Column keys are snake_case database names.

export interface ColumnDefinition {
	type: "text" | "varchar" | "integer" | "bigint" | "boolean" | "timestamp" | "uuid";
	/** Length for `varchar`. */
	length?: number;
	notNull?: boolean;
	default?: string;
	check?: string;
}

export interface IndexDefinition {
	name: string;
	columns: string[];
	unique?: boolean;
	/** Partial index predicate. */
	where?: string;
}

export type PartitionScheme =
	| { strategy: "hash"; column: string }
	| { strategy: "range"; column: string };

export interface TableDefinition {
	columns: Record<string, ColumnDefinition>;
	primaryKey: string[];
	partitionBy?: PartitionScheme;
	indexes?: IndexDefinition[];
	/** Named table-level CHECK constraints. */
	checks?: Array<{ name: string; expression: string }>;
}
