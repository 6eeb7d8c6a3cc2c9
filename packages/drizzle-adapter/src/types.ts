// =============================================================================
// RAW SQL ROW TYPES -- catalog queries return snake_case columns
// =============================================================================
// pg returns bigint columns as strings, so counts and sizes are typed loosely
// and converted by the catalog.

export interface RawPartitionRow {
	name: string;
	bound: string;
}

export interface RawExistsRow {
	exists: boolean;
}

export interface RawPartitionStatsRow {
	partition_name: string;
	parent_table: string;
	row_count: string | number | null;
	dead_row_count: string | number | null;
	size_bytes: string | number | null;
	last_vacuum: Date | string | null;
	last_analyze: Date | string | null;
}
