// =============================================================================
// IDENTIFIERS -- Quoting and schema qualification for generated SQL
// =============================================================================
// Partition and schema names end up inside SQL text (DDL cannot bind
// identifiers), so they are checked against a conservative pattern first.

const IDENTIFIER_PATTERN = /^[a-z_][a-z0-9_]{0,62}$/;

/** Quote an identifier after checking it is a plain lower-case name. */
export function quoteIdentifier(name: string): string {
	if (!IDENTIFIER_PATTERN.test(name)) {
		throw new Error(`Invalid SQL identifier: ${JSON.stringify(name)}`);
	}
	return `"${name}"`;
}

/**
 * Creates a function that qualifies table names with the configured schema.
 *
 * - `"public"` → `"todo_active_p3"`
 * - `"tasks"` → `"tasks"."todo_active_p3"`
 */
export function createTableResolver(schema: string): (tableName: string) => string {
	if (schema === "public") {
		return (tableName: string) => quoteIdentifier(tableName);
	}
	const prefix = quoteIdentifier(schema);
	return (tableName: string) => `${prefix}.${quoteIdentifier(tableName)}`;
}
