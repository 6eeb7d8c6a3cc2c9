// =============================================================================
// SHARED ADAPTER UTILITIES
// =============================================================================
// camelCase ↔ snake_case conversion plus WHERE / ORDER BY rendering for the
// SQL adapters. The memory adapter evaluates the same Where semantics itself.

import type { SortBy, Where } from "./adapter.js";

export function toSnakeCase(str: string): string {
	return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function toCamelCase(str: string): string {
	return str.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

export function keysToSnake(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[toSnakeCase(key)] = value;
	}
	return result;
}

export function keysToCamel(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[toCamelCase(key)] = value;
	}
	return result;
}

/** Normalize the `sortBy` argument of `findMany` to a list. */
export function toSortList(sortBy: SortBy | SortBy[] | undefined): SortBy[] {
	if (!sortBy) return [];
	return Array.isArray(sortBy) ? sortBy : [sortBy];
}

/** Values of an `in` / `not_in` condition. */
export function listValue(where: Where): unknown[] {
	if (!Array.isArray(where.value)) {
		throw new TypeError(`Operator "${where.operator}" on "${where.field}" needs an array value`);
	}
	return where.value;
}

/**
 * Build a SQL WHERE clause from an array of Where conditions.
 * Returns the clause string (without the WHERE keyword) and parameter values.
 * Parameter numbering starts at startIndex ($1, $2, ...).
 */
export function buildWhereClause(
	where: Where[],
	startIndex: number = 1,
): { clause: string; params: unknown[] } {
	if (where.length === 0) {
		return { clause: "TRUE", params: [] };
	}

	const andConditions: string[] = [];
	const orConditions: string[] = [];
	const params: unknown[] = [];
	let paramIdx = startIndex;

	const next = (value: unknown): string => {
		params.push(value);
		return `$${paramIdx++}`;
	};

	for (const w of where) {
		const col = `"${toSnakeCase(w.field)}"`;
		let condition: string;

		switch (w.operator) {
			case "eq":
				condition = `${col} = ${next(w.value)}`;
				break;
			case "ne":
				condition = `${col} IS DISTINCT FROM ${next(w.value)}`;
				break;
			case "gt":
				condition = `${col} > ${next(w.value)}`;
				break;
			case "gte":
				condition = `${col} >= ${next(w.value)}`;
				break;
			case "lt":
				condition = `${col} < ${next(w.value)}`;
				break;
			case "lte":
				condition = `${col} <= ${next(w.value)}`;
				break;
			case "in": {
				const values = listValue(w);
				condition =
					values.length === 0 ? "FALSE" : `${col} IN (${values.map((v) => next(v)).join(", ")})`;
				break;
			}
			case "not_in": {
				const values = listValue(w);
				condition =
					values.length === 0 ? "TRUE" : `${col} NOT IN (${values.map((v) => next(v)).join(", ")})`;
				break;
			}
			case "contains":
				condition = `strpos(lower(${col}), lower(${next(String(w.value))})) > 0`;
				break;
			case "is_null":
				condition = `${col} IS NULL`;
				break;
			case "is_not_null":
				condition = `${col} IS NOT NULL`;
				break;
		}

		if (w.connector === "OR") {
			orConditions.push(condition);
		} else {
			andConditions.push(condition);
		}
	}

	if (orConditions.length > 0) {
		andConditions.push(`(${orConditions.join(" OR ")})`);
	}
	return { clause: andConditions.join(" AND "), params };
}

/** Render an ORDER BY clause (without the keywords); empty string when unsorted. */
export function buildOrderByClause(sortBy: SortBy | SortBy[] | undefined): string {
	return toSortList(sortBy)
		.map((s) => {
			const dir = s.direction === "desc" ? "DESC" : "ASC";
			const nulls = s.nulls ? ` NULLS ${s.nulls === "first" ? "FIRST" : "LAST"}` : "";
			return `"${toSnakeCase(s.field)}" ${dir}${nulls}`;
		})
		.join(", ");
}
