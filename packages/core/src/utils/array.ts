import { StrataError } from "../error/index.js";

/** Upper bound on values sent in one `in` condition; PostgreSQL binds at most 65,535 parameters. */
export const IN_LIST_CHUNK_SIZE = 1_000;

/** Split `values` into consecutive slices of at most `size` elements. */
export function chunk<T>(values: readonly T[], size: number = IN_LIST_CHUNK_SIZE): T[][] {
	if (!Number.isInteger(size) || size < 1) {
		throw StrataError.invalidArgument(`chunk size must be a positive integer, got ${size}`);
	}
	const chunks: T[][] = [];
	for (let start = 0; start < values.length; start += size) {
		chunks.push(values.slice(start, start + size));
	}
	return chunks;
}
