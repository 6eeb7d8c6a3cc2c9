// =============================================================================
// ARGUMENT VALIDATION
// =============================================================================
// Small runtime checks shared by the stores and the config resolver. Each
// throws an INVALID_ARGUMENT StrataError naming the offending field.

import { StrataError } from "../error/index.js";

export function requirePositiveInteger(name: string, value: number): number {
	if (!Number.isInteger(value) || value <= 0) {
		throw StrataError.invalidArgument(`${name} must be a positive integer, got ${value}`, {
			field: name,
		});
	}
	return value;
}

export function requireNonNegativeInteger(name: string, value: number): number {
	if (!Number.isInteger(value) || value < 0) {
		throw StrataError.invalidArgument(`${name} must be a non-negative integer, got ${value}`, {
			field: name,
		});
	}
	return value;
}

export function requireIntegerInRange(name: string, value: number, min: number, max: number): number {
	if (!Number.isInteger(value) || value < min || value > max) {
		throw StrataError.invalidArgument(`${name} must be an integer between ${min} and ${max}`, {
			field: name,
			value,
		});
	}
	return value;
}

export function requireRatio(name: string, value: number): number {
	if (!Number.isFinite(value) || value <= 0 || value >= 1) {
		throw StrataError.invalidArgument(`${name} must be between 0 and 1 (exclusive)`, {
			field: name,
			value,
		});
	}
	return value;
}

/** Trimmed, non-empty string of at most `maxLength` characters. */
export function requireText(name: string, value: string, maxLength?: number): string {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw StrataError.invalidArgument(`${name} must not be empty`, { field: name });
	}
	if (maxLength !== undefined && trimmed.length > maxLength) {
		throw StrataError.invalidArgument(`${name} must be at most ${maxLength} characters`, {
			field: name,
		});
	}
	return trimmed;
}

/** Tenant keys route by their exact bytes, so they are never trimmed. */
export function requireTenantKey(name: string, value: string): string {
	if (value.length === 0) {
		throw StrataError.invalidArgument(`${name} must not be empty`, { field: name });
	}
	if (value.trim() !== value) {
		throw StrataError.invalidArgument(`${name} must not have leading or trailing whitespace`, {
			field: name,
		});
	}
	return value;
}

export function requireValidDate(name: string, value: Date): Date {
	if (Number.isNaN(value.getTime())) {
		throw StrataError.invalidArgument(`${name} is not a valid date`, { field: name });
	}
	return value;
}

/** Clamp a page size to `[1, max]`, substituting `fallback` when absent. */
export function resolveLimit(limit: number | undefined, fallback: number, max: number): number {
	if (limit === undefined) return fallback;
	requirePositiveInteger("limit", limit);
	return Math.min(limit, max);
}

export function resolveOffset(offset: number | undefined): number {
	if (offset === undefined) return 0;
	return requireNonNegativeInteger("offset", offset);
}
