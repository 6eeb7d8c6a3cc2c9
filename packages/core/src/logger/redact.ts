// =============================================================================
// LOG REDACTION
// =============================================================================
// Interaction payloads carry user-authored text (AI prompts and responses), so
// they are kept out of logs along with the usual credential keys.

const DEFAULT_REDACT_KEYS = new Set([
	"password",
	"token",
	"secret",
	"connectionString",
	"prompt",
	"response",
]);

/**
 * Redact matching keys from a log data object, one level of nesting deep.
 * Matching values are replaced with "[REDACTED]"; the input is never mutated.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: Set<string>,
): Record<string, unknown> | undefined {
	if (!data || keys.size === 0) return data;

	let redacted: Record<string, unknown> | undefined;
	for (const [key, value] of Object.entries(data)) {
		let next: unknown = value;
		if (keys.has(key)) {
			next = "[REDACTED]";
		} else if (isPlainRecord(value)) {
			next = redactShallow(value, keys);
		}
		if (next !== value) {
			if (!redacted) redacted = { ...data };
			redacted[key] = next;
		}
	}
	return redacted ?? data;
}

function redactShallow(
	data: Record<string, unknown>,
	keys: Set<string>,
): Record<string, unknown> {
	let redacted: Record<string, unknown> | undefined;
	for (const key of Object.keys(data)) {
		if (keys.has(key)) {
			if (!redacted) redacted = { ...data };
			redacted[key] = "[REDACTED]";
		}
	}
	return redacted ?? data;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		!Array.isArray(value) &&
		!(value instanceof Date) &&
		!(value instanceof Error)
	);
}

/** Build the redaction key set from user-provided keys (or the defaults). */
export function buildRedactKeys(userKeys?: string[]): Set<string> {
	if (userKeys) return new Set(userKeys);
	return new Set(DEFAULT_REDACT_KEYS);
}
