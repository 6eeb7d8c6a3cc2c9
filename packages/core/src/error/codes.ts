// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of error codes with HTTP status and default message. Callers match
// on `code`; `transient` says whether the same call can succeed later without
// the caller changing anything.

export type RawErrorCode = {
	message: string;
	status: number;
	/**
	 * Whether the condition may clear by itself (a retry can succeed).
	 * Defaults to `false`.
	 */
	transient?: boolean;
};

export const BASE_ERROR_CODES = {
	NOT_FOUND: { message: "Item not found", status: 404, transient: false },
	CONSTRAINT_VIOLATION: { message: "Constraint violation", status: 409, transient: false },
	PARTITION_NOT_PROVISIONED: {
		message: "Archive partition is not provisioned",
		status: 409,
		transient: true,
	},
	VALIDATION_FAILED: { message: "Migration validation failed", status: 422, transient: false },
	MAINTENANCE_JOB_FAILED: { message: "Maintenance job failed", status: 500, transient: true },
	INVALID_ARGUMENT: { message: "Invalid argument", status: 400, transient: false },
	CONFLICT: { message: "Resource conflict", status: 409, transient: true },
	INTERNAL: { message: "Internal error", status: 500, transient: false },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;

/**
 * Freeze a set of additional error codes, e.g. for an embedding application.
 *
 * @example
 * ```ts
 * export const ATTACHMENT_ERROR_CODES = createErrorCodes({
 *   ATTACHMENT_TOO_LARGE: { message: "Attachment exceeds size limit", status: 413 },
 * });
 * ```
 */
export function createErrorCodes<T extends Record<string, RawErrorCode>>(codes: T): Readonly<T> {
	return Object.freeze(codes);
}
