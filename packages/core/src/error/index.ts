import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export {
	BASE_ERROR_CODES,
	type BaseErrorCode,
	createErrorCodes,
	type RawErrorCode,
} from "./codes.js";

export type StrataErrorCode = BaseErrorCode;

export interface StrataErrorOptions {
	cause?: unknown;
	status?: number;
	transient?: boolean;
	details?: Record<string, unknown>;
}

export class StrataError extends Error {
	readonly code: string;
	readonly status: number;
	readonly details?: Record<string, unknown>;
	/** Whether retrying the same call later may succeed. */
	readonly transient: boolean;

	constructor(code: string, message: string, options?: StrataErrorOptions) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.status = options?.status ?? 500;
		this.transient = options?.transient ?? false;
		this.details = options?.details;
		this.name = "StrataError";
	}

	/**
	 * Create a StrataError from a typed error code, using the registered
	 * default message, status and transient flag.
	 */
	static fromCode<C extends StrataErrorCode>(
		code: C,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): StrataError {
		const raw = BASE_ERROR_CODES[code];
		return new StrataError(code, options?.message ?? raw.message, {
			cause: options?.cause,
			status: raw.status,
			transient: raw.transient,
			details: options?.details,
		});
	}

	/** Narrow an unknown thrown value to a StrataError, optionally of one code. */
	static is(error: unknown, code?: StrataErrorCode): error is StrataError {
		return error instanceof StrataError && (code === undefined || error.code === code);
	}

	static notFound(message = "Item not found", details?: Record<string, unknown>) {
		return StrataError.fromCode("NOT_FOUND", { message, details });
	}

	static constraintViolation(
		message = "Constraint violation",
		details?: Record<string, unknown>,
		cause?: unknown,
	) {
		return StrataError.fromCode("CONSTRAINT_VIOLATION", { message, details, cause });
	}

	static partitionNotProvisioned(partitionName: string) {
		return StrataError.fromCode("PARTITION_NOT_PROVISIONED", {
			message: `Archive partition ${partitionName} is not provisioned`,
			details: { partitionName },
		});
	}

	static validationFailed(failedChecks: string[], details?: Record<string, unknown>) {
		return StrataError.fromCode("VALIDATION_FAILED", {
			message: `Migration validation failed: ${failedChecks.join(", ")}`,
			details: { ...details, failedChecks },
		});
	}

	static maintenanceJobFailed(jobName: string, step: string, progress: string, cause?: unknown) {
		return StrataError.fromCode("MAINTENANCE_JOB_FAILED", {
			message: `Maintenance job "${jobName}" failed at step "${step}"`,
			details: { jobName, step, progress },
			cause,
		});
	}

	static invalidArgument(message = "Invalid argument", details?: Record<string, unknown>) {
		return StrataError.fromCode("INVALID_ARGUMENT", { message, details });
	}

	static conflict(message = "Resource conflict", details?: Record<string, unknown>) {
		return StrataError.fromCode("CONFLICT", { message, details });
	}

	static internal(message = "Internal error", cause?: unknown) {
		return StrataError.fromCode("INTERNAL", { message, cause });
	}
}
