// =============================================================================
// JSON LOGGER -- One JSON object per line for log aggregation
// =============================================================================

import type { StrataLogger } from "../types/config.js";
import { consoleMethod, isEnabled, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name stamped on every line. Default: `"strata"` */
	service?: string;
	/** Keys whose values are replaced with "[REDACTED]". */
	redactKeys?: string[];
	/** Where lines go. Default: `console.log` / `console.warn` / `console.error` by level. */
	write?: (line: string, level: LogLevel) => void;
}

/**
 * Create a structured JSON logger.
 *
 * Errors found in the data are flattened to `{ name, message, code }` so they
 * survive `JSON.stringify`.
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): StrataLogger {
	const { level = "info", service = "strata" } = options;
	const redactKeys = buildRedactKeys(options.redactKeys);
	const write =
		options.write ?? ((line: string, lvl: LogLevel) => console[consoleMethod(lvl)](line));

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (!isEnabled(lvl, level)) return;

		const safeData = redactData(data, redactKeys);
		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
		};
		for (const [key, value] of Object.entries(safeData ?? {})) {
			entry[key] = value instanceof Error ? serializeError(value) : value;
		}

		write(JSON.stringify(entry), lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}

function serializeError(error: Error): Record<string, unknown> {
	const serialized: Record<string, unknown> = { name: error.name, message: error.message };
	if ("code" in error && typeof error.code === "string") {
		serialized.code = error.code;
	}
	return serialized;
}
