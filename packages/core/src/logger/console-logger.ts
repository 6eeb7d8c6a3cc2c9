// =============================================================================
// CONSOLE LOGGER -- Built-in StrataLogger backed by console.*
// =============================================================================

import type { StrataLogger } from "../types/config.js";
import { bold, consoleMethod, dim, isEnabled, LEVEL_COLOR, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Prefix shown before each message. Default: `"Strata"` */
	prefix?: string;
	/** Whether to include ISO timestamps. Default: `true` */
	timestamps?: boolean;
	/** Keys whose values are replaced with "[REDACTED]". */
	redactKeys?: string[];
}

/**
 * Create a human-readable logger for development and the CLI.
 *
 * @example
 * ```ts
 * import { createConsoleLogger } from "@strata/core/logger";
 *
 * const logger = createConsoleLogger({ level: "debug" });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): StrataLogger {
	const { level = "info", prefix = "Strata", timestamps = true } = options;
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (!isEnabled(lvl, level)) return;

		const parts: string[] = [];
		if (timestamps) {
			parts.push(dim(new Date().toISOString()));
		}
		parts.push(LEVEL_COLOR[lvl](bold(lvl.toUpperCase().padEnd(5))));
		parts.push(`[${prefix}]:`);
		parts.push(message);

		const line = parts.join(" ");
		const method = consoleMethod(lvl);
		const safeData = redactData(data, redactKeys);
		if (safeData && Object.keys(safeData).length > 0) {
			console[method](line, safeData);
		} else {
			console[method](line);
		}
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
