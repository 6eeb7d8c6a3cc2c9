// =============================================================================
// LOG LEVELS & ANSI COLORS
// =============================================================================
// Shared by the console and JSON loggers. Colors are disabled under NO_COLOR
// and when stdout is not a TTY.

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

const colorEnabled =
	typeof process !== "undefined" && process.stdout?.isTTY === true && !process.env.NO_COLOR;

function wrap(code: number, closeCode: number) {
	return colorEnabled ? (s: string) => `\x1b[${code}m${s}\x1b[${closeCode}m` : (s: string) => s;
}

export const bold = wrap(1, 22);
export const dim = wrap(2, 22);

export const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
	debug: wrap(35, 39),
	info: wrap(34, 39),
	warn: wrap(33, 39),
	error: wrap(31, 39),
};

export function isEnabled(level: LogLevel, minimum: LogLevel): boolean {
	return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minimum];
}

/** Console method used for a level: errors and warnings go to stderr. */
export function consoleMethod(level: LogLevel): "error" | "warn" | "log" {
	return level === "error" ? "error" : level === "warn" ? "warn" : "log";
}
