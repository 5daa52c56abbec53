// stdout carries MCP traffic for stdio clients, so everything goes to stderr.
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

let minLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
	minLevel = level;
}

function emit(level: LogLevel, args: unknown[]): void {
	if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(minLevel)) return;
	console.error(`[${level.toUpperCase()}]`, ...args);
}

export const logger = {
	info: (...args: unknown[]) => emit("info", args),
	warn: (...args: unknown[]) => emit("warn", args),
	error: (...args: unknown[]) => emit("error", args),
	debug: (...args: unknown[]) => emit("debug", args),
};
