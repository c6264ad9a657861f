/**
 * Stderr logger
 *
 * stdout is reserved for the MCP stdio protocol, so every line goes to stderr
 * as `[LEVEL] message {json}`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogData = Record<string, unknown>

export interface Logger {
	debug(message: string, data?: LogData): void
	info(message: string, data?: LogData): void
	warn(message: string, data?: LogData): void
	error(message: string, data?: LogData): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

export type LogSink = (line: string) => void

export function formatLogLine(level: LogLevel, message: string, data?: LogData): string {
	const prefix = `[${level.toUpperCase()}] ${message}`
	return data && Object.keys(data).length > 0 ? `${prefix} ${JSON.stringify(data)}` : prefix
}

export function createLogger(level: LogLevel = "info", sink: LogSink = (line) => console.error(line)): Logger {
	const threshold = LEVEL_ORDER[level]
	const emit = (lineLevel: LogLevel, message: string, data?: LogData) => {
		if (LEVEL_ORDER[lineLevel] < threshold) return
		sink(formatLogLine(lineLevel, message, data))
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	}
}

/** Logger that drops everything (tests, library callers without logging). */
export const silentLogger: Logger = createLogger("error", () => {})
