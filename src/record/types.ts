/**
 * The structured log record and its two serialized shapes.
 */

/** Severity levels, least to most severe. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/**
 * Extra fields attached to a record. Values must be JSON-representable;
 * key order is not preserved.
 */
export type LogContext = Record<string, unknown>

export interface LogRecord {
	/** UTC instant, `YYYY-MM-DDTHH:MM:SS.mmmZ`. */
	timestamp: string
	tool: string
	level: LogLevel
	message: string
	pid: number
	/** Absent (not `{}`) when the caller supplied no extra fields. */
	context?: LogContext
}

/**
 * One line of the append store. `ctx` is omitted entirely when empty.
 */
export interface SerializedRecord {
	ts: string
	tool: string
	level: LogLevel
	msg: string
	pid: number
	ctx?: LogContext
}

/**
 * One row of the `log` table. `ctx` holds a JSON object or NULL.
 */
export interface RecordRow {
	id: number
	ts: string
	tool: string
	level: string
	msg: string
	pid: number
	ctx: string | null
}

export function isLogLevel(value: unknown): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value)
}
