import { encodeLine, type LogRecord } from '../record/index.js'
import { colorLevel } from '../terminal/index.js'

export interface FormatOptions {
	color?: boolean
}

/**
 * One human-readable line: `<ts> <LEVEL> <tool>[<pid>] <msg> <ctx-json>`.
 * The context is omitted when absent.
 *
 * @example
 * formatRecord(record)
 * // "2026-10-19T08:00:00.000Z INFO  crib[4242] stored entry #42 {"entry_id":42}"
 */
export function formatRecord(record: LogRecord, options: FormatOptions = {}): string {
	const label = record.level.toUpperCase().padEnd(5)
	const level = options.color ? colorLevel(record.level, label) : label
	const parts = [
		record.timestamp,
		level,
		`${record.tool}[${record.pid}]`,
		record.message,
	]
	if (record.context !== undefined) parts.push(JSON.stringify(record.context))
	return parts.join(' ')
}

/**
 * The stored JSON-lines form, whichever backend the record came from.
 */
export function formatRaw(record: LogRecord): string {
	return encodeLine(record)
}
