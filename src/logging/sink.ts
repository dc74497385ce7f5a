/**
 * LogTape sink that forwards into a {@link Spill} handle, so a host already
 * logging through LogTape lands in the shared store without touching its
 * call sites.
 */

import { inspect } from 'node:util'
import type {
	LogLevel as LogTapeLevel,
	LogRecord as LogTapeRecord,
	Sink,
} from '@logtape/logtape'
import type { Spill } from '../logger/index.js'
import type { LogLevel } from '../record/index.js'
import { ROOT_CATEGORY } from './logger.js'

export interface SpillSinkOptions {
	/**
	 * Also write the `"{tool}: {message}"` line to stderr. Off when the host
	 * already has a console sink. Defaults to true.
	 */
	echo?: boolean
}

const LEVEL_MAP: Record<LogTapeLevel, LogLevel> = {
	trace: 'debug',
	debug: 'debug',
	info: 'info',
	warning: 'warn',
	error: 'error',
	fatal: 'error',
}

export function toSpillLevel(level: LogTapeLevel): LogLevel {
	return LEVEL_MAP[level]
}

/**
 * Render LogTape's interleaved message parts. Strings are kept verbatim;
 * other values are inspected.
 */
export function renderMessage(parts: readonly unknown[]): string {
	return parts
		.map((part) => (typeof part === 'string' ? part : inspect(part)))
		.join('')
}

/**
 * @example
 * ```typescript
 * await logtape.configure({
 *   sinks: { spill: getSpillSink(configure({ tool: "crib" })) },
 *   loggers: [{ category: ["crib"], sinks: ["spill"], lowestLevel: "info" }],
 * });
 * ```
 */
export function getSpillSink(spill: Spill, options: SpillSinkOptions = {}): Sink {
	const echo = options.echo ?? true

	return (record: LogTapeRecord) => {
		// Our own diagnostics would re-enter this sink on every write.
		if (record.category[0] === ROOT_CATEGORY) return

		const level = toSpillLevel(record.level)
		const message = renderMessage(record.message)
		const context = {
			...record.properties,
			category: record.category.join('.'),
		}

		if (echo) {
			spill.emit(level, message, context)
			return
		}
		void spill.persist(
			spill.createRecord(level, message, context, new Date(record.timestamp)),
		)
	}
}
