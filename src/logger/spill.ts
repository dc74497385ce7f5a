/**
 * The write path: one call writes the stderr line, then persists a record,
 * then enforces the storage bound.
 *
 * @module logger/spill
 */

import { type BoundResult, enforceBound } from '../bound/index.js'
import { getSpillLogger } from '../logging/logger.js'
import {
	createRecord,
	type LogContext,
	type LogLevel,
	type LogRecord,
} from '../record/index.js'
import { type Backend, createBackend } from '../store/index.js'
import { type ConfigOptions, type ResolvedConfig, resolveConfig } from './config.js'

const logger = getSpillLogger('logger')

/** Anything with a string `write`, such as `process.stderr`. */
export interface TextSink {
	write(text: string): unknown
}

export interface SpillOptions extends ConfigOptions {
	/** Defaults to `process.stderr`. */
	stderr?: TextSink
	/** Clock for record timestamps and generation names. */
	now?: () => Date
	/** SQLite lock wait ceiling; only used by the indexed store. */
	busyTimeoutMs?: number
}

/**
 * Outcome of the durable half of an emit. `emit` discards it; `persist`
 * returns it.
 */
export type PersistResult =
	| { status: 'disabled' }
	| { status: 'persisted'; bound: BoundResult }
	| { status: 'failed'; error: unknown; bound: BoundResult }

/**
 * The line written to stderr for a message. A message that already ends
 * in a newline gets no second one.
 */
export function formatStderrLine(tool: string, message: string): string {
	const line = `${tool}: ${message}`
	return line.endsWith('\n') ? line : `${line}\n`
}

/**
 * A configured logger. Obtain one from {@link configure}.
 */
export class Spill {
	readonly config: ResolvedConfig
	/** Null when persistence is disabled. */
	readonly backend: Backend | null

	private readonly stderr: TextSink
	private readonly now: () => Date

	constructor(config: ResolvedConfig, options: SpillOptions = {}) {
		this.config = config
		this.backend =
			config.destination === null || config.backend === null
				? null
				: createBackend(config.backend, config.destination, {
						busyTimeoutMs: options.busyTimeoutMs,
					})
		this.stderr = options.stderr ?? process.stderr
		this.now = options.now ?? (() => new Date())
	}

	get tool(): string {
		return this.config.tool
	}

	/**
	 * Write the stderr line, then persist a record. Never throws because of
	 * persistence; a failing stderr write does propagate.
	 */
	emit(level: LogLevel, message: string, context?: LogContext): void {
		this.stderr.write(formatStderrLine(this.tool, message))
		if (this.backend === null) return

		void this.persist(this.createRecord(level, message, context))
	}

	debug(message: string, context?: LogContext): void {
		this.emit('debug', message, context)
	}

	info(message: string, context?: LogContext): void {
		this.emit('info', message, context)
	}

	warn(message: string, context?: LogContext): void {
		this.emit('warn', message, context)
	}

	error(message: string, context?: LogContext): void {
		this.emit('error', message, context)
	}

	/**
	 * Build a record stamped with this handle's tool, clock and process id.
	 */
	createRecord(
		level: LogLevel,
		message: string,
		context?: LogContext,
		at?: Date,
	): LogRecord {
		return createRecord({
			tool: this.tool,
			level,
			message,
			context,
			now: at ?? this.now(),
			pid: process.pid,
		})
	}

	/**
	 * Append a record and enforce the bound, reporting what happened instead
	 * of throwing. The bound is enforced even when the append failed.
	 */
	persist(record: LogRecord): PersistResult {
		const backend = this.backend
		if (backend === null) return { status: 'disabled' }

		let appendError: unknown
		let appended = false
		try {
			backend.append(record)
			appended = true
		} catch (error: unknown) {
			appendError = error
			logger.debug('Append to {path} failed: {error}', {
				path: backend.path,
				error,
			})
		}

		const bound = enforceBound(backend, {
			maxSize: this.config.maxSize,
			keep: this.config.keep,
			now: this.now,
		})
		if (bound.status === 'failed') {
			logger.debug('Bound enforcement on {path} failed: {error}', {
				path: backend.path,
				error: bound.error,
			})
		}

		return appended
			? { status: 'persisted', bound }
			: { status: 'failed', error: appendError, bound }
	}
}

/**
 * Resolve configuration and return a fresh handle. Touches nothing on disk;
 * the store is created by the first persisted record.
 *
 * @example
 * ```typescript
 * const spill = configure({ tool: "crib" });
 * spill.info("stored entry #42", { entry_id: 42 });
 * ```
 *
 * @throws SpillError `INVALID_CONFIG` for invalid explicit options
 */
export function configure(options: SpillOptions = {}): Spill {
	return new Spill(resolveConfig(options), options)
}
