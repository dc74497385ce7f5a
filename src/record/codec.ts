/**
 * Record codec: builds LogRecords and converts them to and from the
 * JSON-lines form and the `log` table row form.
 *
 * Decoding validates with zod; anything that does not match the record
 * shape raises a `SpillError` with code `INVALID_RECORD`.
 *
 * @module record/codec
 */

import { z } from 'zod'
import { SpillError } from '../errors/index.js'
import {
	LOG_LEVELS,
	type LogContext,
	type LogLevel,
	type LogRecord,
	type RecordRow,
	type SerializedRecord,
} from './types.js'

/** `YYYY-MM-DDTHH:MM:SS.mmmZ` */
export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/

const contextSchema = z.record(z.unknown())

const serializedSchema = z.object({
	ts: z.string().regex(TIMESTAMP_PATTERN),
	tool: z.string().min(1),
	level: z.enum(LOG_LEVELS),
	msg: z.string(),
	pid: z.number().int(),
	ctx: contextSchema.optional(),
})

const rowSchema = z.object({
	id: z.number().int(),
	ts: z.string().regex(TIMESTAMP_PATTERN),
	tool: z.string().min(1),
	level: z.enum(LOG_LEVELS),
	msg: z.string(),
	pid: z.number().int(),
	ctx: z.string().nullable(),
})

/**
 * Canonical UTC timestamp with millisecond precision.
 */
export function formatTimestamp(date: Date): string {
	return date.toISOString()
}

/**
 * True when a context carries at least one field. Empty objects are
 * treated the same as no context at all.
 */
export function hasContext(
	context: LogContext | undefined,
): context is LogContext {
	return context !== undefined && Object.keys(context).length > 0
}

export interface CreateRecordInput {
	tool: string
	level: LogLevel
	message: string
	context?: LogContext
	now: Date
	pid: number
}

export function createRecord(input: CreateRecordInput): LogRecord {
	const record: LogRecord = {
		timestamp: formatTimestamp(input.now),
		tool: input.tool,
		level: input.level,
		message: input.message,
		pid: input.pid,
	}
	if (hasContext(input.context)) {
		record.context = { ...input.context }
	}
	return record
}

export function toSerialized(record: LogRecord): SerializedRecord {
	const serialized: SerializedRecord = {
		ts: record.timestamp,
		tool: record.tool,
		level: record.level,
		msg: record.message,
		pid: record.pid,
	}
	if (hasContext(record.context)) {
		serialized.ctx = record.context
	}
	return serialized
}

/**
 * Encode a record as a single JSON line, without the terminator.
 * JSON escaping keeps embedded newlines and quotes inside the line.
 *
 * @throws TypeError when the context is not JSON-representable (BigInt, cycles)
 */
export function encodeLine(record: LogRecord): string {
	return JSON.stringify(toSerialized(record))
}

/**
 * Decode one JSON line into a record.
 */
export function decodeLine(line: string): LogRecord {
	let parsed: unknown
	try {
		parsed = JSON.parse(line)
	} catch (error: unknown) {
		throw new SpillError(
			'Record is not valid JSON',
			'INVALID_RECORD',
			{ line: preview(line) },
			error,
		)
	}

	const result = serializedSchema.safeParse(parsed)
	if (!result.success) {
		throw new SpillError(
			`Record failed validation: ${describeIssues(result.error)}`,
			'INVALID_RECORD',
			{ line: preview(line) },
		)
	}

	const { ts, tool, level, msg, pid, ctx } = result.data
	return withContext({ timestamp: ts, tool, level, message: msg, pid }, ctx)
}

/**
 * Row values for an INSERT, keyed by column name (no `id`).
 */
export function toRow(record: LogRecord): Omit<RecordRow, 'id'> {
	return {
		ts: record.timestamp,
		tool: record.tool,
		level: record.level,
		msg: record.message,
		pid: record.pid,
		ctx: hasContext(record.context) ? JSON.stringify(record.context) : null,
	}
}

/**
 * Decode a row returned by the driver.
 */
export function fromRow(row: unknown): LogRecord {
	const result = rowSchema.safeParse(row)
	if (!result.success) {
		throw new SpillError(
			`Row failed validation: ${describeIssues(result.error)}`,
			'INVALID_RECORD',
		)
	}

	const { id, ts, tool, level, msg, pid, ctx } = result.data
	let context: LogContext | undefined
	if (ctx !== null) {
		let parsed: unknown
		try {
			parsed = JSON.parse(ctx)
		} catch (error: unknown) {
			throw new SpillError(
				'Row context is not valid JSON',
				'INVALID_RECORD',
				{ id },
				error,
			)
		}
		const ctxResult = contextSchema.safeParse(parsed)
		if (!ctxResult.success) {
			throw new SpillError('Row context is not an object', 'INVALID_RECORD', {
				id,
			})
		}
		context = ctxResult.data
	}

	return withContext({ timestamp: ts, tool, level, message: msg, pid }, context)
}

function withContext(
	record: LogRecord,
	context: LogContext | undefined,
): LogRecord {
	if (hasContext(context)) {
		record.context = context
	}
	return record
}

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
		.join('; ')
}

function preview(line: string): string {
	return line.length > 120 ? `${line.slice(0, 120)}…` : line
}
