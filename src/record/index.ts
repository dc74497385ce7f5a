/**
 * Log record model and codec.
 *
 * @module record
 */

export {
	type CreateRecordInput,
	createRecord,
	decodeLine,
	encodeLine,
	formatTimestamp,
	fromRow,
	hasContext,
	TIMESTAMP_PATTERN,
	toRow,
	toSerialized,
} from './codec.js'
export {
	isLogLevel,
	LOG_LEVELS,
	type LogContext,
	type LogLevel,
	type LogRecord,
	type RecordRow,
	type SerializedRecord,
} from './types.js'
