import { type ErrorCategory, StructuredError } from './structured-error.js'

/** Error codes raised by this package. */
export type SpillErrorCode =
	| 'INVALID_RECORD'
	| 'CORRUPT_STORE'
	| 'INVALID_FILTER'
	| 'INVALID_CONFIG'
	| 'UNSUPPORTED_OPERATION'

const CATEGORY_BY_CODE: Record<SpillErrorCode, ErrorCategory> = {
	INVALID_RECORD: 'VALIDATION',
	CORRUPT_STORE: 'CORRUPTION',
	INVALID_FILTER: 'VALIDATION',
	INVALID_CONFIG: 'CONFIGURATION',
	UNSUPPORTED_OPERATION: 'UNSUPPORTED',
}

/**
 * Error raised by the record codec, the stores' read side, and the query engine.
 * The category is derived from the code.
 */
export class SpillError extends StructuredError<SpillErrorCode> {
	constructor(
		message: string,
		code: SpillErrorCode,
		context: Record<string, unknown> = {},
		cause?: unknown,
	) {
		super(message, CATEGORY_BY_CODE[code], code, context, cause)
		this.name = 'SpillError'
	}
}

export function isSpillError(
	error: unknown,
	code?: SpillErrorCode,
): error is SpillError {
	return error instanceof SpillError && (code === undefined || error.code === code)
}
