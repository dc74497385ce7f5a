/**
 * Error types and guards.
 *
 * @module errors
 */

export {
	isSpillError,
	SpillError,
	type SpillErrorCode,
} from './spill-error.js'
export {
	type ErrorCategory,
	isStructuredError,
	StructuredError,
} from './structured-error.js'
