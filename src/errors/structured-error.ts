/**
 * Structured errors for the read side and configuration.
 *
 * The write path never throws these past `emit`; they surface only from
 * query operations, the command surface, and invalid explicit options.
 *
 * @module errors/structured-error
 */

/**
 * High-level error categories.
 */
export type ErrorCategory =
	| 'VALIDATION' // Bad input: filter, option, record shape
	| 'CORRUPTION' // Store exists but cannot be decoded
	| 'CONFIGURATION' // Invalid explicit configuration
	| 'UNSUPPORTED' // Operation does not apply to this backend
	| 'INTERNAL' // Unexpected failure

/**
 * Structured error with a category, a machine-readable code, and context.
 *
 * @example
 * ```typescript
 * throw new StructuredError(
 *   "Store is not a database",
 *   "CORRUPTION",
 *   "CORRUPT_STORE",
 *   { path: "/var/log/spill.db" },
 * );
 * ```
 */
export class StructuredError<TCode extends string = string> extends Error {
	public readonly category: ErrorCategory

	/** Machine-readable error code (e.g. "CORRUPT_STORE"). */
	public readonly code: TCode

	/** Arbitrary metadata for debugging. */
	public readonly context: Record<string, unknown>

	public override readonly cause?: unknown

	constructor(
		message: string,
		category: ErrorCategory,
		code: TCode,
		context: Record<string, unknown> = {},
		cause?: unknown,
	) {
		super(message)
		this.name = 'StructuredError'
		this.category = category
		this.code = code
		this.context = context
		this.cause = cause

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target)
		}
	}

	/**
	 * Serialize for logging or transport.
	 */
	toJSON(): {
		name: string
		message: string
		category: ErrorCategory
		code: TCode
		context: Record<string, unknown>
		cause?: { name: string; message: string }
	} {
		return {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			context: this.context,
			cause:
				this.cause instanceof Error
					? { name: this.cause.name, message: this.cause.message }
					: undefined,
		}
	}
}

/**
 * Type guard for StructuredError and its subclasses.
 */
export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError
}
