/**
 * Category loggers for the library's own diagnostics.
 *
 * LogTape is silent until the host application calls `configure()`, so
 * nothing here ever reaches a terminal unless the host opts in.
 */

import { getLogger, type Logger } from '@logtape/logtape'

/** Root LogTape category for everything this package logs about itself. */
export const ROOT_CATEGORY = 'spill'

/**
 * Get a logger under the package's root category.
 *
 * @example
 * ```typescript
 * const logger = getSpillLogger("bound");
 * logger.info("Rotated {path}", { path });
 * ```
 */
export function getSpillLogger(...subcategory: string[]): Logger {
	return getLogger([ROOT_CATEGORY, ...subcategory])
}
