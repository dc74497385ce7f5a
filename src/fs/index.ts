/**
 * Filesystem helpers shared by the stores and the bound enforcer.
 *
 * Everything here is synchronous: the write path runs inside a blocking
 * `emit` call and must finish before it returns.
 */

import { mkdirSync, statSync } from 'node:fs'
import path from 'node:path'

/**
 * Narrow an unknown thrown value to a Node errno exception.
 */
export function isErrnoException(
	error: unknown,
): error is NodeJS.ErrnoException {
	return typeof error === 'object' && error !== null && 'code' in error
}

/**
 * True when the error means the path (or a parent) does not exist.
 */
export function isNotFoundError(error: unknown): boolean {
	return isErrnoException(error) && error.code === 'ENOENT'
}

/**
 * Size of a file in bytes, or 0 when it does not exist.
 *
 * @throws for any error other than ENOENT (e.g. EACCES)
 */
export function fileSizeSync(filePath: string): number {
	try {
		return statSync(filePath).size
	} catch (error: unknown) {
		if (isNotFoundError(error)) return 0
		throw error
	}
}

/**
 * Check whether a path exists (file or directory).
 */
export function pathExistsSync(filePath: string): boolean {
	try {
		statSync(filePath)
		return true
	} catch {
		return false
	}
}

/**
 * Create the parent directory of a file path. Concurrent callers racing
 * on the same directory are fine: `recursive` makes EEXIST a no-op.
 */
export function ensureParentDirSync(filePath: string): void {
	mkdirSync(path.dirname(filePath), { recursive: true })
}
