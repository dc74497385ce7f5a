/**
 * Rotation for the append store.
 *
 * The live file is renamed onto a generation name claimed beforehand with
 * O_EXCL. rename(2) is atomic, so when several processes cross the
 * threshold together each live inode is moved exactly once, and every
 * rename lands on a name only its own process holds. A process that finds
 * the live file already gone releases its claim and does nothing. Whoever
 * appends next creates the new live file.
 */

import { renameSync, unlinkSync } from 'node:fs'
import { fileSizeSync, isNotFoundError } from '../fs/index.js'
import { getSpillLogger } from '../logging/logger.js'
import type { AppendStore } from '../store/index.js'
import { claimGenerationPath, listGenerations } from './naming.js'

const logger = getSpillLogger('bound', 'rotate')

export interface RotateOptions {
	/** Rotated generations to retain; older ones are deleted. */
	keep: number
	/** Capture time for the generation name. */
	now?: Date
}

export interface RotateOutcome {
	/** New generation path, or null when there was nothing to rotate. */
	rotatedTo: string | null
	/** Generations deleted to honour `keep`. */
	pruned: string[]
}

export function rotateAppendStore(
	store: AppendStore,
	options: RotateOptions,
): RotateOutcome {
	if (fileSizeSync(store.path) === 0) {
		return { rotatedTo: null, pruned: [] }
	}

	const target = claimGenerationPath(store.path, options.now ?? new Date())
	try {
		renameSync(store.path, target)
	} catch (error: unknown) {
		releaseClaim(target)
		if (!isNotFoundError(error)) throw error
		logger.debug('Lost rotation race for {path}', { path: store.path })
		return { rotatedTo: null, pruned: [] }
	}

	const pruned = pruneGenerations(store.path, options.keep)
	logger.info('Rotated {path} to {rotatedTo}', {
		path: store.path,
		rotatedTo: target,
		pruned: pruned.length,
	})
	return { rotatedTo: target, pruned }
}

function releaseClaim(target: string): void {
	try {
		unlinkSync(target)
	} catch (error: unknown) {
		// Pruned by another process already.
		if (!isNotFoundError(error)) throw error
	}
}

/**
 * Delete the oldest generations beyond `keep`. A generation another process
 * already deleted is skipped.
 *
 * @returns paths actually deleted by this call
 */
export function pruneGenerations(livePath: string, keep: number): string[] {
	const generations = listGenerations(livePath)
	const surplus = generations.slice(0, Math.max(0, generations.length - keep))

	const pruned: string[] = []
	for (const generation of surplus) {
		try {
			unlinkSync(generation.path)
			pruned.push(generation.path)
		} catch (error: unknown) {
			if (!isNotFoundError(error)) throw error
		}
	}
	return pruned
}
