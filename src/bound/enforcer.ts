/**
 * Bound enforcement: after every attempted append, compare the destination's
 * footprint with the threshold and compact when it is reached.
 *
 * `enforceBound` never throws. Every failure comes back as a `failed`
 * result so the write path can discard it explicitly.
 */

import type { Backend } from '../store/index.js'
import { type CullOutcome, cullIndexedStore } from './cull.js'
import { type RotateOutcome, rotateAppendStore } from './rotate.js'

export interface BoundOptions {
	/** Footprint in bytes that triggers compaction; 0 disables. */
	maxSize: number
	/** Rotated generations to retain (append store only). */
	keep: number
	now?: () => Date
}

export type Compaction =
	| ({ status: 'rotated' } & RotateOutcome)
	| ({ status: 'culled' } & CullOutcome)

export type BoundResult =
	| { status: 'disabled' }
	| { status: 'within-bound'; size: number }
	| (Compaction & { size: number })
	| { status: 'failed'; error: unknown }

/**
 * Compact immediately, whatever the size: rotate an append store, cull an
 * indexed store.
 */
export function compact(
	backend: Backend,
	options: { keep: number; now?: Date },
): Compaction {
	switch (backend.kind) {
		case 'append':
			return { status: 'rotated', ...rotateAppendStore(backend, options) }
		case 'indexed':
			return { status: 'culled', ...cullIndexedStore(backend) }
	}
}

export function enforceBound(
	backend: Backend,
	options: BoundOptions,
): BoundResult {
	if (options.maxSize <= 0) return { status: 'disabled' }

	try {
		const size = backend.size()
		if (size < options.maxSize) return { status: 'within-bound', size }

		const compaction = compact(backend, {
			keep: options.keep,
			now: options.now?.(),
		})
		return { ...compaction, size }
	} catch (error: unknown) {
		return { status: 'failed', error }
	}
}
