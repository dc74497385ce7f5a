/**
 * Read side: tail, search and raw reads over either store, plus the
 * operator-invoked compaction.
 *
 * The append store is always streamed; tail and limited searches keep only
 * the records they will return. The indexed store pushes filters and limits
 * into SQL.
 *
 * @module query/engine
 */

import { type Compaction, compact } from '../bound/index.js'
import { SpillError } from '../errors/index.js'
import { getSpillLogger } from '../logging/logger.js'
import { type ConfigOptions, resolveConfig } from '../logger/config.js'
import { DEFAULT_KEEP } from '../logger/defaults.js'
import type { LogRecord } from '../record/index.js'
import { type Backend, createBackend } from '../store/index.js'
import {
	matchesFilter,
	normalizeFilters,
	type SearchFilters,
	validateCount,
} from './filters.js'

const logger = getSpillLogger('query')

/**
 * Keeps the last `capacity` items pushed into it, in a fixed ring.
 */
export class TailBuffer<T> {
	private readonly ring: T[] = []
	private next = 0

	constructor(private readonly capacity: number) {}

	push(item: T): void {
		if (this.capacity === 0) return
		if (this.ring.length < this.capacity) {
			this.ring.push(item)
		} else {
			this.ring[this.next] = item
		}
		this.next = (this.next + 1) % this.capacity
	}

	/** Oldest first. */
	toArray(): T[] {
		if (this.ring.length < this.capacity) return [...this.ring]
		return [...this.ring.slice(this.next), ...this.ring.slice(0, this.next)]
	}
}

export interface CompactOptions {
	/** Generations to retain after rotation. Defaults to the engine's keep. */
	keep?: number
	now?: Date
}

export class QueryEngine {
	constructor(
		readonly backend: Backend,
		private readonly keep: number = DEFAULT_KEEP,
	) {}

	/**
	 * The last `n` records, oldest first.
	 */
	async tail(n: number): Promise<LogRecord[]> {
		const count = validateCount(n, 'n')
		if (count === 0) return []

		if (this.backend.kind === 'indexed') {
			return this.backend.select({}, count)
		}

		const buffer = new TailBuffer<LogRecord>(count)
		for await (const record of this.backend.records()) buffer.push(record)
		return buffer.toArray()
	}

	/**
	 * Records matching every supplied filter, in storage order.
	 *
	 * @throws SpillError `INVALID_FILTER`
	 */
	async search(filters: SearchFilters = {}): Promise<LogRecord[]> {
		const { filter, limit } = normalizeFilters(filters)
		if (limit === 0) return []

		if (this.backend.kind === 'indexed') {
			return this.backend.select(filter, limit)
		}

		if (limit !== undefined) {
			const buffer = new TailBuffer<LogRecord>(limit)
			for await (const record of this.backend.records()) {
				if (matchesFilter(record, filter)) buffer.push(record)
			}
			return buffer.toArray()
		}

		const matches: LogRecord[] = []
		for await (const record of this.backend.records()) {
			if (matchesFilter(record, filter)) matches.push(record)
		}
		return matches
	}

	/**
	 * Every record in storage order.
	 */
	async *readAll(): AsyncGenerator<LogRecord> {
		if (this.backend.kind === 'indexed') {
			yield* this.backend.iterate()
			return
		}
		yield* this.backend.records()
	}

	/**
	 * Rotate or cull now, whatever the size.
	 */
	compact(options: CompactOptions = {}): Compaction {
		const keep = validateCount(options.keep ?? this.keep, 'keep')
		const result = compact(this.backend, { keep, now: options.now })
		logger.info('Compacted {path}: {status}', {
			path: this.backend.path,
			status: result.status,
		})
		return result
	}
}

export function createQueryEngine(backend: Backend, keep?: number): QueryEngine {
	return new QueryEngine(backend, keep)
}

/**
 * Resolve a destination the same way `configure` does and open it for
 * reading.
 *
 * @throws SpillError `INVALID_CONFIG` when the destination is null
 */
export function openQueryEngine(options: ConfigOptions = {}): QueryEngine {
	const config = resolveConfig(options)
	if (config.destination === null || config.backend === null) {
		throw new SpillError('No destination to query', 'INVALID_CONFIG')
	}
	return new QueryEngine(
		createBackend(config.backend, config.destination),
		config.keep,
	)
}
