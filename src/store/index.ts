/**
 * Storage backends.
 *
 * Two independent implementations of one flat capability interface,
 * discriminated by `kind` so callers can narrow to the variant-specific
 * read side.
 *
 * @module store
 */

import path from 'node:path'
import { AppendStore } from './append-store.js'
import { IndexedStore, type IndexedStoreOptions } from './indexed-store.js'
import type { BackendKind } from './types.js'

export { AppendStore } from './append-store.js'
export {
	BUSY_TIMEOUT_MS,
	hasLogTable,
	IndexedStore,
	type IndexedStoreOptions,
	SCHEMA_SQL,
} from './indexed-store.js'
export type { BackendKind, RecordFilter, StorageBackend } from './types.js'

/** Either concrete store. */
export type Backend = AppendStore | IndexedStore

const INDEXED_EXTENSIONS = new Set(['.db', '.sqlite', '.sqlite3'])

/**
 * Pick a backend from the destination's extension: SQLite extensions
 * select the indexed store, everything else the append store.
 *
 * @example
 * inferBackendKind(".state/spill/spill.db") // "indexed"
 * inferBackendKind("/tmp/spill.jsonl") // "append"
 */
export function inferBackendKind(destination: string): BackendKind {
	const ext = path.extname(destination).toLowerCase()
	return INDEXED_EXTENSIONS.has(ext) ? 'indexed' : 'append'
}

export function createBackend(
	kind: BackendKind,
	destination: string,
	options: IndexedStoreOptions = {},
): Backend {
	switch (kind) {
		case 'append':
			return new AppendStore(destination)
		case 'indexed':
			return new IndexedStore(destination, options)
	}
}
