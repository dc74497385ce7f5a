import type { LogRecord } from '../record/index.js'

/** Which storage variant backs a destination. */
export type BackendKind = 'append' | 'indexed'

/**
 * Write-side capability shared by both stores.
 *
 * Implementations hold no handle between calls: every operation opens,
 * works, and closes, so a destination rotated or culled by another process
 * in the meantime is picked up transparently.
 */
export interface StorageBackend {
	readonly kind: BackendKind
	/** Absolute or cwd-relative destination path. */
	readonly path: string
	/** Persist one record. Safe across processes without a lock file. */
	append(record: LogRecord): void
	/** On-disk footprint in bytes; 0 when the destination is absent. */
	size(): number
	/** Create directories and any schema. Safe under concurrent first use. */
	initializeIfAbsent(): void
}

/**
 * Conjunctive record filters, already validated and normalized.
 */
export interface RecordFilter {
	tool?: string
	level?: LogRecord['level']
	/** Canonical timestamp; records with `timestamp >= since` match. */
	since?: string
	/** Case-sensitive substring of the message. */
	message?: string
}
