/**
 * Search filter validation and in-memory matching.
 */

import { SpillError } from '../errors/index.js'
import { isLogLevel, type LogRecord } from '../record/index.js'
import type { RecordFilter } from '../store/index.js'

/**
 * Filters as callers supply them. All are optional and combine with AND.
 */
export interface SearchFilters {
	/** Exact tool name. */
	tool?: string
	/** Exact level; must be one of the four levels. */
	level?: string
	/** Earliest timestamp, inclusive. Any value `Date` can parse. */
	since?: string | Date
	/** Case-sensitive substring of the message. */
	message?: string
	/** Keep only the most recent `limit` matches. */
	limit?: number
}

export interface NormalizedSearch {
	filter: RecordFilter
	limit?: number
}

/**
 * Validate filters and bring `since` to the canonical timestamp form so it
 * compares correctly as a string.
 *
 * @throws SpillError `INVALID_FILTER`
 */
export function normalizeFilters(filters: SearchFilters = {}): NormalizedSearch {
	const filter: RecordFilter = {}

	if (filters.tool !== undefined) filter.tool = filters.tool

	if (filters.level !== undefined) {
		const level = filters.level
		if (!isLogLevel(level)) {
			throw new SpillError(`Unknown level "${level}"`, 'INVALID_FILTER', {
				level,
			})
		}
		filter.level = level
	}

	if (filters.since !== undefined) {
		filter.since = normalizeSince(filters.since)
	}

	if (filters.message !== undefined) filter.message = filters.message

	const normalized: NormalizedSearch = { filter }
	if (filters.limit !== undefined) {
		normalized.limit = validateCount(filters.limit, 'limit')
	}
	return normalized
}

export function normalizeSince(since: string | Date): string {
	const date = since instanceof Date ? since : new Date(since)
	if (Number.isNaN(date.getTime())) {
		throw new SpillError(`Invalid since value "${String(since)}"`, 'INVALID_FILTER', {
			since: String(since),
		})
	}
	return date.toISOString()
}

/**
 * @throws SpillError `INVALID_FILTER` unless `value` is a non-negative integer
 */
export function validateCount(value: number, name: string): number {
	if (!Number.isInteger(value) || value < 0) {
		throw new SpillError(
			`${name} must be a non-negative integer, got ${value}`,
			'INVALID_FILTER',
			{ [name]: value },
		)
	}
	return value
}

export function matchesFilter(record: LogRecord, filter: RecordFilter): boolean {
	if (filter.tool !== undefined && record.tool !== filter.tool) return false
	if (filter.level !== undefined && record.level !== filter.level) return false
	if (filter.since !== undefined && record.timestamp < filter.since) return false
	if (filter.message !== undefined && !record.message.includes(filter.message)) {
		return false
	}
	return true
}
