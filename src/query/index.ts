/**
 * Query engine: tail, search and raw reads of stored records.
 *
 * @module query
 */

export {
	type CompactOptions,
	createQueryEngine,
	openQueryEngine,
	QueryEngine,
	TailBuffer,
} from './engine.js'
export {
	matchesFilter,
	type NormalizedSearch,
	normalizeFilters,
	normalizeSince,
	type SearchFilters,
	validateCount,
} from './filters.js'
