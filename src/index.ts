/**
 * spill
 *
 * Structured logging shared by independent tool processes: every call writes
 * the usual `"{tool}: {message}"` line to stderr and persists a record in a
 * size-bounded JSON-lines file or SQLite database that can be queried later.
 *
 * @example
 * ```typescript
 * import { configure, openQueryEngine } from "spill";
 *
 * const spill = configure({ tool: "crib" });
 * spill.info("stored entry #42", { entry_id: 42 });
 *
 * const errors = await openQueryEngine().search({ tool: "crib", level: "error" });
 * ```
 *
 * Import from subpath exports for the lower layers:
 *   import { AppendStore } from "spill/store";
 *   import { getSpillSink } from "spill/logging";
 *
 * @packageDocumentation
 */

export type { BoundResult, Compaction } from './bound/index.js'
export {
	isSpillError,
	isStructuredError,
	SpillError,
	type SpillErrorCode,
} from './errors/index.js'
export {
	type ConfigOptions,
	configure,
	type PersistResult,
	resolveConfig,
	Spill,
	type SpillOptions,
} from './logger/index.js'
export {
	openQueryEngine,
	QueryEngine,
	type SearchFilters,
} from './query/index.js'
export {
	LOG_LEVELS,
	type LogContext,
	type LogLevel,
	type LogRecord,
} from './record/index.js'
export type { Backend, BackendKind } from './store/index.js'
