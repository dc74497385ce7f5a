/**
 * LogTape integration: category loggers for the library's own diagnostics,
 * opt-in printing of them, and a sink that feeds LogTape records into the
 * shared store.
 *
 * @example
 * ```typescript
 * import { configure as configureLogTape } from "@logtape/logtape";
 * import { configure } from "spill";
 * import { getSpillSink } from "spill/logging";
 *
 * await configureLogTape({
 *   sinks: { spill: getSpillSink(configure({ tool: "crib" }), { echo: false }) },
 *   loggers: [{ category: ["crib"], sinks: ["spill"] }],
 * });
 * ```
 *
 * @packageDocumentation
 */

export {
	type DiagnosticsOptions,
	getTextStreamSink,
	initDiagnostics,
} from './diagnostics.js'
export { getSpillLogger, ROOT_CATEGORY } from './logger.js'
export {
	getSpillSink,
	renderMessage,
	type SpillSinkOptions,
	toSpillLevel,
} from './sink.js'
