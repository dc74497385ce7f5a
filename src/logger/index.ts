/**
 * Logger: configuration and the leveled emit operations.
 *
 * @module logger
 */

export {
	type ConfigOptions,
	type Environment,
	type ResolvedConfig,
	resolveConfig,
} from './config.js'
export {
	DEFAULT_DESTINATION,
	DEFAULT_KEEP,
	DEFAULT_MAX_SIZE,
	DEFAULT_TOOL,
	ENV_BACKEND,
	ENV_DESTINATION,
	ENV_KEEP,
	ENV_MAX_SIZE,
} from './defaults.js'
export {
	configure,
	formatStderrLine,
	type PersistResult,
	Spill,
	type SpillOptions,
	type TextSink,
} from './spill.js'
