/**
 * The `spill` command surface and its argument helpers.
 *
 * @module cli
 */

export {
	type FlagValue,
	type Flags,
	getIntegerFlag,
	getStringFlag,
	hasFlag,
	type ParsedArgs,
	parseArgs,
	requireFlagValue,
	UsageError,
} from './args.js'
export { type CliIO, DEFAULT_TAIL_LINES, runCli, USAGE } from './commands.js'
export { type FormatOptions, formatRaw, formatRecord } from './format.js'
export { isBrokenPipe, type OutputStream, writeLine } from './output.js'
