/**
 * `spill` subcommands over the query engine.
 *
 * `runCli` never exits the process; it returns the exit code so the entry
 * point and the tests decide what to do with it.
 */

import { isStructuredError, SpillError } from '../errors/index.js'
import type { Environment, TextSink } from '../logger/index.js'
import { initDiagnostics } from '../logging/index.js'
import { openQueryEngine, type QueryEngine } from '../query/index.js'
import type { BackendKind } from '../store/index.js'
import { supportsColor, type TerminalStream } from '../terminal/index.js'
import { formatRaw, formatRecord } from './format.js'
import { type OutputStream, writeLine } from './output.js'
import {
	type Flags,
	getIntegerFlag,
	hasFlag,
	parseArgs,
	requireFlagValue,
	UsageError,
} from './args.js'

export const DEFAULT_TAIL_LINES = 20

export const USAGE = `Usage: spill <command> [flags]

Commands:
  tail [--lines N]          Show the last N records (default ${DEFAULT_TAIL_LINES})
  search [filters]          Show records matching every filter
      --tool NAME             exact tool name
      --level LEVEL           debug, info, warn or error
      --since TIME            records at or after TIME
      --msg TEXT              case-sensitive message substring
      --limit N               only the most recent N matches
  read                      Print every record as a JSON line
  rotate [--keep N]         Rotate the append store now
  cull                      Cull the oldest half of the indexed store now
  help                      Show this help

Global flags:
  --db PATH                 Store to read (default: $SPILL_DB or .state/spill/spill.db)
  --backend append|indexed  Override detection from the file extension
  --verbose                 Print internal diagnostics to stderr
`

export interface CliIO {
	stdout: OutputStream & TerminalStream
	stderr: TextSink
	env?: Environment
	cwd?: string
}

const BOOLEAN_FLAGS = ['verbose', 'help']

function parseBackend(flags: Flags): BackendKind | undefined {
	const value = requireFlagValue(flags, 'backend')
	if (value === undefined) return undefined
	if (value !== 'append' && value !== 'indexed') {
		throw new UsageError(`--backend must be "append" or "indexed", got "${value}"`, {
			value,
		})
	}
	return value
}

function openEngine(flags: Flags, io: CliIO): QueryEngine {
	return openQueryEngine({
		destination: requireFlagValue(flags, 'db'),
		backend: parseBackend(flags),
		env: io.env,
		cwd: io.cwd,
	})
}

async function tail(flags: Flags, io: CliIO): Promise<void> {
	const engine = openEngine(flags, io)
	const lines = getIntegerFlag(flags, 'lines') ?? DEFAULT_TAIL_LINES
	const color = supportsColor(io.stdout, io.env)
	for (const record of await engine.tail(lines)) {
		await writeLine(io.stdout, formatRecord(record, { color }))
	}
}

async function search(flags: Flags, io: CliIO): Promise<void> {
	const engine = openEngine(flags, io)
	const records = await engine.search({
		tool: requireFlagValue(flags, 'tool'),
		level: requireFlagValue(flags, 'level'),
		since: requireFlagValue(flags, 'since'),
		message: requireFlagValue(flags, 'msg'),
		limit: getIntegerFlag(flags, 'limit'),
	})
	const color = supportsColor(io.stdout, io.env)
	for (const record of records) {
		await writeLine(io.stdout, formatRecord(record, { color }))
	}
}

async function read(flags: Flags, io: CliIO): Promise<void> {
	const engine = openEngine(flags, io)
	for await (const record of engine.readAll()) {
		await writeLine(io.stdout, formatRaw(record))
	}
}

function rotate(flags: Flags, io: CliIO): void {
	const engine = openEngine(flags, io)
	if (engine.backend.kind !== 'append') {
		throw new SpillError(
			`rotate applies to the append store; ${engine.backend.path} is indexed (use cull)`,
			'UNSUPPORTED_OPERATION',
			{ path: engine.backend.path, kind: engine.backend.kind },
		)
	}

	const result = engine.compact({ keep: getIntegerFlag(flags, 'keep') })
	if (result.status !== 'rotated') return
	if (result.rotatedTo === null) {
		io.stdout.write(`Nothing to rotate at ${engine.backend.path}\n`)
		return
	}
	io.stdout.write(`Rotated ${engine.backend.path} to ${result.rotatedTo}\n`)
	for (const pruned of result.pruned) {
		io.stdout.write(`Pruned ${pruned}\n`)
	}
}

function cull(flags: Flags, io: CliIO): void {
	const engine = openEngine(flags, io)
	if (engine.backend.kind !== 'indexed') {
		throw new SpillError(
			`cull applies to the indexed store; ${engine.backend.path} is an append store (use rotate)`,
			'UNSUPPORTED_OPERATION',
			{ path: engine.backend.path, kind: engine.backend.kind },
		)
	}

	const result = engine.compact()
	if (result.status !== 'culled') return
	io.stdout.write(
		`Deleted ${result.deleted} rows from ${engine.backend.path}, ${result.remaining} remain\n`,
	)
}

/**
 * Run one command and return its exit code: 0 on success, 1 on a usage,
 * configuration or query error (reported on stderr).
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
	try {
		const { command, flags } = parseArgs(argv, BOOLEAN_FLAGS)

		if (hasFlag(flags, 'verbose')) {
			await initDiagnostics({ stream: io.stderr })
		}

		switch (command) {
			case '':
			case 'help':
				io.stdout.write(USAGE)
				return 0
			case 'tail':
				await tail(flags, io)
				return 0
			case 'search':
				await search(flags, io)
				return 0
			case 'read':
				await read(flags, io)
				return 0
			case 'rotate':
				rotate(flags, io)
				return 0
			case 'cull':
				cull(flags, io)
				return 0
			default:
				throw new UsageError(`Unknown command "${command}"`, { command })
		}
	} catch (error: unknown) {
		if (!isStructuredError(error)) throw error
		io.stderr.write(`spill: ${error.message}\n`)
		if (error instanceof UsageError) io.stderr.write(`\n${USAGE}`)
		return 1
	}
}
