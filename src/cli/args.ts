/**
 * Lightweight CLI argument parsing.
 *
 * Flag parsing handles three formats:
 * - `--key value` (spaced syntax)
 * - `--key=value` (equals syntax)
 * - `--key` (boolean flag)
 */

import { StructuredError } from '../errors/index.js'

export type FlagValue = string | boolean | (string | boolean)[]
export type Flags = Record<string, FlagValue>

export interface ParsedArgs {
	command: string
	subcommand?: string
	positional: string[]
	flags: Flags
}

/**
 * Bad command-line input. The entry point prints the message and exits 1.
 */
export class UsageError extends StructuredError<'USAGE'> {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super(message, 'VALIDATION', 'USAGE', context)
		this.name = 'UsageError'
	}
}

/**
 * Parse command-line arguments into structured format.
 *
 * Duplicate flags are stored as arrays:
 * - `--tool a --tool b` → flags.tool = ["a", "b"]
 * - `--tool a` → flags.tool = "a"
 *
 * Flags named in `booleanFlags` never consume the next argument, so
 * `--verbose tail` keeps `tail` as the command.
 *
 * @example
 * parseArgs(["search", "--level", "error", "--msg=a=b"])
 * // → { command: "search", positional: [], flags: { level: "error", msg: "a=b" } }
 */
export function parseArgs(
	argv: string[],
	booleanFlags: ReadonlyArray<string> = [],
): ParsedArgs {
	const positional: string[] = []
	const flags: Flags = {}

	const setValue = (key: string, newValue: string | boolean) => {
		const existing = flags[key]
		if (existing === undefined) {
			flags[key] = newValue
		} else if (Array.isArray(existing)) {
			existing.push(newValue)
		} else {
			flags[key] = [existing, newValue]
		}
	}

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i]
		if (!arg) continue
		if (arg.startsWith('--')) {
			const eq = arg.indexOf('=')
			const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq)
			if (!key) continue
			const next = argv[i + 1]

			if (eq !== -1) {
				setValue(key, arg.slice(eq + 1))
			} else if (
				next !== undefined &&
				!next.startsWith('--') &&
				!booleanFlags.includes(key)
			) {
				setValue(key, next)
				i++
			} else {
				setValue(key, true)
			}
		} else {
			positional.push(arg)
		}
	}

	const [command, subcommand, ...rest] = positional
	return { command: command ?? '', subcommand, positional: rest, flags }
}

/**
 * Safely retrieves a string flag value from parsed CLI flags.
 *
 * Returns the first string value found, or undefined if no string value exists.
 *
 * @example
 * getStringFlag(parseArgs(["--tool", "crib"]).flags, "tool") // → "crib"
 * getStringFlag(parseArgs(["--verbose"]).flags, "verbose") // → undefined
 */
export function getStringFlag(flags: Flags, key: string): string | undefined {
	const value = flags[key]
	if (typeof value === 'string') return value
	if (Array.isArray(value)) {
		return value.find((v): v is string => typeof v === 'string')
	}
	return undefined
}

/**
 * Like {@link getStringFlag}, but a flag given without a value is a usage
 * error instead of being ignored.
 */
export function requireFlagValue(flags: Flags, key: string): string | undefined {
	if (flags[key] === undefined) return undefined
	const value = getStringFlag(flags, key)
	if (value === undefined) {
		throw new UsageError(`--${key} expects a value`, { flag: key })
	}
	return value
}

/**
 * A non-negative integer flag.
 *
 * @example
 * getIntegerFlag(parseArgs(["--lines", "5"]).flags, "lines") // → 5
 */
export function getIntegerFlag(flags: Flags, key: string): number | undefined {
	const raw = requireFlagValue(flags, key)
	if (raw === undefined) return undefined
	if (!/^\d+$/.test(raw)) {
		throw new UsageError(`--${key} expects a non-negative integer, got "${raw}"`, {
			flag: key,
			value: raw,
		})
	}
	return Number(raw)
}

export function hasFlag(flags: Flags, key: string): boolean {
	const value = flags[key]
	return value === true || (Array.isArray(value) && value.includes(true))
}
