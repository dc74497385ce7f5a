import { describe, expect, test } from 'vitest'
import { isStructuredError } from '../errors/index.js'
import {
	getIntegerFlag,
	getStringFlag,
	hasFlag,
	parseArgs,
	requireFlagValue,
	UsageError,
} from './args.js'

describe('parseArgs', () => {
	test('parses command and positional args', () => {
		const result = parseArgs(['tail', 'extra', 'more', '--lines', '5'])
		expect(result.command).toBe('tail')
		expect(result.subcommand).toBe('extra')
		expect(result.positional).toEqual(['more'])
		expect(result.flags.lines).toBe('5')
	})

	test('parses --flag=value and keeps later equals signs', () => {
		expect(parseArgs(['search', '--msg=a=b']).flags.msg).toBe('a=b')
	})

	test('parses boolean flags', () => {
		expect(parseArgs(['read', '--verbose']).flags.verbose).toBe(true)
	})

	test('boolean flags do not swallow the command', () => {
		const result = parseArgs(['--verbose', 'tail'], ['verbose'])
		expect(result.command).toBe('tail')
		expect(result.flags.verbose).toBe(true)
	})

	test('stores duplicate flags as arrays', () => {
		expect(parseArgs(['search', '--tool', 'a', '--tool', 'b']).flags.tool).toEqual([
			'a',
			'b',
		])
	})

	test('handles empty args', () => {
		expect(parseArgs([])).toEqual({
			command: '',
			subcommand: undefined,
			positional: [],
			flags: {},
		})
	})
})

describe('flag helpers', () => {
	test('getStringFlag returns the first string', () => {
		expect(getStringFlag({ tool: [true, 'crib'] }, 'tool')).toBe('crib')
		expect(getStringFlag({ verbose: true }, 'verbose')).toBeUndefined()
	})

	test('requireFlagValue rejects a flag given without a value', () => {
		expect(requireFlagValue({}, 'db')).toBeUndefined()
		expect(() => requireFlagValue({ db: true }, 'db')).toThrow('--db expects a value')
	})

	test('getIntegerFlag parses non-negative integers only', () => {
		expect(getIntegerFlag({ lines: '12' }, 'lines')).toBe(12)
		expect(getIntegerFlag({}, 'lines')).toBeUndefined()
		expect(() => getIntegerFlag({ lines: '-1' }, 'lines')).toThrow(UsageError)
		expect(() => getIntegerFlag({ lines: '2.5' }, 'lines')).toThrow(
			'--lines expects a non-negative integer, got "2.5"',
		)
	})

	test('hasFlag', () => {
		expect(hasFlag({ verbose: true }, 'verbose')).toBe(true)
		expect(hasFlag({ verbose: 'yes' }, 'verbose')).toBe(false)
		expect(hasFlag({}, 'verbose')).toBe(false)
	})

	test('UsageError is a structured validation error', () => {
		const error = new UsageError('bad', { flag: 'x' })
		expect(isStructuredError(error)).toBe(true)
		expect(error.category).toBe('VALIDATION')
		expect(error.code).toBe('USAGE')
	})
})
