import { describe, expect, test } from 'vitest'
import { isSpillError } from '../errors/index.js'
import {
	createRecord,
	decodeLine,
	encodeLine,
	formatTimestamp,
	fromRow,
	hasContext,
	toRow,
} from './codec.js'
import { isLogLevel } from './types.js'

const NOW = new Date(Date.UTC(2026, 9, 19, 14, 35, 1, 7))

describe('formatTimestamp', () => {
	test('renders UTC with millisecond precision', () => {
		expect(formatTimestamp(NOW)).toBe('2026-10-19T14:35:01.007Z')
	})
})

describe('createRecord', () => {
	test('builds a record with context', () => {
		const record = createRecord({
			tool: 'crib',
			level: 'info',
			message: 'stored entry #42',
			context: { entry_id: 42 },
			now: NOW,
			pid: 4242,
		})

		expect(record).toEqual({
			timestamp: '2026-10-19T14:35:01.007Z',
			tool: 'crib',
			level: 'info',
			message: 'stored entry #42',
			pid: 4242,
			context: { entry_id: 42 },
		})
	})

	test('drops an empty context entirely', () => {
		const record = createRecord({
			tool: 'crib',
			level: 'debug',
			message: 'x',
			context: {},
			now: NOW,
			pid: 1,
		})

		expect('context' in record).toBe(false)
	})
})

describe('JSON lines', () => {
	test('encodes fields in wire order and omits empty ctx', () => {
		const record = createRecord({
			tool: 'crib',
			level: 'warn',
			message: 'low disk',
			now: NOW,
			pid: 7,
		})

		expect(encodeLine(record)).toBe(
			'{"ts":"2026-10-19T14:35:01.007Z","tool":"crib","level":"warn","msg":"low disk","pid":7}',
		)
	})

	test('keeps quotes and control characters inside one line', () => {
		const record = createRecord({
			tool: 'crib',
			level: 'error',
			message: 'said "no"\nthen\tleft',
			context: { command: 'sqlite3' },
			now: NOW,
			pid: 7,
		})

		const line = encodeLine(record)

		expect(line).not.toContain('\n')
		expect(decodeLine(line)).toEqual(record)
	})

	test('preserves context value types', () => {
		const context = {
			count: 3,
			ratio: 0.5,
			name: '3',
			ok: false,
			missing: null,
			tags: ['a', 1],
			nested: { deep: { yes: true } },
		}
		const record = createRecord({
			tool: 't',
			level: 'info',
			message: 'm',
			context,
			now: NOW,
			pid: 1,
		})

		expect(decodeLine(encodeLine(record)).context).toEqual(context)
	})

	test('treats an empty ctx object as absent when decoding', () => {
		const decoded = decodeLine(
			'{"ts":"2026-10-19T14:35:01.007Z","tool":"t","level":"info","msg":"m","pid":1,"ctx":{}}',
		)

		expect(decoded.context).toBeUndefined()
	})

	test('rejects malformed JSON', () => {
		expect(() => decodeLine('{"ts":')).toThrow('Record is not valid JSON')
	})

	test('rejects unknown levels with INVALID_RECORD', () => {
		let caught: unknown
		try {
			decodeLine(
				'{"ts":"2026-10-19T14:35:01.007Z","tool":"t","level":"fatal","msg":"m","pid":1}',
			)
		} catch (error) {
			caught = error
		}

		expect(isSpillError(caught, 'INVALID_RECORD')).toBe(true)
	})

	test('rejects an empty tool and a fractional pid', () => {
		expect(() =>
			decodeLine(
				'{"ts":"2026-10-19T14:35:01.007Z","tool":"","level":"info","msg":"m","pid":1}',
			),
		).toThrow('tool')
		expect(() =>
			decodeLine(
				'{"ts":"2026-10-19T14:35:01.007Z","tool":"t","level":"info","msg":"m","pid":1.5}',
			),
		).toThrow('pid')
	})
})

describe('rows', () => {
	test('toRow serializes context or stores null', () => {
		const withCtx = createRecord({
			tool: 'crib',
			level: 'error',
			message: 'sqlite3 error: x',
			context: { command: 'sqlite3' },
			now: NOW,
			pid: 9,
		})
		const withoutCtx = createRecord({
			tool: 'crib',
			level: 'info',
			message: 'ok',
			now: NOW,
			pid: 9,
		})

		expect(toRow(withCtx)).toEqual({
			ts: '2026-10-19T14:35:01.007Z',
			tool: 'crib',
			level: 'error',
			msg: 'sqlite3 error: x',
			pid: 9,
			ctx: '{"command":"sqlite3"}',
		})
		expect(toRow(withoutCtx).ctx).toBeNull()
	})

	test('fromRow restores the record', () => {
		const record = fromRow({
			id: 1,
			ts: '2026-10-19T14:35:01.007Z',
			tool: 'crib',
			level: 'info',
			msg: 'stored entry #42',
			pid: 9,
			ctx: '{"entry_id":42}',
		})

		expect(record).toEqual({
			timestamp: '2026-10-19T14:35:01.007Z',
			tool: 'crib',
			level: 'info',
			message: 'stored entry #42',
			pid: 9,
			context: { entry_id: 42 },
		})
	})

	test('fromRow rejects a non-object ctx', () => {
		expect(() =>
			fromRow({
				id: 3,
				ts: '2026-10-19T14:35:01.007Z',
				tool: 'crib',
				level: 'info',
				msg: 'm',
				pid: 9,
				ctx: '[1,2]',
			}),
		).toThrow('Row context is not an object')
	})
})

describe('helpers', () => {
	test('hasContext', () => {
		expect(hasContext(undefined)).toBe(false)
		expect(hasContext({})).toBe(false)
		expect(hasContext({ a: 1 })).toBe(true)
	})

	test('isLogLevel', () => {
		expect(isLogLevel('warn')).toBe(true)
		expect(isLogLevel('warning')).toBe(false)
		expect(isLogLevel(3)).toBe(false)
	})
})
