import { join } from 'node:path'
import { configure as configureLogTape, getLogger, reset } from '@logtape/logtape'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { configure, type Spill } from '../logger/index.js'
import { AppendStore } from '../store/index.js'
import type { LogRecord } from '../record/index.js'
import {
	type CaptureStream,
	createCaptureStream,
	createTempDir,
	removeTempDir,
} from '../testing/index.js'
import { getSpillSink, renderMessage, toSpillLevel } from './sink.js'

async function stored(spill: Spill): Promise<LogRecord[]> {
	const records: LogRecord[] = []
	for await (const record of new AppendStore(spill.config.destination ?? '').records()) {
		records.push(record)
	}
	return records
}

describe('toSpillLevel', () => {
	test('folds the six LogTape levels onto four', () => {
		expect(
			(['trace', 'debug', 'info', 'warning', 'error', 'fatal'] as const).map(
				toSpillLevel,
			),
		).toEqual(['debug', 'debug', 'info', 'warn', 'error', 'error'])
	})
})

describe('renderMessage', () => {
	test('inspects non-string values', () => {
		expect(renderMessage(['took ', 12, ' ms for ', 'crib', ''])).toBe(
			'took 12 ms for crib',
		)
	})
})

describe('getSpillSink', () => {
	let tempDir: string
	let stderr: CaptureStream
	let spill: Spill

	beforeEach(() => {
		tempDir = createTempDir('spill-sink-')
		stderr = createCaptureStream()
		spill = configure({
			tool: 'host',
			destination: join(tempDir, 'spill.jsonl'),
			stderr,
			now: () => new Date('2026-10-19T14:35:01.000Z'),
		})
	})

	afterEach(async () => {
		await reset()
		removeTempDir(tempDir)
	})

	async function route(echo: boolean): Promise<void> {
		await configureLogTape({
			sinks: { spill: getSpillSink(spill, { echo }) },
			loggers: [
				{ category: ['host'], sinks: ['spill'], lowestLevel: 'debug' },
				{ category: ['spill'], sinks: ['spill'], lowestLevel: 'debug' },
				{ category: ['logtape', 'meta'], sinks: [], lowestLevel: 'error' },
			],
		})
	}

	test('forwards records with properties and category as context', async () => {
		await route(true)

		getLogger(['host', 'db']).warn('Query took {ms} ms', { ms: 12 })

		expect(stderr.lines()).toEqual(['host: Query took 12 ms'])
		expect(await stored(spill)).toEqual([
			{
				timestamp: '2026-10-19T14:35:01.000Z',
				tool: 'host',
				level: 'warn',
				message: 'Query took 12 ms',
				pid: process.pid,
				context: { ms: 12, category: 'host.db' },
			},
		])
	})

	test('without echo only persists, using the LogTape timestamp', async () => {
		await route(false)

		getLogger(['host']).error('boom')

		expect(stderr.text()).toBe('')
		const [record] = await stored(spill)
		expect(record?.level).toBe('error')
		expect(record?.message).toBe('boom')
		expect(record?.timestamp).not.toBe('2026-10-19T14:35:01.000Z')
	})

	test('drops records from the spill category', async () => {
		await route(true)

		getLogger(['spill', 'bound']).info('Rotated')

		expect(stderr.text()).toBe('')
		expect(await stored(spill)).toEqual([])
	})
})
