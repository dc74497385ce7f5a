import { existsSync, readdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { createRecord } from '../record/index.js'
import { AppendStore, IndexedStore } from '../store/index.js'
import { createTempDir, removeTempDir } from '../testing/index.js'
import { compact, enforceBound } from './enforcer.js'

const now = () => new Date('2026-10-19T14:35:01.000Z')

describe('enforceBound', () => {
	let tempDir: string

	beforeEach(() => {
		tempDir = createTempDir('spill-enforce-')
	})

	afterEach(() => {
		removeTempDir(tempDir)
	})

	test('maxSize 0 disables bounding', () => {
		const store = new AppendStore(join(tempDir, 'spill.jsonl'))
		writeFileSync(store.path, 'x'.repeat(100))

		expect(enforceBound(store, { maxSize: 0, keep: 5, now })).toEqual({
			status: 'disabled',
		})
		expect(existsSync(store.path)).toBe(true)
	})

	test('reports the size while under the threshold', () => {
		const store = new AppendStore(join(tempDir, 'spill.jsonl'))
		writeFileSync(store.path, 'x'.repeat(99))

		expect(enforceBound(store, { maxSize: 100, keep: 5, now })).toEqual({
			status: 'within-bound',
			size: 99,
		})
	})

	test('rotates an append store at the threshold', () => {
		const store = new AppendStore(join(tempDir, 'spill.jsonl'))
		writeFileSync(store.path, 'x'.repeat(100))

		expect(enforceBound(store, { maxSize: 100, keep: 5, now })).toEqual({
			status: 'rotated',
			size: 100,
			rotatedTo: join(tempDir, 'spill-20261019-143501.jsonl'),
			pruned: [],
		})
		expect(readdirSync(tempDir)).toEqual(['spill-20261019-143501.jsonl'])
	})

	test('culls an indexed store over the threshold', () => {
		const store = new IndexedStore(join(tempDir, 'spill.db'))
		for (let i = 0; i < 4; i++) {
			store.append(
				createRecord({
					tool: 'crib',
					level: 'warn',
					message: `m${i}`,
					now: now(),
					pid: 1,
				}),
			)
		}

		const result = enforceBound(store, { maxSize: 1, keep: 5, now })

		expect(result).toMatchObject({ status: 'culled', deleted: 2, remaining: 2 })
		expect(store.count()).toBe(2)
	})

	test('captures failures instead of throwing', () => {
		const dirPath = join(tempDir, 'spill.db')
		writeFileSync(dirPath, 'not a database at all, only text. '.repeat(20))
		const store = new IndexedStore(dirPath)

		const result = enforceBound(store, { maxSize: 1, keep: 5, now })

		expect(result.status).toBe('failed')
	})
})

describe('compact', () => {
	let tempDir: string

	beforeEach(() => {
		tempDir = createTempDir('spill-compact-')
	})

	afterEach(() => {
		removeTempDir(tempDir)
	})

	test('rotates regardless of size', () => {
		const store = new AppendStore(join(tempDir, 'spill.jsonl'))
		writeFileSync(store.path, 'x\n')

		expect(compact(store, { keep: 5, now: now() })).toEqual({
			status: 'rotated',
			rotatedTo: join(tempDir, 'spill-20261019-143501.jsonl'),
			pruned: [],
		})
	})

	test('culls an empty indexed store without error', () => {
		const store = new IndexedStore(join(tempDir, 'spill.db'))

		expect(compact(store, { keep: 5 })).toEqual({
			status: 'culled',
			deleted: 0,
			remaining: 0,
		})
	})
})
