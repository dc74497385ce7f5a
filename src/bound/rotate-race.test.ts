import type { PathLike } from 'node:fs'
import { appendFileSync, existsSync, readdirSync, unlinkSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { AppendStore } from '../store/index.js'
import { createTempDir, readLines, removeTempDir } from '../testing/index.js'
import { listGenerations } from './naming.js'
import { rotateAppendStore } from './rotate.js'

// Runs once, just before the next rename, to stand in for another process
// acting between this process choosing a generation name and renaming onto it.
const interleave = vi.hoisted(() => {
	const state: { beforeRename: (() => void) | null } = { beforeRename: null }
	return state
})

vi.mock('node:fs', async (importOriginal) => {
	const actual = await importOriginal<typeof import('node:fs')>()
	return {
		...actual,
		renameSync: (from: PathLike, to: PathLike) => {
			const hook = interleave.beforeRename
			interleave.beforeRename = null
			hook?.()
			actual.renameSync(from, to)
		},
	}
})

describe('rotateAppendStore under concurrent rotation', () => {
	const now = new Date('2026-10-19T14:35:01.000Z')
	let tempDir: string
	let store: AppendStore

	beforeEach(() => {
		tempDir = createTempDir('spill-rotate-race-')
		store = new AppendStore(join(tempDir, 'spill.jsonl'))
	})

	afterEach(() => {
		interleave.beforeRename = null
		removeTempDir(tempDir)
	})

	test('a rotation in the same second never replaces another generation', () => {
		writeFileSync(store.path, 'before\n')
		interleave.beforeRename = () => {
			rotateAppendStore(store, { keep: 5, now })
			appendFileSync(store.path, 'after\n')
		}

		const outcome = rotateAppendStore(store, { keep: 5, now })

		expect(outcome.rotatedTo).toBe(join(tempDir, 'spill-20261019-143501.jsonl'))
		expect(existsSync(store.path)).toBe(false)
		expect(listGenerations(store.path).map((g) => readLines(g.path))).toEqual([
			['after'],
			['before'],
		])
	})

	test('losing the race releases the claimed name', () => {
		writeFileSync(store.path, 'before\n')
		interleave.beforeRename = () => {
			unlinkSync(store.path)
		}

		expect(rotateAppendStore(store, { keep: 5, now })).toEqual({
			rotatedTo: null,
			pruned: [],
		})
		expect(readdirSync(tempDir)).toEqual([])
	})
})
