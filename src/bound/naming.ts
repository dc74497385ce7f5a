/**
 * Rotated generation names: `<basename>-<YYYYMMDD>-<HHMMSS>.<ext>` in UTC.
 *
 * Two rotations inside the same second get a numeric suffix
 * (`spill-20261019-143501-1.jsonl`) so an earlier generation is never
 * renamed over, even when the rotations run in different processes.
 */

import { closeSync, openSync, readdirSync } from 'node:fs'
import path from 'node:path'
import { isErrnoException, isNotFoundError } from '../fs/index.js'

export interface Generation {
	path: string
	/** `YYYYMMDD-HHMMSS` */
	stamp: string
	/** 0 for the unsuffixed name. */
	sequence: number
}

/**
 * Format a capture time as `YYYYMMDD-HHMMSS` (UTC).
 *
 * @example
 * formatGenerationStamp(new Date("2026-10-19T14:35:01.250Z")) // "20261019-143501"
 */
export function formatGenerationStamp(date: Date): string {
	const iso = date.toISOString()
	return `${iso.slice(0, 10).replaceAll('-', '')}-${iso.slice(11, 19).replaceAll(':', '')}`
}

function splitName(livePath: string): { dir: string; base: string; ext: string } {
	const ext = path.extname(livePath)
	return {
		dir: path.dirname(livePath),
		base: path.basename(livePath, ext),
		ext,
	}
}

export function generationPath(
	livePath: string,
	stamp: string,
	sequence = 0,
): string {
	const { dir, base, ext } = splitName(livePath)
	const suffix = sequence > 0 ? `-${sequence}` : ''
	return path.join(dir, `${base}-${stamp}${suffix}${ext}`)
}

/**
 * Reserve the first free generation path for a capture time by creating it
 * empty with O_EXCL. Two processes can never claim the same name; the
 * winner's rename then replaces its own placeholder.
 *
 * @returns the claimed path; the caller renames onto it or unlinks it
 */
export function claimGenerationPath(livePath: string, now: Date): string {
	const stamp = formatGenerationStamp(now)
	for (let sequence = 0; ; sequence++) {
		const candidate = generationPath(livePath, stamp, sequence)
		try {
			closeSync(openSync(candidate, 'wx'))
			return candidate
		} catch (error: unknown) {
			if (!isErrnoException(error) || error.code !== 'EEXIST') throw error
		}
	}
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Rotated generations of a live file, oldest first. Files belonging to
 * other destinations in the same directory are ignored.
 */
export function listGenerations(livePath: string): Generation[] {
	const { dir, base, ext } = splitName(livePath)
	const pattern = new RegExp(
		`^${escapeRegExp(base)}-(\\d{8}-\\d{6})(?:-(\\d+))?${escapeRegExp(ext)}$`,
	)

	let entries: string[]
	try {
		entries = readdirSync(dir)
	} catch (error: unknown) {
		if (isNotFoundError(error)) return []
		throw error
	}

	const generations: Generation[] = []
	for (const entry of entries) {
		const match = pattern.exec(entry)
		const stamp = match?.[1]
		if (stamp === undefined) continue
		generations.push({
			path: path.join(dir, entry),
			stamp,
			sequence: match?.[2] === undefined ? 0 : Number(match[2]),
		})
	}

	return generations.sort(
		(a, b) => a.stamp.localeCompare(b.stamp) || a.sequence - b.sequence,
	)
}
