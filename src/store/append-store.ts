/**
 * Append store: one JSON line per record in a single file.
 *
 * Every append is an independent open(O_APPEND)/write/close cycle of one
 * complete line. The kernel serializes O_APPEND writes to a regular file, so
 * concurrent writers in separate processes never interleave inside a line.
 * Because no descriptor is kept, an append after another process rotated
 * the file away simply creates the next generation.
 *
 * @module store/append-store
 */

import { appendFileSync, createReadStream } from 'node:fs'
import { SpillError } from '../errors/index.js'
import {
	ensureParentDirSync,
	fileSizeSync,
	isNotFoundError,
} from '../fs/index.js'
import { getSpillLogger } from '../logging/logger.js'
import { decodeLine, encodeLine, type LogRecord } from '../record/index.js'
import type { StorageBackend } from './types.js'

const logger = getSpillLogger('store', 'append')

export class AppendStore implements StorageBackend {
	readonly kind = 'append'

	constructor(readonly path: string) {}

	initializeIfAbsent(): void {
		ensureParentDirSync(this.path)
	}

	append(record: LogRecord): void {
		const line = `${encodeLine(record)}\n`
		try {
			appendFileSync(this.path, line, 'utf8')
		} catch (error: unknown) {
			// First write, or the directory was removed: create it and try once more.
			if (!isNotFoundError(error)) throw error
			this.initializeIfAbsent()
			appendFileSync(this.path, line, 'utf8')
		}
	}

	size(): number {
		return fileSizeSync(this.path)
	}

	/**
	 * Stream every record in file order, holding at most one read chunk in
	 * memory. An absent file yields nothing.
	 *
	 * A complete line that fails to decode raises `CORRUPT_STORE`. A final
	 * line with no terminator is a write still in flight and is skipped.
	 */
	async *records(): AsyncGenerator<LogRecord> {
		let pending = ''
		let lineNumber = 0

		try {
			for await (const chunk of createReadStream(this.path, {
				encoding: 'utf8',
			})) {
				pending += String(chunk)
				let newline = pending.indexOf('\n')
				while (newline !== -1) {
					const line = pending.slice(0, newline)
					pending = pending.slice(newline + 1)
					lineNumber++
					if (line.trim() !== '') {
						yield this.decodeAt(line, lineNumber)
					}
					newline = pending.indexOf('\n')
				}
			}
		} catch (error: unknown) {
			if (isNotFoundError(error)) return
			throw error
		}

		if (pending.trim() !== '') {
			logger.debug('Skipped unterminated final line {line} of {path}', {
				line: lineNumber + 1,
				path: this.path,
			})
		}
	}

	private decodeAt(line: string, lineNumber: number): LogRecord {
		try {
			return decodeLine(line)
		} catch (error: unknown) {
			throw new SpillError(
				`Corrupt record at ${this.path}:${lineNumber}`,
				'CORRUPT_STORE',
				{ path: this.path, line: lineNumber },
				error,
			)
		}
	}
}
