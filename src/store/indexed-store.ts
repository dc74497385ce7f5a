/**
 * Indexed store: one SQLite table with secondary indexes for the query
 * engine's common filters.
 *
 * Each append opens a connection, inserts one row, and closes. Concurrent
 * writers in separate processes serialize through SQLite itself: WAL
 * journaling plus a bounded busy timeout, after which the append fails
 * (and the caller's fail-open path discards the failure).
 *
 * @module store/indexed-store
 */

import Database from 'better-sqlite3'
import { isSpillError, SpillError } from '../errors/index.js'
import {
	ensureParentDirSync,
	fileSizeSync,
	pathExistsSync,
} from '../fs/index.js'
import { fromRow, type LogRecord, toRow } from '../record/index.js'
import type { RecordFilter, StorageBackend } from './types.js'

/** How long a writer waits on a locked database before giving up. */
export const BUSY_TIMEOUT_MS = 5000

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS log (
	id INTEGER PRIMARY KEY AUTOINCREMENT,
	ts TEXT NOT NULL,
	tool TEXT NOT NULL,
	level TEXT NOT NULL,
	msg TEXT NOT NULL,
	pid INTEGER NOT NULL,
	ctx TEXT
);
CREATE INDEX IF NOT EXISTS idx_log_ts ON log(ts);
CREATE INDEX IF NOT EXISTS idx_log_tool ON log(tool);
CREATE INDEX IF NOT EXISTS idx_log_level ON log(level);
CREATE INDEX IF NOT EXISTS idx_log_tool_level ON log(tool, level);
`

const INSERT_SQL =
	'INSERT INTO log (ts, tool, level, msg, pid, ctx) VALUES (@ts, @tool, @level, @msg, @pid, @ctx)'

const COLUMNS = 'id, ts, tool, level, msg, pid, ctx'

const CORRUPTION_CODES = new Set(['SQLITE_CORRUPT', 'SQLITE_NOTADB'])

export interface IndexedStoreOptions {
	/** Wait-for-lock ceiling in milliseconds. Defaults to {@link BUSY_TIMEOUT_MS}. */
	busyTimeoutMs?: number
}

export class IndexedStore implements StorageBackend {
	readonly kind = 'indexed'

	private readonly busyTimeoutMs: number
	private schemaApplied = false

	constructor(
		readonly path: string,
		options: IndexedStoreOptions = {},
	) {
		this.busyTimeoutMs = options.busyTimeoutMs ?? BUSY_TIMEOUT_MS
	}

	/**
	 * Open a connection with the busy timeout applied. The caller closes it.
	 * Without `create`, a missing database file is an error rather than
	 * silently created.
	 */
	connect(options: { create?: boolean } = {}): Database.Database {
		return new Database(this.path, {
			timeout: this.busyTimeoutMs,
			fileMustExist: options.create !== true,
		})
	}

	initializeIfAbsent(): void {
		ensureParentDirSync(this.path)
		const db = this.connect({ create: true })
		try {
			this.applySchema(db)
		} finally {
			db.close()
		}
	}

	append(record: LogRecord): void {
		const row = toRow(record)
		// The file may have been removed since the schema was last applied.
		const needsSchema = !this.schemaApplied || !pathExistsSync(this.path)
		if (needsSchema) ensureParentDirSync(this.path)

		const db = this.connect({ create: true })
		try {
			if (needsSchema) this.applySchema(db)
			db.prepare(INSERT_SQL).run(row)
		} finally {
			db.close()
		}
	}

	/** Database file plus its write-ahead log. */
	size(): number {
		return fileSizeSync(this.path) + fileSizeSync(`${this.path}-wal`)
	}

	/**
	 * Number of stored rows; 0 when the database or table is absent.
	 */
	count(): number {
		return this.read((db) => {
			const value: unknown = db
				.prepare('SELECT COUNT(*) FROM log')
				.pluck()
				.get()
			return typeof value === 'number' ? value : 0
		}, 0)
	}

	/**
	 * Rows matching every supplied filter, in id order. With `limit`, only
	 * the newest `limit` matches are returned (still oldest first).
	 */
	select(filter: RecordFilter = {}, limit?: number): LogRecord[] {
		const clauses: string[] = []
		const params: Record<string, string | number> = {}

		if (filter.tool !== undefined) {
			clauses.push('tool = @tool')
			params.tool = filter.tool
		}
		if (filter.level !== undefined) {
			clauses.push('level = @level')
			params.level = filter.level
		}
		if (filter.since !== undefined) {
			clauses.push('ts >= @since')
			params.since = filter.since
		}
		if (filter.message !== undefined) {
			// instr() is case-sensitive, unlike LIKE.
			clauses.push('instr(msg, @message) > 0')
			params.message = filter.message
		}

		const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : ''
		let sql = `SELECT ${COLUMNS} FROM log ${where} ORDER BY id ASC`
		if (limit !== undefined) {
			params.limit = limit
			sql = `SELECT * FROM (SELECT ${COLUMNS} FROM log ${where} ORDER BY id DESC LIMIT @limit) ORDER BY id ASC`
		}

		return this.read(
			(db) =>
				db
					.prepare(sql)
					.all(params)
					.map((row) => fromRow(row)),
			[],
		)
	}

	/**
	 * Iterate every row in id order without loading the table into memory.
	 */
	*iterate(): Generator<LogRecord> {
		const db = this.openForRead()
		if (db === null) return
		try {
			for (const row of db.prepare(`SELECT ${COLUMNS} FROM log ORDER BY id ASC`).iterate()) {
				yield fromRow(row)
			}
		} catch (error: unknown) {
			throw this.wrapReadError(error)
		} finally {
			db.close()
		}
	}

	private applySchema(db: Database.Database): void {
		db.pragma('journal_mode = WAL')
		db.exec(SCHEMA_SQL)
		this.schemaApplied = true
	}

	private read<T>(query: (db: Database.Database) => T, empty: T): T {
		const db = this.openForRead()
		if (db === null) return empty
		try {
			return query(db)
		} catch (error: unknown) {
			throw this.wrapReadError(error)
		} finally {
			db.close()
		}
	}

	/**
	 * Open an existing database that has the `log` table, or return null.
	 */
	private openForRead(): Database.Database | null {
		if (!pathExistsSync(this.path)) return null

		let db: Database.Database
		try {
			db = this.connect()
		} catch (error: unknown) {
			// Removed between the existence check and the open.
			if (!pathExistsSync(this.path)) return null
			throw this.wrapReadError(error)
		}

		try {
			if (!hasLogTable(db)) {
				db.close()
				return null
			}
		} catch (error: unknown) {
			db.close()
			throw this.wrapReadError(error)
		}
		return db
	}

	private wrapReadError(error: unknown): unknown {
		if (error instanceof Database.SqliteError && CORRUPTION_CODES.has(error.code)) {
			return new SpillError(
				`Corrupt database at ${this.path}`,
				'CORRUPT_STORE',
				{ path: this.path, sqliteCode: error.code },
				error,
			)
		}
		// A row that does not decode is damage to the store, not bad input.
		if (isSpillError(error, 'INVALID_RECORD')) {
			return new SpillError(
				`Corrupt row in ${this.path}`,
				'CORRUPT_STORE',
				{ ...error.context, path: this.path },
				error,
			)
		}
		return error
	}
}

/**
 * True when the connection's database has the `log` table.
 */
export function hasLogTable(db: Database.Database): boolean {
	return (
		db
			.prepare(
				"SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = 'log'",
			)
			.get() !== undefined
	)
}
