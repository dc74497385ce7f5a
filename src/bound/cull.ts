/**
 * Culling for the indexed store: delete the oldest half of rows by id,
 * then reclaim the space.
 *
 * Ids track insertion order, which can differ from timestamp order when
 * writers' clocks disagree. Culling follows ids.
 */

import { pathExistsSync } from '../fs/index.js'
import { getSpillLogger } from '../logging/logger.js'
import { hasLogTable, type IndexedStore } from '../store/index.js'

const logger = getSpillLogger('bound', 'cull')

const CULL_SQL = `DELETE FROM log WHERE id IN (
	SELECT id FROM log ORDER BY id ASC LIMIT (SELECT COUNT(*) / 2 FROM log)
)`

export interface CullOutcome {
	deleted: number
	remaining: number
}

export function cullIndexedStore(store: IndexedStore): CullOutcome {
	if (!pathExistsSync(store.path)) return { deleted: 0, remaining: 0 }

	const db = store.connect()
	try {
		if (!hasLogTable(db)) return { deleted: 0, remaining: 0 }

		const { changes } = db.prepare(CULL_SQL).run()
		db.exec('VACUUM')
		// VACUUM in WAL mode grows the -wal file; fold it back and truncate.
		db.pragma('wal_checkpoint(TRUNCATE)')

		const remaining: unknown = db
			.prepare('SELECT COUNT(*) FROM log')
			.pluck()
			.get()
		const outcome = {
			deleted: changes,
			remaining: typeof remaining === 'number' ? remaining : 0,
		}
		logger.info('Culled {deleted} rows from {path}', {
			path: store.path,
			...outcome,
		})
		return outcome
	} finally {
		db.close()
	}
}
