/**
 * Child process for the multi-process write tests.
 *
 * Usage: emit-worker.ts <destination> <count> <tool> [maxSize] [keep]
 *
 * maxSize defaults to 0 (no bounding).
 */

import { configure } from '../spill.js'

const [destination, countArg, tool, maxSizeArg = '0', keepArg = '5'] =
	process.argv.slice(2)
if (destination === undefined || countArg === undefined || tool === undefined) {
	process.stderr.write(
		'usage: emit-worker.ts <destination> <count> <tool> [maxSize] [keep]\n',
	)
	process.exit(2)
}

const spill = configure({
	tool,
	destination,
	maxSize: Number(maxSizeArg),
	keep: Number(keepArg),
	stderr: { write: () => true },
})
const count = Number(countArg)

for (let i = 0; i < count; i++) {
	const result = spill.persist(
		spill.createRecord('info', `${tool} record ${i}`, { seq: i }),
	)
	if (result.status !== 'persisted') {
		process.stderr.write(`${tool}: persist failed\n`)
		process.exit(1)
	}
	if (result.bound.status === 'failed') {
		process.stderr.write(`${tool}: bound enforcement failed\n`)
		process.exit(1)
	}
}
