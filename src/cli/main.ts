#!/usr/bin/env node
import { runCli } from './commands.js'
import { isBrokenPipe } from './output.js'

process.stdout.on('error', (error: unknown) => {
	// The reader went away; nothing left to print to.
	if (isBrokenPipe(error)) {
		process.exit(0)
	}
	const message = error instanceof Error ? error.message : String(error)
	process.stderr.write(`spill: ${message}\n`)
	process.exit(1)
})

runCli(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr }).then(
	(code) => {
		process.exitCode = code
	},
	(error: unknown) => {
		const message = error instanceof Error ? (error.stack ?? error.message) : String(error)
		process.stderr.write(`spill: ${message}\n`)
		process.exitCode = 1
	},
)
