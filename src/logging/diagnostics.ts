/**
 * Opt-in routing of the library's own diagnostics to a text stream.
 *
 * The library only ever calls `getLogger`; nothing is printed until
 * something configures LogTape. The command-line entry point does so
 * under `--verbose`.
 */

import {
	configure,
	defaultTextFormatter,
	type LogLevel,
	type Sink,
} from '@logtape/logtape'
import type { TextSink } from '../logger/index.js'
import { getSpillLogger, ROOT_CATEGORY } from './logger.js'

export interface DiagnosticsOptions {
	/** Defaults to `process.stderr`. */
	stream?: TextSink
	/** Defaults to "debug". */
	lowestLevel?: LogLevel
}

export function getTextStreamSink(stream: TextSink): Sink {
	return (record) => {
		stream.write(defaultTextFormatter(record))
	}
}

/**
 * Configure LogTape to print the `spill` category. Returns false when the
 * host already configured LogTape, whose configuration is then left alone.
 */
export async function initDiagnostics(
	options: DiagnosticsOptions = {},
): Promise<boolean> {
	const stream = options.stream ?? process.stderr
	const lowestLevel = options.lowestLevel ?? 'debug'

	try {
		await configure({
			sinks: { spillDiagnostics: getTextStreamSink(stream) },
			loggers: [
				{ category: [ROOT_CATEGORY], sinks: ['spillDiagnostics'], lowestLevel },
				{
					category: ['logtape', 'meta'],
					sinks: ['spillDiagnostics'],
					lowestLevel: 'error',
				},
			],
		})
	} catch (error: unknown) {
		if (error instanceof Error && error.message.includes('Already configured')) {
			return false
		}
		throw error
	}

	getSpillLogger('diagnostics').debug('Diagnostics enabled at {lowestLevel}', {
		lowestLevel,
	})
	return true
}
