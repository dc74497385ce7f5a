/**
 * Back-pressure aware writes for command output.
 *
 * `spill read` can print a whole store; when stdout is a slow pipe each
 * write waits for the previous chunk to drain instead of buffering it all.
 */

import { isErrnoException } from '../fs/index.js'

export interface OutputStream {
	write(text: string): boolean
	once?(event: 'drain', listener: () => void): unknown
}

/**
 * Write `line` and a newline, resolving once the stream accepts more.
 */
export async function writeLine(
	stream: OutputStream,
	line: string,
): Promise<void> {
	if (stream.write(`${line}\n`) || stream.once === undefined) return
	const once = stream.once.bind(stream)
	await new Promise<void>((resolve) => {
		once('drain', resolve)
	})
}

/** The reader closed the pipe (`spill read | head`). */
export function isBrokenPipe(error: unknown): boolean {
	return isErrnoException(error) && error.code === 'EPIPE'
}
