/**
 * Test helpers: isolated temp directories and capturing streams.
 *
 * @example
 * ```ts
 * import { createCaptureStream, createTempDir } from "../testing/index.js";
 *
 * const dir = createTempDir("spill-test-");
 * const stderr = createCaptureStream();
 * const spill = configure({ tool: "crib", destination: join(dir, "spill.jsonl"), stderr });
 * spill.info("hello");
 * stderr.lines(); // ["crib: hello"]
 * ```
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

/**
 * Create a unique directory under the system temp directory.
 */
export function createTempDir(prefix = 'test-'): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

/**
 * Remove a directory created by {@link createTempDir}.
 */
export function removeTempDir(dir: string): void {
	fs.rmSync(dir, { recursive: true, force: true })
}

/**
 * Read a text file and split it into non-empty lines.
 */
export function readLines(filePath: string): string[] {
	return fs
		.readFileSync(filePath, 'utf8')
		.split('\n')
		.filter((line) => line.length > 0)
}

/**
 * A writable stand-in for stdout/stderr that keeps everything written to it.
 */
export interface CaptureStream {
	write(text: string): boolean
	/** Everything written so far. */
	text(): string
	/** Written text split on newlines, without the trailing empty entry. */
	lines(): string[]
}

export function createCaptureStream(): CaptureStream {
	const chunks: string[] = []
	return {
		write(text: string): boolean {
			chunks.push(text)
			return true
		},
		text(): string {
			return chunks.join('')
		},
		lines(): string[] {
			const all = chunks.join('')
			if (all === '') return []
			return all.replace(/\n$/, '').split('\n')
		},
	}
}
