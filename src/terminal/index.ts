/**
 * Terminal module - ANSI styling and color detection for CLI output
 *
 * @example
 * ```ts
 * import { colorLevel, supportsColor } from "spill/terminal";
 *
 * const useColor = supportsColor(process.stdout);
 * console.log(useColor ? colorLevel("error", "ERROR") : "ERROR");
 * ```
 */

import type { LogLevel } from '../record/index.js'

// ============================================================================
// Color formatting
// ============================================================================

/** Foreground colors available in every ANSI terminal */
export type ColorName = 'red' | 'yellow' | 'blue' | 'gray'

const FOREGROUND: Record<ColorName, string> = {
	red: '\x1b[31m',
	yellow: '\x1b[33m',
	blue: '\x1b[34m',
	gray: '\x1b[90m',
}

/** ANSI reset code */
export const RESET = '\x1b[0m'

/**
 * Wrap text in a foreground color
 *
 * @example
 * ```ts
 * color("red", "Error:"); // "\x1b[31mError:\x1b[0m"
 * ```
 */
export function color(name: ColorName, text: string): string {
	return `${FOREGROUND[name]}${text}${RESET}`
}

// ============================================================================
// Log levels
// ============================================================================

const LEVEL_COLORS: Record<LogLevel, ColorName> = {
	debug: 'gray',
	info: 'blue',
	warn: 'yellow',
	error: 'red',
}

/**
 * Color text by severity: debug gray, info blue, warn yellow, error red.
 */
export function colorLevel(level: LogLevel, text: string): string {
	return color(LEVEL_COLORS[level], text)
}

// ============================================================================
// Terminal detection
// ============================================================================

/** The part of a stream color detection looks at */
export interface TerminalStream {
	isTTY?: boolean
}

/**
 * Check if a stream supports colors
 *
 * NO_COLOR (https://no-color.org/) wins over FORCE_COLOR, which wins over
 * TTY detection.
 */
export function supportsColor(
	stream: TerminalStream = process.stdout,
	env: Record<string, string | undefined> = process.env,
): boolean {
	if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') return false
	if (env.FORCE_COLOR !== undefined) return env.FORCE_COLOR !== '0'
	return stream.isTTY ?? false
}
