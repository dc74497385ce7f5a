/**
 * Configuration resolution: explicit options, then environment, then
 * defaults.
 *
 * Environment values come from whatever launched the process, so a bad one
 * is logged and replaced by the default. Explicit options come from the
 * caller's own code and raise `INVALID_CONFIG` instead.
 */

import path from 'node:path'
import { z } from 'zod'
import { SpillError } from '../errors/index.js'
import { getSpillLogger } from '../logging/logger.js'
import { type BackendKind, inferBackendKind } from '../store/index.js'
import {
	DEFAULT_DESTINATION,
	DEFAULT_KEEP,
	DEFAULT_MAX_SIZE,
	DEFAULT_TOOL,
	ENV_BACKEND,
	ENV_DESTINATION,
	ENV_KEEP,
	ENV_MAX_SIZE,
} from './defaults.js'

const logger = getSpillLogger('config')

const backendSchema = z.enum(['append', 'indexed'])
const sizeSchema = z.number().int().min(0)

const optionsSchema = z.object({
	tool: z.string().min(1).optional(),
	destination: z.string().min(1).nullable().optional(),
	backend: backendSchema.optional(),
	maxSize: sizeSchema.optional(),
	keep: sizeSchema.optional(),
	cwd: z.string().min(1).optional(),
})

const envSizeSchema = z.coerce.number().int().min(0)

export type Environment = Record<string, string | undefined>

/**
 * Inputs to {@link resolveConfig}. Everything is optional.
 */
export interface ConfigOptions {
	/** Name prefixed to every stderr line and stored on every record. */
	tool?: string
	/**
	 * Store path, resolved against `cwd`. `null` turns persistence off and
	 * leaves only the stderr line.
	 */
	destination?: string | null
	/** Overrides inference from the destination's extension. */
	backend?: BackendKind
	/** Bytes; 0 disables rotation and culling. */
	maxSize?: number
	keep?: number
	/** Defaults to `process.env`. */
	env?: Environment
	/** Defaults to `process.cwd()`. */
	cwd?: string
}

export interface ResolvedConfig {
	tool: string
	/** Absolute path, or null when persistence is disabled. */
	destination: string | null
	backend: BackendKind | null
	maxSize: number
	keep: number
}

export function resolveConfig(options: ConfigOptions = {}): ResolvedConfig {
	const parsed = optionsSchema.safeParse({
		tool: options.tool,
		destination: options.destination,
		backend: options.backend,
		maxSize: options.maxSize,
		keep: options.keep,
		cwd: options.cwd,
	})
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
			.join('; ')
		throw new SpillError(`Invalid configuration: ${issues}`, 'INVALID_CONFIG', {
			fields: parsed.error.issues.map((issue) => issue.path.join('.')),
		})
	}

	const explicit = parsed.data
	const env = options.env ?? process.env
	const cwd = explicit.cwd ?? process.cwd()

	const destination = resolveDestination(explicit.destination, env, cwd)

	return {
		tool: explicit.tool ?? DEFAULT_TOOL,
		destination,
		backend:
			destination === null
				? null
				: (explicit.backend ??
					readEnv(env, ENV_BACKEND, backendSchema) ??
					inferBackendKind(destination)),
		maxSize:
			explicit.maxSize ??
			readEnv(env, ENV_MAX_SIZE, envSizeSchema) ??
			DEFAULT_MAX_SIZE,
		keep: explicit.keep ?? readEnv(env, ENV_KEEP, envSizeSchema) ?? DEFAULT_KEEP,
	}
}

function resolveDestination(
	explicit: string | null | undefined,
	env: Environment,
	cwd: string,
): string | null {
	if (explicit === null) return null
	const chosen =
		explicit ?? readEnv(env, ENV_DESTINATION, z.string()) ?? DEFAULT_DESTINATION
	return path.resolve(cwd, chosen)
}

/**
 * Read one variable through its schema. Unset and blank mean "not
 * configured"; an invalid value is logged and ignored.
 */
function readEnv<T>(
	env: Environment,
	name: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T | undefined {
	const raw = env[name]
	if (raw === undefined || raw.trim() === '') return undefined

	const result = schema.safeParse(raw)
	if (!result.success) {
		logger.warn('Ignoring invalid {name}={value}', { name, value: raw })
		return undefined
	}
	return result.data
}
