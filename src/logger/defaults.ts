/** Rotation/cull threshold when neither option nor environment sets one: 10 MiB. */
export const DEFAULT_MAX_SIZE = 10 * 1024 * 1024

/** Rotated generations retained by the append store. */
export const DEFAULT_KEEP = 5

export const DEFAULT_TOOL = 'unknown'

/** Relative to the working directory at configure time. */
export const DEFAULT_DESTINATION = '.state/spill/spill.db'

export const ENV_DESTINATION = 'SPILL_DB'
export const ENV_BACKEND = 'SPILL_BACKEND'
export const ENV_MAX_SIZE = 'SPILL_MAX_SIZE'
export const ENV_KEEP = 'SPILL_KEEP'
