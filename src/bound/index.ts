/**
 * Storage bounding: size-triggered rotation and culling.
 *
 * @module bound
 */

export { type CullOutcome, cullIndexedStore } from './cull.js'
export {
	type BoundOptions,
	type BoundResult,
	type Compaction,
	compact,
	enforceBound,
} from './enforcer.js'
export {
	claimGenerationPath,
	formatGenerationStamp,
	type Generation,
	generationPath,
	listGenerations,
} from './naming.js'
export {
	pruneGenerations,
	type RotateOptions,
	type RotateOutcome,
	rotateAppendStore,
} from './rotate.js'
