/**
 * Transition store: the hash table and the per-word records it holds.
 */

export { fnv1a, isPowerOfTwo, nextPowerOfTwo, probeSequence } from './hash.ts'
export {
	type FollowerCount,
	summarizeTable,
	type TableSummary,
	type WordSummary,
} from './summary.ts'
export {
	DEFAULT_MAX_LOAD_FACTOR,
	MIN_CAPACITY,
	type Slot,
	SlotState,
	TableInvariantError,
	TransitionTable,
	type TransitionTableOptions,
} from './transition-table.ts'
export { WordFreqInfo } from './word-freq-info.ts'
