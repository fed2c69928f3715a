/**
 * versechain: first-order word Markov chain poetry.
 *
 * - Tokens feed a hash table keyed by word (open addressing,
 *   triangular-number probing)
 * - Each record keeps every follower it has seen, duplicates included
 * - The built table is cached to a versioned binary file
 * - Poems are random walks that avoid repeating words where they can
 */

import { ChainContext, type Diagnostic } from './core/context.ts'
import { type GenerateOptions, generatePoem, type Poem } from './generate/generator.ts'
import { type LoadedTable, type LoadTableOptions, loadOrBuildTable } from './load.ts'

export { type BuildOptions, buildChain, type ChainTable, estimateCapacity } from './build/index.ts'
export {
	CACHE_MAGIC,
	CACHE_VERSION,
	CacheFormatError,
	type CacheLoadResult,
	type CacheOptions,
	type CacheSaveResult,
	DEFAULT_CACHE_PATH,
	type DecodedChain,
	decodeChain,
	encodeChain,
	loadCache,
	saveCache,
} from './cache/index.ts'
export {
	ChainContext,
	ChainError,
	type Diagnostic,
	type DiagnosticCode,
	DiagnosticSeverity,
	getErrorMessage,
	isExempt,
	isNodeError,
	isPunctuation,
	NEWLINE,
	noProgress,
	type ProgressFactory,
	type ProgressSink,
	PUNCTUATION,
	type Punctuation,
	type Token,
} from './core/index.ts'
export {
	createSeededRandom,
	DEFAULT_MAX_ATTEMPTS,
	type GenerateOptions,
	generatePoem,
	type Poem,
	type RandomSource,
	randomIndex,
	type SamplingState,
	sampleFollower,
} from './generate/index.ts'
export {
	normalizeWord,
	splitLines,
	type TokenizeOptions,
	type TokenizeResult,
	tokenize,
	tokenizeLine,
} from './lex/index.ts'
export {
	DEFAULT_CORPUS_PATH,
	type LoadedTable,
	type LoadTableOptions,
	loadCorpus,
	loadOrBuildTable,
	type TableSource,
} from './load.ts'
export {
	DEFAULT_MAX_LOAD_FACTOR,
	type FollowerCount,
	fnv1a,
	isPowerOfTwo,
	MIN_CAPACITY,
	nextPowerOfTwo,
	probeSequence,
	type Slot,
	SlotState,
	summarizeTable,
	type TableSummary,
	TableInvariantError,
	TransitionTable,
	type TransitionTableOptions,
	WordFreqInfo,
	type WordSummary,
} from './table/index.ts'

export interface WritePoemOptions extends LoadTableOptions, GenerateOptions {}

export interface WritePoemResult {
	poem: Poem
	loaded: LoadedTable
	diagnostics: readonly Diagnostic[]
}

/**
 * Load (or build) the chain and write one poem.
 *
 * This chains the stages:
 * 1. Cache lookup, falling back to tokenizing and building from the corpus
 * 2. Cache write after a build
 * 3. The generation walk
 *
 * Warnings (unusable cache, start word not found) are returned in
 * `diagnostics`; they do not fail the call.
 *
 * @throws {ChainError} If no table can be loaded or built
 */
export function writePoem(
	options: WritePoemOptions,
	context: ChainContext = new ChainContext()
): WritePoemResult {
	const loaded = loadOrBuildTable(context, options)
	const poem = generatePoem(context, loaded.table, options)
	return { diagnostics: context.getDiagnostics(), loaded, poem }
}
