import { noProgress, type ProgressFactory } from '../core/progress.ts'
import type { Token } from '../core/tokens.ts'
import { TransitionTable } from '../table/transition-table.ts'
import { WordFreqInfo } from '../table/word-freq-info.ts'

export type ChainTable = TransitionTable<WordFreqInfo>

export interface BuildOptions {
	progress?: ProgressFactory
	maxLoadFactor?: number
}

/** Roughly one distinct word per ten tokens in running text. */
const TOKENS_PER_WORD_ESTIMATE = 10

export function estimateCapacity(tokenCount: number): number {
	return Math.ceil(tokenCount / TOKENS_PER_WORD_ESTIMATE)
}

/**
 * Build the first-order chain: for every adjacent pair (t[i], t[i+1]) record
 * t[i+1] as a follower of t[i]. The final token only gets a record if it
 * also appears earlier as a predecessor.
 */
export function buildChain(tokens: readonly Token[], options: BuildOptions = {}): ChainTable {
	const table: ChainTable = new TransitionTable({
		initialCapacity: estimateCapacity(tokens.length),
		...(options.maxLoadFactor !== undefined ? { maxLoadFactor: options.maxLoadFactor } : {}),
	})
	const pairs = Math.max(tokens.length - 1, 0)
	const progress = (options.progress ?? noProgress)('Hashing', pairs)

	for (let i = 0; i < pairs; i++) {
		const word = tokens[i]
		const next = tokens[i + 1]
		if (word === undefined || next === undefined) break

		let info = table.find(word)
		if (info === undefined) {
			info = new WordFreqInfo(word)
			table.insert(word, info)
		}
		info.updateFollows(next)
		progress.increment()
	}
	progress.finish()

	return table
}
