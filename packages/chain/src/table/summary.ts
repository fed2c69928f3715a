import type { Token } from '../core/tokens.ts'
import type { TransitionTable } from './transition-table.ts'
import type { WordFreqInfo } from './word-freq-info.ts'

export interface FollowerCount {
	word: Token
	count: number
}

export interface WordSummary {
	word: string
	occurCount: number
	distinctFollowers: number
	topFollowers: FollowerCount[]
}

export interface TableSummary {
	size: number
	capacity: number
	loadFactor: number
	/** Sum of occurCount over all records */
	transitions: number
	topWords: WordSummary[]
}

interface Counted {
	count: number
	word: string
}

function byCountThenWord(a: Counted, b: Counted): number {
	if (a.count !== b.count) return b.count - a.count
	return a.word < b.word ? -1 : a.word > b.word ? 1 : 0
}

function summarizeWord(info: WordFreqInfo, followerLimit: number): WordSummary {
	const followers = [...info.followCounts()].map(([word, count]) => ({ count, word }))
	followers.sort(byCountThenWord)
	return {
		distinctFollowers: followers.length,
		occurCount: info.occurCount(),
		topFollowers: followers.slice(0, followerLimit),
		word: info.word,
	}
}

/**
 * Size statistics plus the `top` most frequent predecessor words.
 * Ties are broken alphabetically so the output is stable across runs.
 */
export function summarizeTable(
	table: TransitionTable<WordFreqInfo>,
	top: number,
	followerLimit = 5
): TableSummary {
	const ranked: Array<Counted & { info: WordFreqInfo }> = []
	let transitions = 0
	for (const [word, info] of table) {
		transitions += info.occurCount()
		ranked.push({ count: info.occurCount(), info, word })
	}
	ranked.sort(byCountThenWord)

	return {
		capacity: table.capacity(),
		loadFactor: table.loadFactor(),
		size: table.size(),
		topWords: ranked.slice(0, top).map((entry) => summarizeWord(entry.info, followerLimit)),
		transitions,
	}
}
