import assert from 'node:assert'
import { describe, it } from 'node:test'
import { buildChain } from '../../src/build/builder.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'
import { summarizeTable } from '../../src/table/summary.ts'
import { TransitionTable } from '../../src/table/transition-table.ts'
import type { WordFreqInfo } from '../../src/table/word-freq-info.ts'

describe('table/summarizeTable', () => {
	const table = buildChain(tokenize('The cat sat. The dog ran.').tokens)

	it('should report size, capacity and transition count', () => {
		const summary = summarizeTable(table, 3)
		assert.strictEqual(summary.size, 6)
		assert.strictEqual(summary.capacity, 16)
		assert.strictEqual(summary.loadFactor, 0.375)
		assert.strictEqual(summary.transitions, 7)
	})

	it('should rank words by occurrences, then alphabetically', () => {
		const summary = summarizeTable(table, 3)
		assert.deepStrictEqual(
			summary.topWords.map((entry) => entry.word),
			['the', '.', 'cat']
		)
	})

	it('should list the top followers of each word', () => {
		const [first] = summarizeTable(table, 1).topWords
		assert.deepStrictEqual(first, {
			distinctFollowers: 2,
			occurCount: 2,
			topFollowers: [
				{ count: 1, word: 'cat' },
				{ count: 1, word: 'dog' },
			],
			word: 'the',
		})
	})

	it('should cap followers at the limit', () => {
		const busy = buildChain(['a', 'b', 'a', 'c', 'a', 'c', 'a', 'd'])
		const [first] = summarizeTable(busy, 1, 1).topWords
		assert.deepStrictEqual(first?.topFollowers, [{ count: 2, word: 'c' }])
		assert.strictEqual(first?.distinctFollowers, 3)
	})

	it('should summarize an empty table', () => {
		const summary = summarizeTable(new TransitionTable<WordFreqInfo>(), 10)
		assert.deepStrictEqual(summary, {
			capacity: 8,
			loadFactor: 0,
			size: 0,
			topWords: [],
			transitions: 0,
		})
	})
})
