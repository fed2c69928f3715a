import assert from 'node:assert'
import { describe, it } from 'node:test'
import { buildChain, ChainError, type TableSummary } from '@versechain/chain'
import {
	type DiagnosticLogger,
	describeLoaded,
	formatEmptyStartWordError,
	formatInvalidLengthError,
	formatInvalidSeedError,
	formatInvalidTopError,
	formatSummary,
	formatUnexpectedError,
	parseLength,
	parseSeed,
	parseTop,
	runChain,
} from '../src/utils.ts'

class RecordingLogger implements DiagnosticLogger {
	readonly lines: string[] = []

	warning(message: string): void {
		this.lines.push(`warning: ${message}`)
	}

	error(message: string): void {
		this.lines.push(`error: ${message}`)
	}
}

describe('parseLength', () => {
	it('should accept positive integers', () => {
		assert.strictEqual(parseLength('40'), 40)
		assert.strictEqual(parseLength(' 7 '), 7)
	})

	it('should reject everything else', () => {
		for (const value of ['', '0', '-3', '2.5', 'ten', '1e3', '007']) {
			assert.strictEqual(parseLength(value), undefined, value)
		}
	})

	it('should reject integers beyond the safe range', () => {
		assert.strictEqual(parseLength('9007199254740993'), undefined)
	})
})

describe('parseTop', () => {
	it('should share the positive integer rule', () => {
		assert.strictEqual(parseTop('10'), 10)
		assert.strictEqual(parseTop('0'), undefined)
	})
})

describe('parseSeed', () => {
	it('should accept any integer', () => {
		assert.strictEqual(parseSeed('42'), 42)
		assert.strictEqual(parseSeed('-1'), -1)
		assert.strictEqual(parseSeed('0'), 0)
	})

	it('should reject non-integers', () => {
		assert.strictEqual(parseSeed('4.2'), undefined)
		assert.strictEqual(parseSeed('seed'), undefined)
		assert.strictEqual(parseSeed(''), undefined)
	})
})

describe('error formatting', () => {
	it('should prefix CLI errors with their code', () => {
		assert.strictEqual(formatInvalidLengthError('ten'), '[VCCLI001] invalid length "ten"')
		assert.strictEqual(formatEmptyStartWordError(), '[VCCLI002] start word is empty')
		assert.strictEqual(formatInvalidSeedError('x'), '[VCCLI003] invalid seed "x"')
		assert.strictEqual(formatInvalidTopError('-1'), '[VCCLI005] invalid --top value "-1"')
	})

	it('should wrap unexpected errors', () => {
		assert.strictEqual(
			formatUnexpectedError(new Error('boom')),
			'[VCCLI004] generation failed: boom'
		)
		assert.strictEqual(formatUnexpectedError('plain'), '[VCCLI004] generation failed: plain')
	})
})

describe('runChain', () => {
	it('should return the result and log warnings', () => {
		const logger = new RecordingLogger()
		const result = runChain(logger, (context) => {
			context.emit('VCGEN001', { emitted: 0, word: 'moon' })
			return 'done'
		})

		assert.strictEqual(result, 'done')
		assert.deepStrictEqual(logger.lines, [
			'warning: warning[VCGEN001]: word "moon" not found in table, stopping after 0 word(s)\n' +
				'   = help: Start from a word that occurs in the corpus, or ask for a shorter poem.',
		])
	})

	it('should log a pipeline error once and return null', () => {
		const logger = new RecordingLogger()
		const result = runChain(logger, (context) => {
			context.emit('VCBUILD001', { count: 0 })
			throw context.toError('corpus too small')
		})

		assert.strictEqual(result, null)
		assert.deepStrictEqual(logger.lines, [
			'error: error[VCBUILD001]: corpus produced 0 token(s), need at least 2\n' +
				'   = help: Point `--corpus` at a file with some text in it.',
		])
	})

	it('should report errors that carry no diagnostic', () => {
		const logger = new RecordingLogger()
		const result = runChain(logger, () => {
			throw new ChainError('bare')
		})
		assert.strictEqual(result, null)
		assert.deepStrictEqual(logger.lines, ['error: [VCCLI004] generation failed: bare'])
	})

	it('should report unexpected exceptions', () => {
		const logger = new RecordingLogger()
		const result = runChain(logger, () => {
			throw new TypeError('broken')
		})
		assert.strictEqual(result, null)
		assert.deepStrictEqual(logger.lines, ['error: [VCCLI004] generation failed: broken'])
	})
})

describe('describeLoaded', () => {
	const table = buildChain(['a', 'b', 'a', 'c'])

	it('should describe a cache hit', () => {
		const text = describeLoaded({
			source: { byteLength: 120, kind: 'cache', path: 'chain.ser' },
			table,
		})
		assert.strictEqual(text, 'Loaded 2 words from chain.ser (120 bytes)')
	})

	it('should describe a build that wrote the cache', () => {
		const text = describeLoaded({
			source: {
				elapsedMs: 12,
				kind: 'corpus',
				lineCount: 3,
				saved: { byteLength: 64, saved: true },
				tokenCount: 4,
			},
			table,
		})
		assert.strictEqual(
			text,
			'Built 2 words from 3 line(s), 4 tokens in 12ms, cache written (64 bytes)'
		)
	})

	it('should describe a build without a cache', () => {
		const text = describeLoaded({
			source: { elapsedMs: 1500, kind: 'corpus', lineCount: 1, saved: null, tokenCount: 4 },
			table,
		})
		assert.strictEqual(text, 'Built 2 words from 1 line(s), 4 tokens in 1.5s')
	})
})

describe('formatSummary', () => {
	it('should list statistics then ranked words', () => {
		const summary: TableSummary = {
			capacity: 16,
			loadFactor: 0.25,
			size: 4,
			topWords: [
				{
					distinctFollowers: 2,
					occurCount: 3,
					topFollowers: [
						{ count: 2, word: 'sea' },
						{ count: 1, word: '\n' },
					],
					word: 'the',
				},
			],
			transitions: 9,
		}
		assert.deepStrictEqual(formatSummary(summary), [
			'4 words, 9 transitions',
			'capacity 16, load factor 0.25',
			'',
			'1. the (3, 2 distinct): sea 2, \\n 1',
		])
	})

	it('should stop after the statistics for an empty table', () => {
		const summary: TableSummary = {
			capacity: 8,
			loadFactor: 0,
			size: 0,
			topWords: [],
			transitions: 0,
		}
		assert.deepStrictEqual(formatSummary(summary), [
			'0 words, 0 transitions',
			'capacity 8, load factor 0.00',
		])
	})
})
