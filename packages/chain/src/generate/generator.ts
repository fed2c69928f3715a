import type { ChainTable } from '../build/builder.ts'
import type { ChainContext } from '../core/context.ts'
import { noProgress, type ProgressFactory } from '../core/progress.ts'
import { isExempt, NEWLINE, type Token } from '../core/tokens.ts'
import type { WordFreqInfo } from '../table/word-freq-info.ts'
import { type RandomSource, randomIndex } from './random.ts'

export const DEFAULT_MAX_ATTEMPTS = 50

export interface GenerateOptions {
	startWord: string
	/** Number of tokens to emit, a positive integer */
	length: number
	random?: RandomSource
	/** Samples drawn per step while looking for an unused follower */
	maxAttempts?: number
	progress?: ProgressFactory
}

export interface Poem {
	text: string
	/** Tokens in the order they were emitted */
	tokens: Token[]
	stoppedEarly: boolean
	/** The word with no record that ended the walk, if any */
	missingWord: string | undefined
}

export interface SamplingState {
	readonly used: Set<Token>
	readonly random: RandomSource
	readonly maxAttempts: number
}

function validateOptions(options: GenerateOptions): void {
	if (!Number.isInteger(options.length) || options.length < 1) {
		throw new RangeError(`poem length must be a positive integer, got ${options.length}`)
	}
	const attempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
	if (!Number.isInteger(attempts) || attempts < 1) {
		throw new RangeError(`maxAttempts must be a positive integer, got ${attempts}`)
	}
}

/**
 * Draw a follower, re-drawing while it was already used. Punctuation and
 * NEWLINE are taken immediately. After maxAttempts draws the last candidate
 * is taken even if it repeats.
 */
export function sampleFollower(info: WordFreqInfo, state: SamplingState): Token {
	const count = info.occurCount()
	let candidate = info.followWordAt(randomIndex(state.random, count))
	for (let attempt = 1; attempt < state.maxAttempts; attempt++) {
		if (isExempt(candidate) || !state.used.has(candidate)) break
		candidate = info.followWordAt(randomIndex(state.random, count))
	}
	return candidate
}

/**
 * Separator after `current`. Exempt tokens sit directly after the previous
 * token, nothing follows the last token, and a NEWLINE already separates.
 */
function separatorAfter(current: Token, next: Token, isLast: boolean): string {
	if (isLast || isExempt(next) || current === NEWLINE) return ''
	return ' '
}

/**
 * Random walk over the chain starting at `startWord`.
 *
 * Each step emits the current word and moves to a follower sampled in
 * proportion to how often it followed the current word in the corpus,
 * preferring words not yet used in this poem. Reaching a word with no
 * record emits VCGEN001 and ends the poem early; what was written so far
 * is still returned.
 */
export function generatePoem(
	context: ChainContext,
	table: ChainTable,
	options: GenerateOptions
): Poem {
	validateOptions(options)
	const state: SamplingState = {
		maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
		random: options.random ?? Math.random,
		used: new Set(),
	}
	const progress = (options.progress ?? noProgress)('Writing', options.length)
	const parts: string[] = []
	const tokens: Token[] = []
	let current = options.startWord
	let stoppedEarly = false
	let missingWord: string | undefined

	for (let step = 0; step < options.length; step++) {
		const info = table.find(current)
		if (info === undefined) {
			context.emit('VCGEN001', { emitted: tokens.length, word: current })
			missingWord = current
			stoppedEarly = true
			break
		}
		if (info.occurCount() === 0) {
			context.emit('VCGEN002', { word: current })
			stoppedEarly = true
			break
		}

		const next = sampleFollower(info, state)
		parts.push(current, separatorAfter(current, next, step === options.length - 1))
		tokens.push(current)
		if (!isExempt(current)) state.used.add(current)

		current = next
		progress.increment()
	}
	progress.finish()

	return { missingWord, stoppedEarly, text: parts.join(''), tokens }
}
