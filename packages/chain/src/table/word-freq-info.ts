import type { Token } from '../core/tokens.ts'

/**
 * Everything observed after one word: each occurrence appends its follower,
 * so a follower seen three times sits in the list three times and is three
 * times as likely to be sampled.
 *
 * Invariant: occurCount() === followWords().length
 */
export class WordFreqInfo {
	readonly word: string
	private readonly follows: Token[]

	constructor(word: string, follows: readonly Token[] = []) {
		this.word = word
		this.follows = [...follows]
	}

	updateFollows(next: Token): void {
		this.follows.push(next)
	}

	occurCount(): number {
		return this.follows.length
	}

	followWordAt(index: number): Token {
		const word = this.follows[index]
		if (word === undefined || !Number.isInteger(index)) {
			throw new RangeError(
				`follow index ${index} out of range for "${this.word}" (count ${this.follows.length})`
			)
		}
		return word
	}

	followWords(): readonly Token[] {
		return this.follows
	}

	/** Distinct followers with how often each was seen, in first-seen order. */
	followCounts(): Map<Token, number> {
		const counts = new Map<Token, number>()
		for (const word of this.follows) {
			counts.set(word, (counts.get(word) ?? 0) + 1)
		}
		return counts
	}
}
