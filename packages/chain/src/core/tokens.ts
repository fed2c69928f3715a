/**
 * Token vocabulary shared by the tokenizer and the generator.
 */

/** A token is a plain string: a word, a punctuation mark, or NEWLINE. */
export type Token = string

export const PUNCTUATION = ['.', ',', '!', '?'] as const

export type Punctuation = (typeof PUNCTUATION)[number]

/** Line-break marker, only produced when the tokenizer runs with `lineBreaks`. */
export const NEWLINE = '\n'

const punctuationSet: ReadonlySet<string> = new Set(PUNCTUATION)

export function isPunctuation(token: Token): token is Punctuation {
	return punctuationSet.has(token)
}

/**
 * Tokens exempt from the repetition check. They are never added to the used
 * set and are rendered without a space in front of them.
 */
export function isExempt(token: Token): boolean {
	return token === NEWLINE || isPunctuation(token)
}
