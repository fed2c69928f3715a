import { noProgress, type ProgressFactory } from '../core/progress.ts'
import { isPunctuation, NEWLINE, type Token } from '../core/tokens.ts'

export interface TokenizeOptions {
	/** Emit a NEWLINE token after every line */
	lineBreaks?: boolean
	progress?: ProgressFactory
}

export interface TokenizeResult {
	tokens: Token[]
	lineCount: number
}

const LINE_SPLIT = /\r\n|\r|\n/
const PUNCTUATION_CHARS = /[.,!?]/g

/**
 * Split source into lines ending in `\n`, `\r\n` or a lone `\r`. A trailing
 * line end does not start another line.
 */
export function splitLines(source: string): string[] {
	if (source.length === 0) return []
	const lines = source.split(LINE_SPLIT)
	if (lines[lines.length - 1] === '') lines.pop()
	return lines
}

function pushPiece(piece: string, tokens: Token[]): void {
	const word = piece.toLowerCase()
	const stripped = word.replace(PUNCTUATION_CHARS, '')
	if (stripped.length === word.length) {
		tokens.push(word)
		return
	}

	if (stripped.length > 0) tokens.push(stripped)
	for (const char of word) {
		if (isPunctuation(char)) tokens.push(char)
	}
}

/**
 * Tokenize a single line. Pieces are separated by single spaces, so runs of
 * spaces yield empty pieces, which are skipped.
 */
export function tokenizeLine(line: string, tokens: Token[] = []): Token[] {
	for (const piece of line.split(' ')) {
		if (piece.length === 0) continue
		pushPiece(piece, tokens)
	}
	return tokens
}

/**
 * Turn a corpus into a flat token sequence.
 *
 * Words are lower-cased. Each of `. , ! ?` inside a piece is split off into
 * its own token, after the stripped word, in the order it appeared.
 *
 * @example
 * tokenize('The cat sat. The dog ran.').tokens
 * // ['the', 'cat', 'sat', '.', 'the', 'dog', 'ran', '.']
 */
export function tokenize(source: string, options: TokenizeOptions = {}): TokenizeResult {
	const lines = splitLines(source)
	const progress = (options.progress ?? noProgress)('Reading', lines.length)
	const tokens: Token[] = []

	for (const line of lines) {
		tokenizeLine(line, tokens)
		if (options.lineBreaks === true) tokens.push(NEWLINE)
		progress.increment()
	}
	progress.finish()

	return { lineCount: lines.length, tokens }
}

/**
 * Normalize a user-supplied word the way the tokenizer normalizes corpus words.
 */
export function normalizeWord(input: string): string {
	return input.trim().toLowerCase()
}
