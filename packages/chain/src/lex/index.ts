/**
 * Lexical analysis: corpus text to a flat token sequence.
 */

export {
	normalizeWord,
	splitLines,
	type TokenizeOptions,
	type TokenizeResult,
	tokenize,
	tokenizeLine,
} from './tokenizer.ts'
