/**
 * Shared pieces used by every stage: diagnostics, tokens and progress.
 */

export { ChainContext, ChainError, type Diagnostic, getErrorMessage, isNodeError } from './context.ts'
export { type DiagnosticCode, DiagnosticSeverity, getDiagnostic } from './diagnostics.ts'
export { noProgress, type ProgressFactory, type ProgressSink } from './progress.ts'
export {
	isExempt,
	isPunctuation,
	NEWLINE,
	PUNCTUATION,
	type Punctuation,
	type Token,
} from './tokens.ts'
