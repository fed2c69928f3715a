/**
 * Diagnostic collection shared by every stage of the pipeline.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'

export interface Diagnostic {
	/** The definition from the catalog */
	readonly def: DiagnosticDef
	/** Message with arguments applied */
	readonly message: string
	readonly args?: DiagnosticArgs
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/**
 * Thrown by the pipeline once an error diagnostic has been emitted.
 * The message is the formatted first error.
 */
export class ChainError extends Error {
	readonly diagnostic: Diagnostic | undefined

	constructor(message: string, diagnostic?: Diagnostic) {
		super(message)
		this.name = 'ChainError'
		this.diagnostic = diagnostic
	}
}

/**
 * Passed through loading, building and generation. The library never logs:
 * stages record what went wrong here and the caller decides how to show it.
 */
export class ChainContext {
	private readonly diagnostics: Diagnostic[] = []
	private errorCount = 0

	emit(code: DiagnosticCode, args?: DiagnosticArgs): Diagnostic {
		const def = getDiagnostic(code)
		const diagnostic: Diagnostic = {
			def,
			message: interpolateMessage(def.message, args),
			...(args ? { args } : {}),
		}
		this.diagnostics.push(diagnostic)
		if (def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
		return diagnostic
	}

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getWarnings(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Warning)
	}

	/**
	 * ChainError for the first recorded error, or `fallback` if none was recorded.
	 */
	toError(fallback: string): ChainError {
		const first = this.getErrors()[0]
		if (first === undefined) return new ChainError(fallback)
		return new ChainError(this.formatDiagnostic(first), first)
	}

	/**
	 * Format a diagnostic for display.
	 *
	 * Example:
	 * ```
	 * warning[VCGEN001]: word "moon" not found in table, stopping after 3 word(s)
	 *    = help: Start from a word that occurs in the corpus, or ask for a shorter poem.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const label = def.severity === DiagnosticSeverity.Error ? 'error' : 'warning'
		const header = `${label}[${def.code}]: ${diagnostic.message}`
		if (def.suggestion === undefined) return header

		const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
		return `${header}\n   = help: ${suggestion}`
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
