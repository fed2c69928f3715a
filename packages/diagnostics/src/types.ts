/**
 * Severity of a diagnostic. Errors abort the pipeline, warnings are reported
 * and the run continues.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Entry in the diagnostic catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	/** Short template, `{name}` placeholders are filled from DiagnosticArgs */
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

export type DiagnosticArgs = Record<string, string | number>
