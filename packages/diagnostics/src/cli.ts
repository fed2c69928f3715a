/**
 * CLI diagnostic definitions.
 *
 * Error code format: VCCLI<NUMBER>
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

export const VCCLI001: DiagnosticDef = {
	code: 'VCCLI001',
	description: 'The poem length must be a whole number of words.',
	message: 'invalid length "{value}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass a positive integer, for example `versechain write night 40`.',
}

export const VCCLI002: DiagnosticDef = {
	code: 'VCCLI002',
	description: 'A walk needs a word to start from.',
	message: 'start word is empty',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Type a word that appears in the corpus.',
}

export const VCCLI003: DiagnosticDef = {
	code: 'VCCLI003',
	description: 'The seed drives the random source and must be an integer.',
	message: 'invalid seed "{value}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass an integer such as `--seed 42`, or leave it out.',
}

export const VCCLI004: DiagnosticDef = {
	code: 'VCCLI004',
	description: 'Something unexpected went wrong while writing the poem.',
	message: 'generation failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Retry with `--rebuild`, or report this if it seems like a bug.',
}

export const VCCLI005: DiagnosticDef = {
	code: 'VCCLI005',
	description: 'The summary can only list a positive number of words.',
	message: 'invalid --top value "{value}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass a positive integer such as `--top 10`.',
}

export const CLI_DIAGNOSTICS = {
	VCCLI001,
	VCCLI002,
	VCCLI003,
	VCCLI004,
	VCCLI005,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
