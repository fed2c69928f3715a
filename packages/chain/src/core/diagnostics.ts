/**
 * Re-export diagnostic types and chain definitions from the shared package.
 */

import { CHAIN_DIAGNOSTICS } from '@versechain/diagnostics'

export {
	CHAIN_DIAGNOSTICS,
	type ChainDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
} from '@versechain/diagnostics'

export type DiagnosticCode = keyof typeof CHAIN_DIAGNOSTICS

export function getDiagnostic(code: DiagnosticCode): (typeof CHAIN_DIAGNOSTICS)[typeof code] {
	return CHAIN_DIAGNOSTICS[code]
}
