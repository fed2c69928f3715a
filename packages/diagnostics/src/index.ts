/**
 * @versechain/diagnostics
 *
 * Diagnostic catalog shared by the chain library and the CLI.
 */

export {
	CHAIN_DIAGNOSTICS,
	type ChainDiagnosticCode,
	VCBUILD001,
	VCCACHE001,
	VCCACHE002,
	VCCACHE003,
	VCGEN001,
	VCGEN002,
	VCIO001,
	VCIO002,
} from './chain.ts'
export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	VCCLI001,
	VCCLI002,
	VCCLI003,
	VCCLI004,
	VCCLI005,
} from './cli.ts'
export { interpolateMessage } from './interpolate.ts'
export { type DiagnosticArgs, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

import { CHAIN_DIAGNOSTICS } from './chain.ts'
import { CLI_DIAGNOSTICS } from './cli.ts'

export const DIAGNOSTICS = {
	...CHAIN_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

export type DiagnosticCode = keyof typeof DIAGNOSTICS

export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}
