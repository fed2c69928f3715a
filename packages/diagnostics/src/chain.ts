/**
 * Chain diagnostic definitions.
 *
 * Error code format: VC<STAGE><NUMBER>
 * - VCIO: corpus input (001-099)
 * - VCBUILD: chain construction (001-099)
 * - VCCACHE: persistence cache (001-099)
 * - VCGEN: poem generation (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CORPUS INPUT (VCIO001-099)
// =============================================================================

export const VCIO001: DiagnosticDef = {
	code: 'VCIO001',
	description: 'There is no corpus file at this path, so no chain can be built.',
	message: 'corpus not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Run the corpus cleaning step first, or pass `--corpus <file>`.',
}

export const VCIO002: DiagnosticDef = {
	code: 'VCIO002',
	description: 'The corpus file exists but could not be opened.',
	message: 'cannot read corpus {path}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

// =============================================================================
// CHAIN CONSTRUCTION (VCBUILD001-099)
// =============================================================================

export const VCBUILD001: DiagnosticDef = {
	code: 'VCBUILD001',
	description: 'A chain needs at least one pair of adjacent tokens.',
	message: 'corpus produced {count} token(s), need at least 2',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Point `--corpus` at a file with some text in it.',
}

// =============================================================================
// PERSISTENCE CACHE (VCCACHE001-099)
// =============================================================================

export const VCCACHE001: DiagnosticDef = {
	code: 'VCCACHE001',
	description: 'The cached table could not be read, so it is rebuilt from the corpus.',
	message: 'ignoring unusable cache {path}: {reason}',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'The cache is rewritten after the rebuild. Delete the file if this repeats.',
}

export const VCCACHE002: DiagnosticDef = {
	code: 'VCCACHE002',
	description: 'The table was built but could not be saved. The next run rebuilds it.',
	message: 'cannot write cache {path}: {reason}',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Check that the cache directory is writable, or pass `--no-cache`.',
}

export const VCCACHE003: DiagnosticDef = {
	code: 'VCCACHE003',
	description: 'The cached table was tokenized with different options than this run asks for.',
	message: 'cache {path} was built with line breaks {cached}, requested {requested}',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'The table is rebuilt and the cache replaced.',
}

// =============================================================================
// GENERATION (VCGEN001-099)
// =============================================================================

export const VCGEN001: DiagnosticDef = {
	code: 'VCGEN001',
	description: 'The walk reached a word that never appears before another word in the corpus.',
	message: 'word "{word}" not found in table, stopping after {emitted} word(s)',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Start from a word that occurs in the corpus, or ask for a shorter poem.',
}

export const VCGEN002: DiagnosticDef = {
	code: 'VCGEN002',
	description: 'A record without followers was found. Records are only created with one.',
	message: 'record for "{word}" has no follow words',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rebuild the table with `--rebuild`. Report this if it persists.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CHAIN_DIAGNOSTICS = {
	// Construction
	VCBUILD001,
	// Cache
	VCCACHE001,
	VCCACHE002,
	VCCACHE003,
	// Generation
	VCGEN001,
	VCGEN002,
	// Input
	VCIO001,
	VCIO002,
} as const

export type ChainDiagnosticCode = keyof typeof CHAIN_DIAGNOSTICS
