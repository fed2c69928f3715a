import {
	ChainContext,
	ChainError,
	DiagnosticSeverity,
	getErrorMessage,
	type LoadedTable,
	NEWLINE,
	type TableSummary,
} from '@versechain/chain'
import {
	type CliDiagnosticCode,
	type DiagnosticArgs,
	getDiagnostic,
	interpolateMessage,
} from '@versechain/diagnostics'
import { formatDuration } from './progress.ts'

/** The ace logger methods diagnostics are written through. */
export interface DiagnosticLogger {
	warning(message: string): void
	error(message: string): void
}

const POSITIVE_INTEGER = /^[1-9]\d*$/
const INTEGER = /^-?\d+$/

function formatCliDiagnostic(code: CliDiagnosticCode, args?: DiagnosticArgs): string {
	return `[${code}] ${interpolateMessage(getDiagnostic(code).message, args)}`
}

function parsePositiveInteger(value: string): number | undefined {
	const trimmed = value.trim()
	if (!POSITIVE_INTEGER.test(trimmed)) return undefined
	const parsed = Number(trimmed)
	return Number.isSafeInteger(parsed) ? parsed : undefined
}

export function parseLength(value: string): number | undefined {
	return parsePositiveInteger(value)
}

export function parseTop(value: string): number | undefined {
	return parsePositiveInteger(value)
}

/** Seeds are any safe integer; the random source keeps the low 32 bits. */
export function parseSeed(value: string): number | undefined {
	const trimmed = value.trim()
	if (!INTEGER.test(trimmed)) return undefined
	const parsed = Number(trimmed)
	return Number.isSafeInteger(parsed) ? parsed : undefined
}

export function formatInvalidLengthError(value: string): string {
	return formatCliDiagnostic('VCCLI001', { value })
}

export function formatEmptyStartWordError(): string {
	return formatCliDiagnostic('VCCLI002')
}

export function formatInvalidSeedError(value: string): string {
	return formatCliDiagnostic('VCCLI003', { value })
}

export function formatInvalidTopError(value: string): string {
	return formatCliDiagnostic('VCCLI005', { value })
}

export function formatUnexpectedError(error: unknown): string {
	return formatCliDiagnostic('VCCLI004', { reason: getErrorMessage(error) })
}

export function logDiagnostics(logger: DiagnosticLogger, context: ChainContext): void {
	for (const diagnostic of context.getDiagnostics()) {
		const text = context.formatDiagnostic(diagnostic)
		if (diagnostic.def.severity === DiagnosticSeverity.Error) {
			logger.error(text)
		} else {
			logger.warning(text)
		}
	}
}

/**
 * Run one pipeline call with a fresh context and log whatever it recorded.
 * Returns null if it threw; a ChainError's cause is already among the
 * logged diagnostics.
 */
export function runChain<T>(logger: DiagnosticLogger, fn: (context: ChainContext) => T): T | null {
	const context = new ChainContext()
	try {
		const result = fn(context)
		logDiagnostics(logger, context)
		return result
	} catch (error: unknown) {
		logDiagnostics(logger, context)
		if (!(error instanceof ChainError) || error.diagnostic === undefined) {
			logger.error(formatUnexpectedError(error))
		}
		return null
	}
}

export function describeLoaded(loaded: LoadedTable): string {
	const words = loaded.table.size()
	const { source } = loaded
	if (source.kind === 'cache') {
		return `Loaded ${words} words from ${source.path} (${source.byteLength} bytes)`
	}

	const built = `Built ${words} words from ${source.lineCount} line(s), ${source.tokenCount} tokens in ${formatDuration(source.elapsedMs)}`
	if (source.saved?.saved === true) {
		return `${built}, cache written (${source.saved.byteLength} bytes)`
	}
	return built
}

function displayToken(token: string): string {
	return token === NEWLINE ? '\\n' : token
}

export function formatSummary(summary: TableSummary): string[] {
	const lines = [
		`${summary.size} words, ${summary.transitions} transitions`,
		`capacity ${summary.capacity}, load factor ${summary.loadFactor.toFixed(2)}`,
	]
	if (summary.topWords.length === 0) return lines

	lines.push('')
	summary.topWords.forEach((entry, index) => {
		const followers = entry.topFollowers
			.map((follower) => `${displayToken(follower.word)} ${follower.count}`)
			.join(', ')
		lines.push(
			`${index + 1}. ${displayToken(entry.word)} (${entry.occurCount}, ${entry.distinctFollowers} distinct): ${followers}`
		)
	})
	return lines
}
