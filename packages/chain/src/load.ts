import { readFileSync } from 'node:fs'
import { buildChain, type ChainTable } from './build/builder.ts'
import { type CacheSaveResult, loadCache, saveCache } from './cache/cache.ts'
import { type ChainContext, getErrorMessage, isNodeError } from './core/context.ts'
import type { ProgressFactory } from './core/progress.ts'
import { tokenize } from './lex/tokenizer.ts'

export const DEFAULT_CORPUS_PATH = 'data/combined_cleaned.txt'

export interface LoadTableOptions {
	corpusPath: string
	/** Cache file, or null to neither read nor write one */
	cachePath: string | null
	/** Skip reading the cache; it is still rewritten */
	rebuild?: boolean
	lineBreaks?: boolean
	progress?: ProgressFactory
}

export type TableSource =
	| { kind: 'cache'; path: string; byteLength: number }
	| {
			kind: 'corpus'
			lineCount: number
			tokenCount: number
			elapsedMs: number
			saved: CacheSaveResult | null
	  }

export interface LoadedTable {
	table: ChainTable
	source: TableSource
}

function onOff(flag: boolean): string {
	return flag ? 'on' : 'off'
}

/**
 * Read the corpus file. Emits VCIO001/VCIO002 and returns null on failure.
 */
export function loadCorpus(context: ChainContext, path: string): string | null {
	try {
		return readFileSync(path, 'utf-8')
	} catch (error: unknown) {
		if (isNodeError(error) && error.code === 'ENOENT') {
			context.emit('VCIO001', { path })
		} else {
			context.emit('VCIO002', { path, reason: getErrorMessage(error) })
		}
		return null
	}
}

function tryCache(
	context: ChainContext,
	path: string,
	lineBreaks: boolean
): LoadedTable | null {
	const cached = loadCache(path)
	if (cached.status === 'missing') return null
	if (cached.status === 'failed') {
		context.emit('VCCACHE001', { path, reason: cached.reason })
		return null
	}
	if (cached.options.lineBreaks !== lineBreaks) {
		context.emit('VCCACHE003', {
			cached: onOff(cached.options.lineBreaks),
			path,
			requested: onOff(lineBreaks),
		})
		return null
	}
	return { source: { byteLength: cached.byteLength, kind: 'cache', path }, table: cached.table }
}

function buildFromCorpus(context: ChainContext, options: LoadTableOptions): LoadedTable {
	const corpus = loadCorpus(context, options.corpusPath)
	if (corpus === null) throw context.toError('corpus could not be read')

	const lineBreaks = options.lineBreaks ?? false
	const started = performance.now()
	const { tokens, lineCount } = tokenize(corpus, {
		lineBreaks,
		...(options.progress ? { progress: options.progress } : {}),
	})
	if (tokens.length < 2) {
		context.emit('VCBUILD001', { count: tokens.length })
		throw context.toError('corpus too small')
	}

	const table = buildChain(tokens, options.progress ? { progress: options.progress } : {})
	const elapsedMs = performance.now() - started

	let saved: CacheSaveResult | null = null
	if (options.cachePath !== null) {
		saved = saveCache(table, options.cachePath, { lineBreaks })
		if (!saved.saved) {
			context.emit('VCCACHE002', { path: options.cachePath, reason: saved.reason })
		}
	}

	return {
		source: { elapsedMs, kind: 'corpus', lineCount, saved, tokenCount: tokens.length },
		table,
	}
}

/**
 * Load the chain from the cache when a usable one exists, otherwise build
 * it from the corpus and write the cache.
 *
 * Cache problems are warnings and fall back to a rebuild. A missing or
 * empty corpus is an error.
 *
 * @throws {ChainError} If the table cannot be built
 */
export function loadOrBuildTable(context: ChainContext, options: LoadTableOptions): LoadedTable {
	const lineBreaks = options.lineBreaks ?? false
	if (options.cachePath !== null && options.rebuild !== true) {
		const cached = tryCache(context, options.cachePath, lineBreaks)
		if (cached !== null) return cached
	}
	return buildFromCorpus(context, options)
}
