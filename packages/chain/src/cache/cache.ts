import { existsSync, readFileSync, writeFileSync } from 'node:fs'
import type { ChainTable } from '../build/builder.ts'
import { getErrorMessage } from '../core/context.ts'
import { type CacheOptions, decodeChain, encodeChain } from './codec.ts'

export const DEFAULT_CACHE_PATH = 'hashtable_cache.ser'

export type CacheLoadResult =
	| { status: 'loaded'; table: ChainTable; options: CacheOptions; byteLength: number }
	| { status: 'missing' }
	| { status: 'failed'; reason: string }

export type CacheSaveResult = { saved: true; byteLength: number } | { saved: false; reason: string }

/**
 * Write the whole table to path. Failures are returned, never thrown.
 */
export function saveCache(table: ChainTable, path: string, options: CacheOptions): CacheSaveResult {
	try {
		const data = encodeChain(table, options)
		writeFileSync(path, data)
		return { byteLength: data.length, saved: true }
	} catch (error: unknown) {
		return { reason: getErrorMessage(error), saved: false }
	}
}

/**
 * Read a table back from path. A missing file is 'missing'; anything else
 * that goes wrong (I/O, bad format) is 'failed' and means "rebuild".
 */
export function loadCache(path: string): CacheLoadResult {
	if (!existsSync(path)) return { status: 'missing' }
	try {
		const data = readFileSync(path)
		const { table, options } = decodeChain(data)
		return { byteLength: data.length, options, status: 'loaded', table }
	} catch (error: unknown) {
		return { reason: getErrorMessage(error), status: 'failed' }
	}
}
