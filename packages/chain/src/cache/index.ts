/**
 * Persistence of built chains to a versioned binary file.
 */

export {
	type CacheLoadResult,
	type CacheSaveResult,
	DEFAULT_CACHE_PATH,
	loadCache,
	saveCache,
} from './cache.ts'
export {
	CACHE_MAGIC,
	CACHE_VERSION,
	CacheFormatError,
	type CacheOptions,
	type DecodedChain,
	decodeChain,
	encodeChain,
} from './codec.ts'
