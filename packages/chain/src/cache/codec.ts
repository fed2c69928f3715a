/**
 * Binary encoding of a built chain.
 *
 * Layout (little-endian):
 * ```
 * magic        4 bytes  "VCHN"
 * version      u16
 * flags        u16      bit 0: tokenized with line breaks
 * stringCount  u32, then per string: u32 byteLength + UTF-8 bytes
 * recordCount  u32, then per record: u32 wordId, u32 occurCount,
 *                                    occurCount x u32 followId
 * ```
 * Every word and follower is stored once in the string pool and referenced
 * by index, so follow lists cost four bytes per entry.
 */

import type { ChainTable } from '../build/builder.ts'
import { TransitionTable } from '../table/transition-table.ts'
import { WordFreqInfo } from '../table/word-freq-info.ts'

export const CACHE_MAGIC = 'VCHN'
export const CACHE_VERSION = 1

const FLAG_LINE_BREAKS = 1

export interface CacheOptions {
	lineBreaks: boolean
}

export interface DecodedChain {
	table: ChainTable
	options: CacheOptions
}

export class CacheFormatError extends Error {
	readonly offset: number

	constructor(message: string, offset: number) {
		super(`${message} (at byte ${offset})`)
		this.name = 'CacheFormatError'
		this.offset = offset
	}
}

class BinaryWriter {
	private buffer = new Uint8Array(1024)
	private view = new DataView(this.buffer.buffer)
	private length = 0
	private readonly encoder = new TextEncoder()

	private reserve(bytes: number): void {
		const needed = this.length + bytes
		if (needed <= this.buffer.length) return

		let capacity = this.buffer.length * 2
		while (capacity < needed) capacity *= 2
		const next = new Uint8Array(capacity)
		next.set(this.buffer.subarray(0, this.length))
		this.buffer = next
		this.view = new DataView(next.buffer)
	}

	u16(value: number): void {
		this.reserve(2)
		this.view.setUint16(this.length, value, true)
		this.length += 2
	}

	u32(value: number): void {
		this.reserve(4)
		this.view.setUint32(this.length, value, true)
		this.length += 4
	}

	bytes(data: Uint8Array): void {
		this.reserve(data.length)
		this.buffer.set(data, this.length)
		this.length += data.length
	}

	string(value: string): void {
		const encoded = this.encoder.encode(value)
		this.u32(encoded.length)
		this.bytes(encoded)
	}

	finish(): Uint8Array {
		return this.buffer.slice(0, this.length)
	}
}

class BinaryReader {
	private offset = 0
	private readonly data: Uint8Array
	private readonly view: DataView
	private readonly decoder = new TextDecoder('utf-8', { fatal: true })

	constructor(data: Uint8Array) {
		this.data = data
		this.view = new DataView(data.buffer, data.byteOffset, data.byteLength)
	}

	get position(): number {
		return this.offset
	}

	remaining(): number {
		return this.data.length - this.offset
	}

	private need(bytes: number, what: string): void {
		if (this.remaining() < bytes) {
			throw new CacheFormatError(`truncated ${what}`, this.offset)
		}
	}

	u16(what: string): number {
		this.need(2, what)
		const value = this.view.getUint16(this.offset, true)
		this.offset += 2
		return value
	}

	u32(what: string): number {
		this.need(4, what)
		const value = this.view.getUint32(this.offset, true)
		this.offset += 4
		return value
	}

	bytes(length: number, what: string): Uint8Array {
		this.need(length, what)
		const slice = this.data.subarray(this.offset, this.offset + length)
		this.offset += length
		return slice
	}

	string(what: string): string {
		const length = this.u32(what)
		const start = this.offset
		const bytes = this.bytes(length, what)
		try {
			return this.decoder.decode(bytes)
		} catch {
			throw new CacheFormatError(`invalid UTF-8 in ${what}`, start)
		}
	}
}

/**
 * Interns strings in first-seen order.
 */
class StringPool {
	readonly strings: string[] = []
	private readonly ids = new Map<string, number>()

	intern(value: string): number {
		const existing = this.ids.get(value)
		if (existing !== undefined) return existing
		const id = this.strings.length
		this.strings.push(value)
		this.ids.set(value, id)
		return id
	}
}

export function encodeChain(table: ChainTable, options: CacheOptions): Uint8Array {
	const pool = new StringPool()
	const records: Array<{ wordId: number; followIds: number[] }> = []
	for (const [word, info] of table) {
		const wordId = pool.intern(word)
		records.push({ followIds: info.followWords().map((w) => pool.intern(w)), wordId })
	}

	const writer = new BinaryWriter()
	writer.bytes(new TextEncoder().encode(CACHE_MAGIC))
	writer.u16(CACHE_VERSION)
	writer.u16(options.lineBreaks ? FLAG_LINE_BREAKS : 0)

	writer.u32(pool.strings.length)
	for (const value of pool.strings) writer.string(value)

	writer.u32(records.length)
	for (const record of records) {
		writer.u32(record.wordId)
		writer.u32(record.followIds.length)
		for (const id of record.followIds) writer.u32(id)
	}
	return writer.finish()
}

function readHeader(reader: BinaryReader): CacheOptions {
	const magic = new TextDecoder().decode(reader.bytes(CACHE_MAGIC.length, 'magic'))
	if (magic !== CACHE_MAGIC) {
		throw new CacheFormatError('not a versechain cache file', 0)
	}
	const version = reader.u16('version')
	if (version !== CACHE_VERSION) {
		throw new CacheFormatError(`unsupported cache version ${version}`, reader.position - 2)
	}
	const flags = reader.u16('flags')
	return { lineBreaks: (flags & FLAG_LINE_BREAKS) !== 0 }
}

function readStrings(reader: BinaryReader): string[] {
	const count = reader.u32('string count')
	// each string needs at least its length prefix
	if (count * 4 > reader.remaining()) {
		throw new CacheFormatError(`string count ${count} exceeds file size`, reader.position - 4)
	}
	const strings: string[] = []
	for (let i = 0; i < count; i++) strings.push(reader.string(`string ${i}`))
	return strings
}

function lookup(strings: readonly string[], id: number, offset: number): string {
	const value = strings[id]
	if (value === undefined) {
		throw new CacheFormatError(`string id ${id} out of range (pool size ${strings.length})`, offset)
	}
	return value
}

function readRecord(reader: BinaryReader, strings: readonly string[], table: ChainTable): void {
	const recordStart = reader.position
	const word = lookup(strings, reader.u32('record word'), recordStart)
	const count = reader.u32('occurrence count')
	if (count === 0) {
		throw new CacheFormatError(`record "${word}" has no follow words`, recordStart)
	}
	if (count * 4 > reader.remaining()) {
		throw new CacheFormatError(`record "${word}" overruns the file`, recordStart)
	}

	const follows: string[] = []
	for (let j = 0; j < count; j++) {
		const at = reader.position
		follows.push(lookup(strings, reader.u32('follow id'), at))
	}
	if (!table.insert(word, new WordFreqInfo(word, follows))) {
		throw new CacheFormatError(`duplicate record "${word}"`, recordStart)
	}
}

/**
 * Decode a cache blob. Throws CacheFormatError on anything malformed,
 * including trailing bytes after the last record.
 */
export function decodeChain(data: Uint8Array): DecodedChain {
	const reader = new BinaryReader(data)
	const options = readHeader(reader)
	const strings = readStrings(reader)

	const recordCount = reader.u32('record count')
	if (recordCount * 8 > reader.remaining()) {
		throw new CacheFormatError(`record count ${recordCount} exceeds file size`, reader.position - 4)
	}

	const table: ChainTable = new TransitionTable({ initialCapacity: recordCount * 2 })
	for (let i = 0; i < recordCount; i++) readRecord(reader, strings, table)

	if (reader.remaining() !== 0) {
		throw new CacheFormatError(`${reader.remaining()} unexpected trailing byte(s)`, reader.position)
	}
	return { options, table }
}
