import assert from 'node:assert'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import { buildChain } from '../../src/build/builder.ts'
import { loadCache, saveCache } from '../../src/cache/cache.ts'

describe('cache/cache', () => {
	let dir = ''

	before(() => {
		dir = mkdtempSync(join(tmpdir(), 'versechain-cache-'))
	})

	after(() => {
		rmSync(dir, { force: true, recursive: true })
	})

	it('should save a table and load it back', () => {
		const path = join(dir, 'saved.ser')
		const table = buildChain(['the', 'sea', 'the', 'sky'])

		const saved = saveCache(table, path, { lineBreaks: false })
		assert.strictEqual(saved.saved, true)

		const loaded = loadCache(path)
		assert.strictEqual(loaded.status, 'loaded')
		if (loaded.status !== 'loaded') return
		assert.deepStrictEqual(loaded.options, { lineBreaks: false })
		assert.deepStrictEqual(loaded.table.find('the')?.followWords(), ['sea', 'sky'])
		if (saved.saved) assert.strictEqual(loaded.byteLength, saved.byteLength)
	})

	it('should report a missing file as missing', () => {
		assert.deepStrictEqual(loadCache(join(dir, 'absent.ser')), { status: 'missing' })
	})

	it('should report a corrupt file as failed', () => {
		const path = join(dir, 'corrupt.ser')
		writeFileSync(path, 'garbage')
		assert.deepStrictEqual(loadCache(path), {
			reason: 'not a versechain cache file (at byte 0)',
			status: 'failed',
		})
	})

	it('should return a failure instead of throwing when the write fails', () => {
		const path = join(dir, 'no-such-dir', 'cache.ser')
		const result = saveCache(buildChain(['a', 'b']), path, { lineBreaks: false })
		assert.strictEqual(result.saved, false)
		if (!result.saved) assert.match(result.reason, /ENOENT/)
	})
})
