import assert from 'node:assert'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import { ChainContext, createSeededRandom, writePoem } from '../src/index.ts'

describe('writePoem', () => {
	let dir = ''
	let corpusPath = ''

	before(() => {
		dir = mkdtempSync(join(tmpdir(), 'versechain-write-'))
		corpusPath = join(dir, 'corpus.txt')
		writeFileSync(corpusPath, 'The cat sat.\nThe dog ran.\n')
	})

	after(() => {
		rmSync(dir, { force: true, recursive: true })
	})

	it('should build the chain and write a poem', () => {
		const result = writePoem({
			cachePath: join(dir, 'write.ser'),
			corpusPath,
			length: 6,
			random: () => 0,
			startWord: 'the',
		})
		assert.strictEqual(result.poem.text, 'the cat sat. the cat')
		assert.strictEqual(result.loaded.source.kind, 'corpus')
		assert.deepStrictEqual(result.diagnostics, [])
	})

	it('should give the same poem from the cache as from the corpus', () => {
		const cachePath = join(dir, 'same.ser')
		const options = { cachePath, corpusPath, length: 12, startWord: 'the' }

		const built = writePoem({ ...options, random: createSeededRandom(11) })
		const cached = writePoem({ ...options, random: createSeededRandom(11) })

		assert.strictEqual(cached.loaded.source.kind, 'cache')
		assert.strictEqual(cached.poem.text, built.poem.text)
	})

	it('should return generation warnings with the poem', () => {
		const context = new ChainContext()
		const result = writePoem(
			{ cachePath: null, corpusPath, length: 3, startWord: 'moon' },
			context
		)
		assert.strictEqual(result.poem.text, '')
		assert.deepStrictEqual(
			result.diagnostics.map((d) => d.def.code),
			['VCGEN001']
		)
	})
})
