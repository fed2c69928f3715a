import assert from 'node:assert'
import { describe, it } from 'node:test'
import { ChainContext, ChainError, getErrorMessage, isNodeError } from '../../src/core/context.ts'
import { isExempt, isPunctuation, NEWLINE } from '../../src/core/tokens.ts'

describe('core/ChainContext', () => {
	it('should start empty', () => {
		const context = new ChainContext()
		assert.strictEqual(context.hasErrors(), false)
		assert.deepStrictEqual(context.getDiagnostics(), [])
	})

	it('should interpolate arguments into the message', () => {
		const context = new ChainContext()
		const diagnostic = context.emit('VCIO001', { path: 'poems.txt' })
		assert.strictEqual(diagnostic.message, 'corpus not found: poems.txt')
		assert.deepStrictEqual(diagnostic.args, { path: 'poems.txt' })
	})

	it('should separate errors from warnings', () => {
		const context = new ChainContext()
		context.emit('VCGEN001', { emitted: 1, word: 'x' })
		assert.strictEqual(context.hasErrors(), false)

		context.emit('VCBUILD001', { count: 0 })
		assert.strictEqual(context.hasErrors(), true)
		assert.deepStrictEqual(
			context.getErrors().map((d) => d.def.code),
			['VCBUILD001']
		)
		assert.deepStrictEqual(
			context.getWarnings().map((d) => d.def.code),
			['VCGEN001']
		)
	})

	it('should format a diagnostic with its help line', () => {
		const context = new ChainContext()
		const diagnostic = context.emit('VCGEN001', { emitted: 3, word: 'moon' })
		assert.strictEqual(
			context.formatDiagnostic(diagnostic),
			'warning[VCGEN001]: word "moon" not found in table, stopping after 3 word(s)\n' +
				'   = help: Start from a word that occurs in the corpus, or ask for a shorter poem.'
		)
	})

	it('should join all diagnostics with a blank line', () => {
		const context = new ChainContext()
		context.emit('VCIO001', { path: 'a' })
		context.emit('VCBUILD001', { count: 1 })
		assert.strictEqual(
			context.formatAllDiagnostics(),
			'error[VCIO001]: corpus not found: a\n' +
				'   = help: Run the corpus cleaning step first, or pass `--corpus <file>`.\n\n' +
				'error[VCBUILD001]: corpus produced 1 token(s), need at least 2\n' +
				'   = help: Point `--corpus` at a file with some text in it.'
		)
	})

	describe('toError', () => {
		it('should wrap the first error', () => {
			const context = new ChainContext()
			context.emit('VCGEN001', { emitted: 0, word: 'x' })
			const diagnostic = context.emit('VCIO001', { path: 'missing.txt' })
			const error = context.toError('fallback')

			assert.ok(error instanceof ChainError)
			assert.strictEqual(error.diagnostic, diagnostic)
			assert.strictEqual(
				error.message,
				'error[VCIO001]: corpus not found: missing.txt\n' +
					'   = help: Run the corpus cleaning step first, or pass `--corpus <file>`.'
			)
		})

		it('should fall back when nothing failed', () => {
			const error = new ChainContext().toError('nothing to report')
			assert.strictEqual(error.message, 'nothing to report')
			assert.strictEqual(error.diagnostic, undefined)
		})
	})
})

describe('core/errors', () => {
	it('should read messages from errors and other values', () => {
		assert.strictEqual(getErrorMessage(new Error('boom')), 'boom')
		assert.strictEqual(getErrorMessage('plain'), 'plain')
	})

	it('should recognise errors carrying a code', () => {
		const error = Object.assign(new Error('gone'), { code: 'ENOENT' })
		assert.strictEqual(isNodeError(error), true)
		assert.strictEqual(isNodeError(new Error('plain')), false)
		assert.strictEqual(isNodeError({ code: 'ENOENT' }), false)
	})
})

describe('core/tokens', () => {
	it('should exempt punctuation and newline only', () => {
		for (const mark of ['.', ',', '!', '?']) assert.strictEqual(isPunctuation(mark), true)
		assert.strictEqual(isExempt(NEWLINE), true)
		assert.strictEqual(isExempt('.'), true)
		assert.strictEqual(isExempt('word'), false)
		assert.strictEqual(isExempt(';'), false)
	})
})
