import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	createSeededRandom,
	DEFAULT_CACHE_PATH,
	DEFAULT_CORPUS_PATH,
	noProgress,
	normalizeWord,
	type RandomSource,
	writePoem,
} from '@versechain/chain'
import { createTerminalProgress } from '../progress.ts'
import {
	describeLoaded,
	formatEmptyStartWordError,
	formatInvalidLengthError,
	formatInvalidSeedError,
	parseLength,
	parseSeed,
	runChain,
} from '../utils.ts'

export default class WriteCommand extends BaseCommand {
	static override commandName = 'write'
	static override description = 'Write a poem by walking the word chain'

	@args.string({ description: 'Word to start from (prompted if omitted)', required: false })
	declare start?: string

	@args.string({ description: 'Number of tokens to write (prompted if omitted)', required: false })
	declare length?: string

	@flags.string({ alias: 'c', default: DEFAULT_CORPUS_PATH, description: 'Corpus text file' })
	declare corpus: string

	@flags.string({
		default: DEFAULT_CACHE_PATH,
		description: 'Cache file for the built table',
		flagName: 'cache-file',
	})
	declare cacheFile: string

	@flags.boolean({
		default: true,
		description: 'Read and write the cache file',
		showNegatedVariantInHelp: true,
	})
	declare cache: boolean

	@flags.boolean({ description: 'Rebuild the table even if a cache exists' })
	declare rebuild: boolean

	@flags.string({ alias: 's', description: 'Integer seed for a repeatable poem' })
	declare seed?: string

	@flags.boolean({ description: 'Keep line breaks from the corpus', flagName: 'line-breaks' })
	declare lineBreaks: boolean

	@flags.boolean({ alias: 'q', description: 'Print only the poem' })
	declare quiet: boolean

	private async resolveStartWord(): Promise<string | null> {
		const raw = this.start ?? (await this.prompt.ask<string>('Start word'))
		const word = normalizeWord(raw)
		if (word.length === 0) {
			this.logger.error(formatEmptyStartWordError())
			this.exitCode = 1
			return null
		}
		return word
	}

	private async resolveLength(): Promise<number | null> {
		const raw = this.length ?? (await this.prompt.ask<string>('Number of tokens'))
		const length = parseLength(raw)
		if (length === undefined) {
			this.logger.error(formatInvalidLengthError(raw))
			this.exitCode = 1
			return null
		}
		return length
	}

	private resolveRandom(): RandomSource | null {
		if (this.seed === undefined) return Math.random
		const seed = parseSeed(this.seed)
		if (seed === undefined) {
			this.logger.error(formatInvalidSeedError(this.seed))
			this.exitCode = 1
			return null
		}
		return createSeededRandom(seed)
	}

	override async run(): Promise<void> {
		const random = this.resolveRandom()
		if (random === null) return

		const startWord = await this.resolveStartWord()
		if (startWord === null) return

		const length = await this.resolveLength()
		if (length === null) return

		const result = runChain(this.logger, (context) =>
			writePoem(
				{
					cachePath: this.cache ? this.cacheFile : null,
					corpusPath: this.corpus,
					length,
					lineBreaks: this.lineBreaks,
					progress: this.quiet ? noProgress : createTerminalProgress(this.logger),
					random,
					rebuild: this.rebuild,
					startWord,
				},
				context
			)
		)
		if (result === null) {
			this.exitCode = 1
			return
		}

		if (!this.quiet) this.logger.info(describeLoaded(result.loaded))
		console.log(result.poem.text)
	}
}
