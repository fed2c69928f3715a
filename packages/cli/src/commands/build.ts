import { BaseCommand, flags } from '@adonisjs/ace'
import {
	DEFAULT_CACHE_PATH,
	DEFAULT_CORPUS_PATH,
	loadOrBuildTable,
	noProgress,
} from '@versechain/chain'
import { createTerminalProgress } from '../progress.ts'
import { describeLoaded, runChain } from '../utils.ts'

export default class BuildCommand extends BaseCommand {
	static override commandName = 'build'
	static override description = 'Build the word table from the corpus and write the cache'

	@flags.string({ alias: 'c', default: DEFAULT_CORPUS_PATH, description: 'Corpus text file' })
	declare corpus: string

	@flags.string({
		default: DEFAULT_CACHE_PATH,
		description: 'Cache file to write',
		flagName: 'cache-file',
	})
	declare cacheFile: string

	@flags.boolean({ description: 'Keep line breaks from the corpus', flagName: 'line-breaks' })
	declare lineBreaks: boolean

	@flags.boolean({ alias: 'q', description: 'Hide progress bars' })
	declare quiet: boolean

	override async run(): Promise<void> {
		const loaded = runChain(this.logger, (context) =>
			loadOrBuildTable(context, {
				cachePath: this.cacheFile,
				corpusPath: this.corpus,
				lineBreaks: this.lineBreaks,
				progress: this.quiet ? noProgress : createTerminalProgress(this.logger),
				rebuild: true,
			})
		)
		if (loaded === null) {
			this.exitCode = 1
			return
		}

		this.logger.success(describeLoaded(loaded))
		if (loaded.source.kind === 'corpus' && loaded.source.saved?.saved !== true) {
			this.exitCode = 1
		}
	}
}
