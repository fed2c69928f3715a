import { BaseCommand, flags } from '@adonisjs/ace'
import {
	DEFAULT_CACHE_PATH,
	DEFAULT_CORPUS_PATH,
	loadOrBuildTable,
	noProgress,
	summarizeTable,
} from '@versechain/chain'
import { createTerminalProgress } from '../progress.ts'
import { describeLoaded, formatInvalidTopError, formatSummary, parseTop, runChain } from '../utils.ts'

export default class InspectCommand extends BaseCommand {
	static override commandName = 'inspect'
	static override description = 'Print table statistics and the most frequent words'

	@flags.string({ alias: 'n', default: '10', description: 'Number of words to list' })
	declare top: string

	@flags.string({ alias: 'c', default: DEFAULT_CORPUS_PATH, description: 'Corpus text file' })
	declare corpus: string

	@flags.string({
		default: DEFAULT_CACHE_PATH,
		description: 'Cache file for the built table',
		flagName: 'cache-file',
	})
	declare cacheFile: string

	@flags.boolean({ description: 'Rebuild the table even if a cache exists' })
	declare rebuild: boolean

	@flags.boolean({ description: 'Keep line breaks from the corpus', flagName: 'line-breaks' })
	declare lineBreaks: boolean

	@flags.boolean({ alias: 'q', description: 'Hide progress bars' })
	declare quiet: boolean

	override async run(): Promise<void> {
		const top = parseTop(this.top)
		if (top === undefined) {
			this.logger.error(formatInvalidTopError(this.top))
			this.exitCode = 1
			return
		}

		const loaded = runChain(this.logger, (context) =>
			loadOrBuildTable(context, {
				cachePath: this.cacheFile,
				corpusPath: this.corpus,
				lineBreaks: this.lineBreaks,
				progress: this.quiet ? noProgress : createTerminalProgress(this.logger),
				rebuild: this.rebuild,
			})
		)
		if (loaded === null) {
			this.exitCode = 1
			return
		}

		if (!this.quiet) this.logger.info(describeLoaded(loaded))
		for (const line of formatSummary(summarizeTable(loaded.table, top))) {
			console.log(line)
		}
	}
}
