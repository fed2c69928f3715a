import type { ProgressFactory, ProgressSink } from '@versechain/chain'

const BAR_WIDTH = 50

/**
 * The part of the ace logger a progress bar needs: rewrite the current
 * line, then keep it once done.
 */
export interface ProgressWriter {
	logUpdate(message: string): void
	logUpdatePersist(): void
}

export type Clock = () => number

export function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`
	if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`
	const seconds = Math.floor(ms / 1000)
	return `${Math.floor(seconds / 60)}m${String(seconds % 60).padStart(2, '0')}s`
}

/**
 * One line bar: label, 50 cells, percentage, (current/total), elapsed and ETA.
 * Redrawn only when the whole percentage changes.
 */
export class TerminalProgress implements ProgressSink {
	private current = 0
	private lastPercent = -1
	private readonly started: number
	private readonly writer: ProgressWriter
	private readonly label: string
	private readonly total: number
	private readonly clock: Clock

	constructor(writer: ProgressWriter, label: string, total: number, clock: Clock) {
		this.writer = writer
		this.label = label
		this.total = total
		this.clock = clock
		this.started = clock()
	}

	private percent(): number {
		if (this.total === 0) return 100
		return Math.min(100, Math.floor((this.current * 100) / this.total))
	}

	render(): string {
		const filled =
			this.total === 0
				? BAR_WIDTH
				: Math.min(BAR_WIDTH, Math.floor((this.current * BAR_WIDTH) / this.total))
		const elapsed = this.clock() - this.started
		const eta =
			this.current === 0
				? '--'
				: formatDuration((elapsed * Math.max(this.total - this.current, 0)) / this.current)
		const bar = '#'.repeat(filled) + '-'.repeat(BAR_WIDTH - filled)
		return `${this.label} [${bar}] ${this.percent()}% (${this.current}/${this.total}) ${formatDuration(elapsed)} eta ${eta}`
	}

	increment(): void {
		this.current++
		const percent = this.percent()
		if (percent === this.lastPercent) return
		this.lastPercent = percent
		this.writer.logUpdate(this.render())
	}

	finish(): void {
		this.writer.logUpdate(this.render())
		this.writer.logUpdatePersist()
	}
}

export function createTerminalProgress(
	writer: ProgressWriter,
	clock: Clock = () => performance.now()
): ProgressFactory {
	return (label, total) => new TerminalProgress(writer, label, total, clock)
}
