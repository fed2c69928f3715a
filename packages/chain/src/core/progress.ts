/**
 * Progress reporting contract. Long stages (reading, hashing, writing) open a
 * sink with a label and a total, then signal each unit of work.
 */

export interface ProgressSink {
	increment(): void
	finish(): void
}

export type ProgressFactory = (label: string, total: number) => ProgressSink

const silentSink: ProgressSink = {
	finish() {},
	increment() {},
}

export const noProgress: ProgressFactory = () => silentSink
