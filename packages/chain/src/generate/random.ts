/**
 * Source of uniform numbers in [0, 1). Math.random fits.
 */
export type RandomSource = () => number

/**
 * Mulberry32: a small seeded generator, so a walk can be replayed.
 */
export function createSeededRandom(seed: number): RandomSource {
	let state = seed >>> 0
	return () => {
		state = (state + 0x6d2b79f5) >>> 0
		let t = state
		t = Math.imul(t ^ (t >>> 15), t | 1)
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296
	}
}

/**
 * Uniform integer in [0, bound). Clamps sources that return exactly 1.
 */
export function randomIndex(random: RandomSource, bound: number): number {
	const index = Math.floor(random() * bound)
	return Math.min(Math.max(index, 0), bound - 1)
}
