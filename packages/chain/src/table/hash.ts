const FNV_OFFSET_BASIS = 0x811c9dc5
const FNV_PRIME = 0x01000193

/**
 * 32-bit FNV-1a over the UTF-16 code units of a string.
 */
export function fnv1a(key: string): number {
	let hash = FNV_OFFSET_BASIS
	for (let i = 0; i < key.length; i++) {
		hash ^= key.charCodeAt(i)
		hash = Math.imul(hash, FNV_PRIME)
	}
	return hash >>> 0
}

export function isPowerOfTwo(n: number): boolean {
	return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0
}

/**
 * Smallest power of two >= n (and >= 1).
 */
export function nextPowerOfTwo(n: number): number {
	let capacity = 1
	while (capacity < n) capacity *= 2
	return capacity
}

/**
 * Slot indices visited for a hash in a table of the given capacity.
 *
 * Offsets are triangular numbers i(i+1)/2, so for a power-of-two capacity
 * the first `capacity` probes are a permutation of all slots.
 */
export function* probeSequence(hash: number, capacity: number): Generator<number> {
	const mask = capacity - 1
	let index = hash & mask
	for (let i = 0; i < capacity; i++) {
		yield index
		index = (index + i + 1) & mask
	}
}
