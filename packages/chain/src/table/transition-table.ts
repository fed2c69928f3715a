/**
 * Open-addressed hash table with triangular-number quadratic probing.
 *
 * - Slots live in one dense array, tagged Empty or Occupied
 * - No deletions, so no tombstones
 * - Capacity is always a power of two; the table doubles before an insert
 *   would push the load factor past its limit
 */

import { fnv1a, nextPowerOfTwo, probeSequence } from './hash.ts'

export const SlotState = {
	Empty: 0,
	Occupied: 1,
} as const

export type SlotState = (typeof SlotState)[keyof typeof SlotState]

export type Slot<V> =
	| { readonly state: typeof SlotState.Empty }
	| { readonly state: typeof SlotState.Occupied; readonly key: string; readonly value: V }

const EMPTY: Slot<never> = { state: SlotState.Empty }

export const MIN_CAPACITY = 8
export const DEFAULT_MAX_LOAD_FACTOR = 0.5

export interface TransitionTableOptions {
	/** Rounded up to a power of two, at least MIN_CAPACITY */
	initialCapacity?: number
	/** Exclusive upper bound is 1 */
	maxLoadFactor?: number
}

/**
 * Raised when the probe sequence runs out of slots. The load-factor check
 * makes this unreachable, so it signals a defect in the table itself.
 */
export class TableInvariantError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'TableInvariantError'
	}
}

function createSlots<V>(capacity: number): Slot<V>[] {
	return new Array<Slot<V>>(capacity).fill(EMPTY)
}

export class TransitionTable<V> {
	private slots: Slot<V>[]
	private occupied = 0
	readonly maxLoadFactor: number

	constructor(options: TransitionTableOptions = {}) {
		const maxLoadFactor = options.maxLoadFactor ?? DEFAULT_MAX_LOAD_FACTOR
		if (!(maxLoadFactor > 0 && maxLoadFactor < 1)) {
			throw new RangeError(`maxLoadFactor must be in (0, 1), got ${maxLoadFactor}`)
		}
		this.maxLoadFactor = maxLoadFactor
		const requested = Math.max(options.initialCapacity ?? MIN_CAPACITY, MIN_CAPACITY)
		this.slots = createSlots(nextPowerOfTwo(requested))
	}

	size(): number {
		return this.occupied
	}

	capacity(): number {
		return this.slots.length
	}

	loadFactor(): number {
		return this.occupied / this.slots.length
	}

	/**
	 * Insert a new key. Returns false, leaving the table untouched, when the
	 * key is already present: there is no update path, callers find first.
	 */
	insert(key: string, value: V): boolean {
		if (this.locate(key) !== undefined) return false

		while ((this.occupied + 1) / this.slots.length > this.maxLoadFactor) {
			this.resize()
		}
		this.place(this.slots, key, value)
		this.occupied++
		return true
	}

	find(key: string): V | undefined {
		const index = this.locate(key)
		if (index === undefined) return undefined
		const slot = this.slots[index]
		return slot?.state === SlotState.Occupied ? slot.value : undefined
	}

	has(key: string): boolean {
		return this.locate(key) !== undefined
	}

	/** Occupied entries in slot order. */
	*[Symbol.iterator](): Generator<[string, V]> {
		for (const slot of this.slots) {
			if (slot.state === SlotState.Occupied) yield [slot.key, slot.value]
		}
	}

	keys(): string[] {
		const keys: string[] = []
		for (const [key] of this) keys.push(key)
		return keys
	}

	/**
	 * Index of the slot holding key. The walk ends at the first Empty slot,
	 * which is where an insert would have put it.
	 */
	private locate(key: string): number | undefined {
		for (const index of probeSequence(fnv1a(key), this.slots.length)) {
			const slot = this.slots[index]
			if (slot === undefined || slot.state === SlotState.Empty) return undefined
			if (slot.key === key) return index
		}
		return undefined
	}

	private place(slots: Slot<V>[], key: string, value: V): void {
		for (const index of probeSequence(fnv1a(key), slots.length)) {
			if (slots[index]?.state === SlotState.Empty) {
				slots[index] = { key, state: SlotState.Occupied, value }
				return
			}
		}
		throw new TableInvariantError(
			`no empty slot for "${key}" (size ${this.occupied}, capacity ${slots.length})`
		)
	}

	private resize(): void {
		const next = createSlots<V>(this.slots.length * 2)
		for (const slot of this.slots) {
			if (slot.state === SlotState.Occupied) this.place(next, slot.key, slot.value)
		}
		this.slots = next
	}
}
