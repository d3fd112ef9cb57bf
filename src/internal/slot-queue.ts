/**
 * Slot Queue
 *
 * Mutable working set of free slots for exactly one scheduling run.
 * Entries shrink or disappear as items are placed; the queue is created
 * fresh by the scheduler and discarded when the run returns.
 */

import type { FreeSlot } from '../types'
import { compareDateTimes } from '../time-date'

export type SlotQueue = {
  readonly size: number
  at(index: number): FreeSlot | undefined
  /** Snapshot of the current entries, in queue order */
  entries(): FreeSlot[]
  /** Replace the entry with its remainder, or remove it when there is none */
  replace(index: number, remainder: FreeSlot | null): void
}

export function createSlotQueue(slots: readonly FreeSlot[]): SlotQueue {
  const queue: FreeSlot[] = slots.map((s) => ({ start: s.start, end: s.end }))

  // Stable sort: equal starts keep generator order
  queue.sort((a, b) => compareDateTimes(a.start, b.start))

  return {
    get size() {
      return queue.length
    },

    at(index: number): FreeSlot | undefined {
      return queue[index]
    },

    entries(): FreeSlot[] {
      return queue.map((s) => ({ ...s }))
    },

    replace(index: number, remainder: FreeSlot | null): void {
      if (index < 0 || index >= queue.length) return
      if (remainder) {
        queue[index] = remainder
      } else {
        queue.splice(index, 1)
      }
    },
  }
}
