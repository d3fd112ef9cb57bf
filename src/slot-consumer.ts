/**
 * Slot Consumer
 *
 * Fits one item of a given duration at the head of a free slot: start and
 * end are snapped to the :00/:30 grid, the end is clamped to the slot's hard
 * edge, and the slot shrinks to whatever is left after the trailing buffer.
 */

import type { FreeSlot, TimeInterval } from './types'
import type { SlotQueue } from './internal/slot-queue'
import { addMinutes, truncateToMinute } from './time-date'
import { roundUpToGrid, snapForwardToGrid } from './grid'
import { intervalMinutes } from './interval'
import { BUFFER_MINUTES } from './constants'

/** True when the slot can hold the item plus its trailing buffer. */
export function slotFits(slot: FreeSlot, durationMinutes: number): boolean {
  return intervalMinutes(slot) >= durationMinutes + BUFFER_MINUTES
}

/**
 * Tentative placement at the head of `slot`, without touching the slot.
 * Returns null when the slot is too small or rounding leaves no room.
 */
export function planSlot(slot: FreeSlot, durationMinutes: number): TimeInterval | null {
  if (!slotFits(slot, durationMinutes)) return null

  let start = roundUpToGrid(slot.start)
  if (start < slot.start) start = snapForwardToGrid(slot.start)
  if (start >= slot.end) return null

  let end = roundUpToGrid(addMinutes(start, durationMinutes))
  if (end > slot.end) end = truncateToMinute(slot.end)
  if (end <= start) return null

  return { start, end }
}

/** What is left of `slot` once `assigned` has been taken from its head. */
export function remainderAfter(slot: FreeSlot, assigned: TimeInterval): FreeSlot | null {
  const buffered = addMinutes(assigned.end, BUFFER_MINUTES)
  if (buffered < slot.end) return { start: buffered, end: slot.end }
  if (assigned.end < slot.end) return { start: assigned.end, end: slot.end }
  return null
}

/**
 * Place an item into queue entry `index`, shrinking or removing the entry.
 * Returns the assigned interval, or null (queue untouched) on rejection.
 */
export function consumeSlot(queue: SlotQueue, index: number, durationMinutes: number): TimeInterval | null {
  const slot = queue.at(index)
  if (!slot) return null

  const assigned = planSlot(slot, durationMinutes)
  if (!assigned) return null

  queue.replace(index, remainderAfter(slot, assigned))
  return assigned
}
