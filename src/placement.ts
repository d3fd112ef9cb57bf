/**
 * Placement Scheduler
 *
 * Greedy, order-preserving placement of work items into free slots.
 * Each request gets a target time (its preferred start, a point spread
 * proportionally towards the deadline, or one day per item), the slot queue
 * is ranked against that target, and the first candidate that fits without
 * colliding with an earlier placement is consumed.
 *
 * Pure and synchronous: identical inputs and `now` give identical output.
 * Earlier requests are structurally favoured when slots are scarce.
 */

import type { LocalDate, LocalDateTime } from './time-date'
import type {
  FreeSlot, ScheduleResult, ScheduledAssignment, TimeInterval,
  UnscheduledItem, WorkItemRequest,
} from './types'
import { addMinutes, addSeconds, dateOf, secondsBetween } from './time-date'
import { overlaps } from './interval'
import { createSlotQueue, type SlotQueue } from './internal/slot-queue'
import { consumeSlot, planSlot, slotFits } from './slot-consumer'
import { BUFFER_MINUTES, MIN_DEADLINE_WINDOW_DAYS } from './constants'

// ============================================================================
// Types
// ============================================================================

export type ScheduleOptions = {
  now: LocalDateTime
  deadline?: LocalDateTime
}

type RankKey = {
  index: number
  beforeTarget: 0 | 1
  dayLoad: number
  distance: number
}

// ============================================================================
// Target Time
// ============================================================================

export function targetTimeFor(
  request: WorkItemRequest,
  count: number,
  options: ScheduleOptions
): LocalDateTime {
  if (request.preferredStart) return request.preferredStart

  const { now, deadline } = options
  if (deadline) {
    const windowSeconds = Math.max(secondsBetween(now, deadline), MIN_DEADLINE_WINDOW_DAYS * 86400)
    const fraction = request.index / Math.max(count - 1, 1)
    return addSeconds(now, windowSeconds * fraction)
  }

  return addMinutes(now, request.index * 1440)
}

// ============================================================================
// Queue Preparation
// ============================================================================

/** Slots starting at or before the deadline, then those after it. */
export function partitionByDeadline(slots: readonly FreeSlot[], deadline: LocalDateTime): FreeSlot[] {
  const before = slots.filter((s) => s.start <= deadline)
  const after = slots.filter((s) => s.start > deadline)
  return [...before, ...after]
}

// The ascending sort inside createSlotQueue supersedes the partition order.
function buildQueue(freeSlots: readonly FreeSlot[], deadline: LocalDateTime | undefined): SlotQueue {
  const ordered = deadline ? partitionByDeadline(freeSlots, deadline) : freeSlots
  return createSlotQueue(ordered)
}

// ============================================================================
// Candidate Ranking
// ============================================================================

function countByDay(scheduled: readonly ScheduledAssignment[]): Map<LocalDate, number> {
  const counts = new Map<LocalDate, number>()
  for (const a of scheduled) {
    const day = dateOf(a.start)
    counts.set(day, (counts.get(day) ?? 0) + 1)
  }
  return counts
}

/**
 * Queue indices ordered by: slots at/after the target first, then days with
 * fewer placements, then closeness to the target. Ties keep queue order.
 */
export function rankCandidates(
  slots: readonly FreeSlot[],
  target: LocalDateTime,
  scheduled: readonly ScheduledAssignment[]
): number[] {
  const dayCounts = countByDay(scheduled)

  const keys = slots.map((slot, index): RankKey => ({
    index,
    beforeTarget: slot.start >= target ? 0 : 1,
    dayLoad: dayCounts.get(dateOf(slot.start)) ?? 0,
    distance: Math.abs(secondsBetween(target, slot.start)),
  }))

  keys.sort((a, b) =>
    a.beforeTarget - b.beforeTarget ||
    a.dayLoad - b.dayLoad ||
    a.distance - b.distance
  )

  return keys.map((k) => k.index)
}

// ============================================================================
// Overlap Check
// ============================================================================

function buffered(interval: TimeInterval): TimeInterval {
  return { start: interval.start, end: addMinutes(interval.end, BUFFER_MINUTES) }
}

/**
 * Queue mutation is local to the consumed slot, so it cannot see placements
 * made into other slots; this cross-checks the buffered intervals directly.
 */
export function collidesWithPlaced(
  candidate: TimeInterval,
  scheduled: readonly ScheduledAssignment[]
): boolean {
  const padded = buffered(candidate)
  return scheduled.some((a) => overlaps(padded, buffered(a)))
}

// ============================================================================
// Scheduling Run
// ============================================================================

export function scheduleWorkItems(
  requests: readonly WorkItemRequest[],
  freeSlots: readonly FreeSlot[],
  options: ScheduleOptions
): ScheduleResult {
  const scheduled: ScheduledAssignment[] = []
  const unscheduled: UnscheduledItem[] = []

  if (freeSlots.length === 0) {
    return { scheduled, unscheduled: [...requests] }
  }

  const queue = buildQueue(freeSlots, options.deadline)
  const count = requests.length

  for (const request of requests) {
    const target = targetTimeFor(request, count, options)
    const slots = queue.entries()
    let placed: TimeInterval | null = null

    for (const idx of rankCandidates(slots, target, scheduled)) {
      const slot = slots[idx]
      if (!slot || !slotFits(slot, request.durationMinutes)) continue

      const tentative = planSlot(slot, request.durationMinutes)
      if (!tentative || collidesWithPlaced(tentative, scheduled)) continue

      placed = consumeSlot(queue, idx, request.durationMinutes)
      if (placed) break
    }

    if (placed) {
      scheduled.push({
        title: request.title,
        start: placed.start,
        end: placed.end,
        ...(request.focus != null ? { focus: request.focus } : {}),
        request,
      })
    } else {
      unscheduled.push(request)
    }
  }

  return { scheduled, unscheduled }
}
