/**
 * Free-Slot Generator
 *
 * Builds the available time segments over a multi-day horizon: each day's
 * working window, clipped to "now", minus the busy intervals that start on
 * that day. Output is in day order and is NOT globally sorted; ordering for
 * placement is the scheduler's job.
 */

import type { LocalDate, LocalDateTime } from './time-date'
import type { BusyInterval, FreeSlot, TimeInterval } from './types'
import { addDays, dateOf, makeDateTime, makeTime, maxDateTime } from './time-date'
import { subtractInterval, intervalMinutes } from './interval'
import {
  WORKDAY_START_HOUR, WORKDAY_END_HOUR,
  MIN_SLOT_MINUTES, DEFAULT_HORIZON_DAYS,
} from './constants'

// ============================================================================
// Types
// ============================================================================

export type FreeSlotOptions = {
  now: LocalDateTime
  horizonDays?: number
}

// ============================================================================
// Working Window
// ============================================================================

export function workingWindow(day: LocalDate): TimeInterval {
  return {
    start: makeDateTime(day, makeTime(WORKDAY_START_HOUR, 0, 0)),
    end: makeDateTime(day, makeTime(WORKDAY_END_HOUR, 0, 0)),
  }
}

// ============================================================================
// Generation
// ============================================================================

export function generateFreeSlots(busyIntervals: readonly BusyInterval[], options: FreeSlotOptions): FreeSlot[] {
  const { now } = options
  const horizonDays = options.horizonDays ?? DEFAULT_HORIZON_DAYS
  const firstDay = dateOf(now)
  const freeSlots: FreeSlot[] = []

  for (let offset = 0; offset < horizonDays; offset++) {
    const day = addDays(firstDay, offset)
    const window = workingWindow(day)
    if (window.end <= now) continue
    window.start = maxDateTime(window.start, now)

    let segments: TimeInterval[] = [window]
    for (const busy of busyIntervals) {
      if (dateOf(busy.start) !== day) continue
      segments = subtractInterval(segments, busy)
      if (segments.length === 0) break
    }

    for (const segment of segments) {
      if (intervalMinutes(segment) >= MIN_SLOT_MINUTES) {
        freeSlots.push(segment)
      }
    }
  }

  return freeSlots
}
