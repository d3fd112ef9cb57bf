/**
 * Property tests for interval subtraction, free-slot generation and rounding.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { busyIntervalGen, weekDateTimeGen } from '../generators'
import { subtractInterval, intervalMinutes, overlaps } from '../../../src/interval'
import { generateFreeSlots, workingWindow } from '../../../src/free-slots'
import { roundUpToGrid, snapForwardToGrid, isOnGrid } from '../../../src/grid'
import { addMinutes, dateOf, secondsBetween, type LocalDateTime } from '../../../src/time-date'
import type { TimeInterval } from '../../../src/types'

function overlapSeconds(a: TimeInterval, b: TimeInterval): number {
  const start: LocalDateTime = a.start > b.start ? a.start : b.start
  const end: LocalDateTime = a.end < b.end ? a.end : b.end
  return start < end ? secondsBetween(start, end) : 0
}

function totalSeconds(segments: readonly TimeInterval[]): number {
  return segments.reduce((sum, s) => sum + secondsBetween(s.start, s.end), 0)
}

// ============================================================================
// Subtraction
// ============================================================================

describe('subtractInterval', () => {
  it('removes exactly the overlap', () => {
    fc.assert(
      fc.property(busyIntervalGen(), busyIntervalGen(), (segment, busy) => {
        const result = subtractInterval([{ ...segment }], busy)
        expect(totalSeconds(result)).toBe(secondsBetween(segment.start, segment.end) - overlapSeconds(segment, busy))
      })
    )
  })

  it('never returns time covered by the busy interval', () => {
    fc.assert(
      fc.property(busyIntervalGen(), busyIntervalGen(), (segment, busy) => {
        for (const piece of subtractInterval([{ ...segment }], busy)) {
          expect(overlaps(piece, busy)).toBe(false)
          expect(piece.start >= segment.start && piece.end <= segment.end).toBe(true)
        }
      })
    )
  })
})

// ============================================================================
// Free Slots
// ============================================================================

describe('generateFreeSlots', () => {
  it('slots lie inside the working window, after now, clear of same-day busy time', () => {
    fc.assert(
      fc.property(fc.array(busyIntervalGen(), { maxLength: 10 }), weekDateTimeGen(), (busy, now) => {
        for (const slot of generateFreeSlots(busy, { now, horizonDays: 7 })) {
          const window = workingWindow(dateOf(slot.start))
          expect(slot.start >= window.start && slot.end <= window.end).toBe(true)
          expect(slot.start >= now).toBe(true)
          expect(intervalMinutes(slot)).toBeGreaterThanOrEqual(30)
          for (const b of busy) {
            if (dateOf(b.start) === dateOf(slot.start)) expect(overlaps(slot, b)).toBe(false)
          }
        }
      })
    )
  })
})

// ============================================================================
// Rounding
// ============================================================================

describe('grid rounding', () => {
  it('roundUpToGrid lands on the grid and is idempotent', () => {
    fc.assert(
      fc.property(weekDateTimeGen(), (dt) => {
        const rounded = roundUpToGrid(dt)
        expect(isOnGrid(rounded)).toBe(true)
        expect(roundUpToGrid(rounded)).toBe(rounded)
      })
    )
  })

  it('snapForwardToGrid never moves backwards and moves less than 30 minutes', () => {
    fc.assert(
      fc.property(weekDateTimeGen(), (dt) => {
        const snapped = snapForwardToGrid(dt)
        expect(isOnGrid(snapped)).toBe(true)
        expect(snapped >= dt).toBe(true)
        expect(snapped < addMinutes(dt, 30)).toBe(true)
      })
    )
  })
})
