/**
 * Interval Arithmetic
 *
 * Half-open [start, end) ranges over LocalDateTime. Subtraction splits or
 * drops free segments around a busy interval; it never merges, so callers
 * may only rely on the result being correct, not minimal.
 */

import type { LocalDateTime } from './time-date'
import type { TimeInterval } from './types'
import { minutesBetween } from './time-date'
import { type Result, Ok, Err } from './result'
import { InvalidRangeError } from './errors'

export { InvalidRangeError } from './errors'

// ============================================================================
// Construction
// ============================================================================

export function makeInterval(start: LocalDateTime, end: LocalDateTime): Result<TimeInterval, InvalidRangeError> {
  if (start >= end) {
    return Err(new InvalidRangeError(`Interval start '${start}' must be before end '${end}'`))
  }
  return Ok({ start, end })
}

// ============================================================================
// Measurement
// ============================================================================

export function intervalMinutes(interval: TimeInterval): number {
  return minutesBetween(interval.start, interval.end)
}

export function overlaps(a: TimeInterval, b: TimeInterval): boolean {
  return a.start < b.end && b.start < a.end
}

// ============================================================================
// Subtraction
// ============================================================================

/**
 * Remove `busy` from every segment. A segment that `busy` covers entirely is
 * dropped; partial overlap keeps the uncovered head and/or tail. Pieces of
 * non-positive length are discarded.
 */
export function subtractInterval(segments: TimeInterval[], busy: TimeInterval): TimeInterval[] {
  const result: TimeInterval[] = []

  for (const segment of segments) {
    if (busy.end <= segment.start || busy.start >= segment.end) {
      result.push(segment)
      continue
    }
    if (busy.start > segment.start) {
      result.push({ start: segment.start, end: busy.start })
    }
    if (busy.end < segment.end) {
      result.push({ start: busy.end, end: segment.end })
    }
  }

  return result.filter((s) => s.start < s.end)
}
