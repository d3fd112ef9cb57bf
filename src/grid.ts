/**
 * Boundary Rounder
 *
 * Snaps timestamps to the :00/:30 grid that assigned start and end times
 * land on.
 */

import type { LocalDateTime } from './time-date'
import { GRID_MINUTES } from './constants'
import {
  addDays, dateOf, timeOf, hourOf, minuteOf, secondOf,
  makeDateTime, makeTime,
} from './time-date'

function atMinute(dt: LocalDateTime, minute: number): LocalDateTime {
  return makeDateTime(dateOf(dt), makeTime(hourOf(timeOf(dt)), minute, 0))
}

function nextHour(dt: LocalDateTime): LocalDateTime {
  const hour = hourOf(timeOf(dt)) + 1
  if (hour === 24) return makeDateTime(addDays(dateOf(dt), 1), makeTime(0, 0, 0))
  return makeDateTime(dateOf(dt), makeTime(hour, 0, 0))
}

/**
 * Exact :00:00 passes through. Minutes [0, 45) go to :30 of the same hour,
 * [45, 60) to :00 of the next hour. Minutes [30, 45) therefore move
 * backwards; see snapForwardToGrid for a value that never precedes its input.
 */
export function roundUpToGrid(dt: LocalDateTime): LocalDateTime {
  const t = timeOf(dt)
  const minute = minuteOf(t)
  if (minute === 0 && secondOf(t) === 0) return dt
  if (minute < 45) return atMinute(dt, 30)
  return nextHour(dt)
}

/** First grid line at or after dt. */
export function snapForwardToGrid(dt: LocalDateTime): LocalDateTime {
  if (isOnGrid(dt)) return dt
  if (minuteOf(timeOf(dt)) < GRID_MINUTES) return atMinute(dt, GRID_MINUTES)
  return nextHour(dt)
}

export function isOnGrid(dt: LocalDateTime): boolean {
  const t = timeOf(dt)
  return minuteOf(t) % GRID_MINUTES === 0 && secondOf(t) === 0
}
