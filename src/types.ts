/**
 * Shared Types
 *
 * Scheduling entities passed between the free-slot generator, the placement
 * scheduler and the planner facade. All times are wall-clock LocalDateTime
 * values in the student's timezone.
 */

import type { LocalDateTime } from './time-date'

export type { LocalDate, LocalTime, LocalDateTime, Weekday } from './time-date'

// ============================================================================
// Branded ID Types
// ============================================================================

declare const __eventId: unique symbol

export type EventId = string & { readonly [__eventId]: true }

// ============================================================================
// Intervals
// ============================================================================

/** Half-open range [start, end) with start < end */
export type TimeInterval = {
  start: LocalDateTime
  end: LocalDateTime
}

/** Occupied time taken from the student's existing calendar; never mutated */
export type BusyInterval = Readonly<TimeInterval>

/**
 * Unclaimed time inside one day's working window, at least MIN_SLOT_MINUTES
 * long and never before "now". Produced fresh for each scheduling run.
 */
export type FreeSlot = TimeInterval

// ============================================================================
// Requests & Results
// ============================================================================

export type WorkItemRequest = {
  /** Derived title, e.g. "Essay: Outline" */
  title: string
  /** Clamped estimate, in minutes */
  durationMinutes: number
  preferredStart?: LocalDateTime
  /** Ordinal position in the caller's sequence; drives deadline spreading */
  index: number
  /** Free-text focus/category carried through to the calendar entry */
  focus?: string
}

export type ScheduledAssignment = {
  title: string
  start: LocalDateTime
  end: LocalDateTime
  focus?: string
  request: WorkItemRequest
}

export type UnscheduledItem = WorkItemRequest

export type ScheduleResult = {
  scheduled: ScheduledAssignment[]
  unscheduled: UnscheduledItem[]
}
