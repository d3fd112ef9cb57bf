/**
 * study-slot-scheduler
 *
 * Public API exports
 */

// Error system
export {
  SchedulerError, SchedulerErrorCode,
  DuplicateKeyError, NotFoundError, InvalidDataError,
  ValidationError, ParseError, InvalidRangeError,
} from './errors'
export type { SchedulerErrorCode as SchedulerErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, Weekday } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, parseTime, parseDateTime,
  makeDate, makeTime, makeDateTime,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf,
  addDays, daysBetween, addSeconds, addMinutes, secondsBetween, minutesBetween,
  truncateToMinute, dayOfWeek, weekdayToIndex, compareDateTimes, maxDateTime,
  toLocal, toUTC, isDSTAt, fromDate, isValidTimezone,
} from './time-date'

// Scheduling entities
export type {
  EventId, TimeInterval, BusyInterval, FreeSlot,
  WorkItemRequest, ScheduledAssignment, UnscheduledItem, ScheduleResult,
} from './types'

export {
  WORKDAY_START_HOUR, WORKDAY_END_HOUR, BUFFER_MINUTES, MIN_SLOT_MINUTES, GRID_MINUTES,
  MIN_ESTIMATED_HOURS, MAX_ESTIMATED_HOURS, DEFAULT_ESTIMATED_HOURS,
  DEFAULT_HORIZON_DAYS, BUSY_LOOKAHEAD_DAYS,
} from './constants'

// Scheduling core
export { makeInterval, intervalMinutes, overlaps, subtractInterval } from './interval'
export { generateFreeSlots, workingWindow } from './free-slots'
export type { FreeSlotOptions } from './free-slots'
export { roundUpToGrid, snapForwardToGrid, isOnGrid } from './grid'
export { slotFits, planSlot, remainderAfter } from './slot-consumer'
export { scheduleWorkItems, targetTimeFor, rankCandidates } from './placement'
export type { ScheduleOptions } from './placement'

// Boundary helpers
export { parsePlanHint } from './plan-hint'
export type { PlanHintContext } from './plan-hint'
export { normalizeEstimatedHours, toWorkItemRequests, deadlineFromDueDate } from './work-items'
export type { WorkItemInput } from './work-items'

// Adapters
export type { Adapter, CalendarEvent } from './adapter'
export { createMockAdapter } from './adapter'
export { createSqliteAdapter } from './sqlite-adapter'
export type { SqliteAdapter, SqliteExtras } from './sqlite-adapter'

// Planner
export { createStudyPlanner, summarizePlan } from './public-api'
export type {
  StudyPlanner, StudyPlannerConfig, PlanTaskInput, PlanResult, PlannerEvents,
} from './public-api'
