/**
 * Public API Module
 *
 * Consumer-facing planner that ties the scheduler to a calendar store.
 * Handles configuration, validation, timezone conversion, persistence of
 * placements and event emission.
 */

import { randomUUID } from 'node:crypto'
import type { LocalDateTime } from './time-date'
import { addMinutes, compareDateTimes, fromDate, isValidTimezone, toLocal, toUTC } from './time-date'
import type { Adapter, CalendarEvent } from './adapter'
import type { BusyInterval, EventId, FreeSlot, ScheduledAssignment, UnscheduledItem } from './types'
import { generateFreeSlots } from './free-slots'
import { scheduleWorkItems } from './placement'
import { deadlineFromDueDate, toWorkItemRequests, type WorkItemInput } from './work-items'
import {
  BUSY_LOOKAHEAD_DAYS, DEFAULT_HORIZON_DAYS, DEFAULT_TASK_TITLE, MAX_EVENT_TITLE_LENGTH,
} from './constants'

// ============================================================================
// Error Classes
// ============================================================================

export { ValidationError } from './errors'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type { Adapter } from './adapter'

export type StudyPlannerConfig = {
  adapter: Adapter
  /** IANA timezone the student's working hours are expressed in */
  timezone: string
  horizonDays?: number
  /** Source of "now"; defaults to the system clock */
  clock?: () => Date
}

export type PlanTaskInput = {
  title?: string | null
  moduleId?: string | null
  /** YYYY-MM-DD */
  dueDate?: string | null
  items: readonly WorkItemInput[]
}

export type PlanResult = {
  scheduled: ScheduledAssignment[]
  unscheduled: UnscheduledItem[]
  /** Calendar entries created for `scheduled`, in the same order */
  events: CalendarEvent[]
  message: string
  deadline?: LocalDateTime
}

export type PlannerEvents = {
  scheduled: Readonly<PlanResult>
  unscheduled: Readonly<UnscheduledItem>
}

type PlannerHandlers = {
  [K in keyof PlannerEvents]: Array<(payload: PlannerEvents[K]) => void>
}

export type StudyPlanner = {
  getBusyIntervals(studentId: string): Promise<BusyInterval[]>
  getFreeSlots(studentId: string): Promise<FreeSlot[]>
  planTask(studentId: string, input: PlanTaskInput): Promise<PlanResult>
  getEvents(studentId: string): Promise<CalendarEvent[]>
  on<K extends keyof PlannerEvents>(event: K, handler: (payload: PlannerEvents[K]) => void): void
}

type Now = { instant: Date; utc: LocalDateTime; local: LocalDateTime }

// ============================================================================
// Messages
// ============================================================================

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`
}

export function summarizePlan(scheduledCount: number, unscheduledCount: number): string {
  const messages: string[] = []
  if (scheduledCount > 0) {
    messages.push(`Scheduled ${plural(scheduledCount, 'subtask')} into your calendar.`)
  }
  if (unscheduledCount > 0) {
    messages.push(`${plural(unscheduledCount, 'item')} could not be scheduled due to limited availability.`)
  }
  return messages.length > 0 ? messages.join(' ') : 'Nothing to schedule.'
}

// ============================================================================
// Implementation
// ============================================================================

export function createStudyPlanner(config: StudyPlannerConfig): StudyPlanner {
  if (!config.adapter || typeof config.adapter !== 'object') {
    throw new ValidationError('Adapter is required')
  }
  if (!isValidTimezone(config.timezone)) {
    throw new ValidationError(`Invalid timezone: ${config.timezone}`)
  }
  const horizonDays = config.horizonDays ?? DEFAULT_HORIZON_DAYS
  if (!Number.isInteger(horizonDays) || horizonDays < 1) {
    throw new ValidationError(`horizonDays must be a positive integer, got ${horizonDays}`)
  }

  const adapter = config.adapter
  const timezone = config.timezone
  const clock = config.clock ?? (() => new Date())

  // Event handlers
  const handlers: PlannerHandlers = { scheduled: [], unscheduled: [] }

  function emit<K extends keyof PlannerEvents>(event: K, payload: PlannerEvents[K]): boolean {
    let hadErrors = false
    for (const handler of handlers[event]) {
      try { handler(payload) } catch (e) { hadErrors = true; console.error(`Event handler error on '${event}':`, e) }
    }
    return !hadErrors
  }

  function on<K extends keyof PlannerEvents>(event: K, handler: (payload: PlannerEvents[K]) => void): void {
    handlers[event].push(handler)
  }

  // Planning runs one at a time: each run reads busy time and writes its
  // placements before the next one starts.
  let planQueue: Promise<void> = Promise.resolve()

  function serialized<T>(fn: () => Promise<T>): Promise<T> {
    const run = planQueue.then(fn)
    planQueue = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  function readNow(): Now {
    const instant = clock()
    return { instant, utc: fromDate(instant, 'UTC'), local: fromDate(instant, timezone) }
  }

  function requireStudent(studentId: string): void {
    if (typeof studentId !== 'string' || studentId.trim() === '') {
      throw new ValidationError('studentId is required')
    }
  }

  // ========== Busy Time ==========

  async function loadBusy(studentId: string, now: Now): Promise<BusyInterval[]> {
    const until = addMinutes(now.utc, BUSY_LOOKAHEAD_DAYS * 1440)
    const events = await adapter.getEventsStartingBetween(studentId, now.utc, until)
    return events
      .filter((e) => e.endAt > now.utc)
      .map((e) => ({ start: toLocal(e.startAt, timezone), end: toLocal(e.endAt, timezone) }))
      .sort((a, b) => compareDateTimes(a.start, b.start))
  }

  async function getBusyIntervals(studentId: string): Promise<BusyInterval[]> {
    requireStudent(studentId)
    return loadBusy(studentId, readNow())
  }

  async function getFreeSlots(studentId: string): Promise<FreeSlot[]> {
    requireStudent(studentId)
    const now = readNow()
    const busy = await loadBusy(studentId, now)
    return generateFreeSlots(busy, { now: now.local, horizonDays })
  }

  // ========== Planning ==========

  function resolveDeadline(dueDate: string | null | undefined): LocalDateTime | undefined {
    if (dueDate == null || dueDate.trim() === '') return undefined
    const parsed = deadlineFromDueDate(dueDate)
    if (!parsed.ok) throw new ValidationError(`Invalid due date: ${parsed.error.message}`)
    return parsed.value
  }

  function toCalendarEvent(
    studentId: string,
    assignment: ScheduledAssignment,
    moduleId: string | null | undefined,
    createdAt: string
  ): CalendarEvent {
    return {
      id: randomUUID() as EventId,
      studentId,
      title: assignment.title.slice(0, MAX_EVENT_TITLE_LENGTH),
      startAt: toUTC(assignment.start, timezone),
      endAt: toUTC(assignment.end, timezone),
      ...(assignment.focus != null ? { location: assignment.focus } : {}),
      ...(moduleId != null ? { moduleId } : {}),
      createdAt,
    }
  }

  async function planTask(studentId: string, input: PlanTaskInput): Promise<PlanResult> {
    return serialized(() => runPlan(studentId, input))
  }

  async function runPlan(studentId: string, input: PlanTaskInput): Promise<PlanResult> {
    requireStudent(studentId)
    if (!input || !Array.isArray(input.items)) {
      throw new ValidationError('items must be an array')
    }

    const title = input.title?.trim() || DEFAULT_TASK_TITLE
    const deadline = resolveDeadline(input.dueDate)

    if (input.items.length === 0) {
      return { scheduled: [], unscheduled: [], events: [], message: summarizePlan(0, 0) }
    }

    const now = readNow()
    const busy = await loadBusy(studentId, now)
    const freeSlots = generateFreeSlots(busy, { now: now.local, horizonDays })
    const requests = toWorkItemRequests(title, input.items, { now: now.local, timezone })
    const { scheduled, unscheduled } = scheduleWorkItems(requests, freeSlots, {
      now: now.local,
      ...(deadline ? { deadline } : {}),
    })

    const createdAt = now.instant.toISOString()
    const events = await adapter.transaction(async () => {
      const created: CalendarEvent[] = []
      for (const assignment of scheduled) {
        const event = toCalendarEvent(studentId, assignment, input.moduleId, createdAt)
        await adapter.createEvent(event)
        created.push(event)
      }
      return created
    })

    const result: PlanResult = {
      scheduled,
      unscheduled,
      events,
      message: summarizePlan(scheduled.length, unscheduled.length),
      ...(deadline ? { deadline } : {}),
    }

    emit('scheduled', Object.freeze({ ...result }))
    for (const item of unscheduled) {
      emit('unscheduled', Object.freeze({ ...item }))
    }

    return result
  }

  async function getEvents(studentId: string): Promise<CalendarEvent[]> {
    requireStudent(studentId)
    return adapter.getEventsByStudent(studentId)
  }

  return {
    getBusyIntervals,
    getFreeSlots,
    planTask,
    getEvents,
    on,
  }
}
