/**
 * Adapter
 *
 * Calendar event persistence interface + in-memory mock implementation.
 * All methods are async so synchronous (better-sqlite3) and networked stores
 * fit the same shape. Event times are stored in UTC.
 */

import type { LocalDateTime } from './time-date'
import type { EventId } from './types'
import { DuplicateKeyError, InvalidDataError, NotFoundError } from './errors'

export type { LocalDate, LocalDateTime } from './time-date'
export type { EventId } from './types'
export { DuplicateKeyError, InvalidDataError, NotFoundError } from './errors'

// ============================================================================
// Entity Types
// ============================================================================

export type CalendarEvent = {
  id: EventId
  studentId: string
  title: string
  /** UTC */
  startAt: LocalDateTime
  /** UTC */
  endAt: LocalDateTime
  location?: string
  moduleId?: string
  createdAt: string
}

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  transaction<T>(fn: () => Promise<T>): Promise<T>

  createEvent(event: CalendarEvent): Promise<void>
  getEvent(id: EventId): Promise<CalendarEvent | null>
  getEventsByStudent(studentId: string): Promise<CalendarEvent[]>
  /** Events whose startAt lies in [from, to], ordered by startAt */
  getEventsStartingBetween(studentId: string, from: LocalDateTime, to: LocalDateTime): Promise<CalendarEvent[]>
  deleteEvent(id: EventId): Promise<void>

  // Lifecycle (persistent adapters only)
  close?(): Promise<void>
}

// ============================================================================
// Shared Validation
// ============================================================================

export function assertValidEvent(event: CalendarEvent): void {
  if (!event.title) throw new InvalidDataError(`Event '${event.id}' has no title`)
  if (event.endAt <= event.startAt) {
    throw new InvalidDataError(`Event '${event.id}' ends at or before its start`)
  }
}

export function compareEvents(a: CalendarEvent, b: CalendarEvent): number {
  if (a.startAt !== b.startAt) return a.startAt < b.startAt ? -1 : 1
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockAdapter(): Adapter {
  // ---- State ----
  let events = new Map<EventId, CalendarEvent>()

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: Map<EventId, CalendarEvent> | null = null

  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  const adapter: Adapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      const isOutermost = txDepth === 0
      if (isOutermost) {
        snapshot = clone(events)
      }
      txDepth++
      try {
        const result = await fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          events = snapshot
          snapshot = null
        }
        throw e
      }
    },

    // ================================================================
    // Events
    // ================================================================
    async createEvent(event: CalendarEvent) {
      if (events.has(event.id)) {
        throw new DuplicateKeyError(`Event '${event.id}' already exists`)
      }
      assertValidEvent(event)
      events.set(event.id, clone(event))
    },

    async getEvent(id: EventId) {
      const e = events.get(id)
      return e ? clone(e) : null
    },

    async getEventsByStudent(studentId: string) {
      return [...events.values()]
        .filter((e) => e.studentId === studentId)
        .sort(compareEvents)
        .map(clone)
    },

    async getEventsStartingBetween(studentId: string, from: LocalDateTime, to: LocalDateTime) {
      return [...events.values()]
        .filter((e) => e.studentId === studentId && e.startAt >= from && e.startAt <= to)
        .sort(compareEvents)
        .map(clone)
    },

    async deleteEvent(id: EventId) {
      if (!events.delete(id)) throw new NotFoundError(`Event '${id}' not found`)
    },
  }

  return adapter
}
