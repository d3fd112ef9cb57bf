/**
 * Work Items
 *
 * Adapts a raw task breakdown (as returned by the AI service or typed in by
 * hand) into ordered WorkItemRequests, and derives the scheduling deadline
 * from a task's due date.
 */

import type { LocalDateTime } from './time-date'
import type { WorkItemRequest } from './types'
import type { ParseError } from './errors'
import { makeDateTime, makeTime, parseDate } from './time-date'
import { type Result, Ok, Err } from './result'
import { parsePlanHint, type PlanHintContext } from './plan-hint'
import {
  DEFAULT_ESTIMATED_HOURS, MIN_ESTIMATED_HOURS, MAX_ESTIMATED_HOURS,
  DEFAULT_ITEM_TITLE, DUE_HOUR, DUE_MINUTE,
} from './constants'

// ============================================================================
// Types
// ============================================================================

/** One row of a task breakdown. Fields arrive loosely typed. */
export type WorkItemInput = {
  title?: string | null
  estimatedHours?: unknown
  plannedStart?: string | null
  focus?: string | null
}

// ============================================================================
// Duration
// ============================================================================

function parseHours(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (!trimmed) return null
    const n = Number(trimmed)
    return Number.isFinite(n) ? n : null
  }
  return null
}

/** Missing or unparsable → DEFAULT_ESTIMATED_HOURS; then clamped. */
export function normalizeEstimatedHours(value: unknown): number {
  const hours = parseHours(value) ?? DEFAULT_ESTIMATED_HOURS
  return Math.max(MIN_ESTIMATED_HOURS, Math.min(hours, MAX_ESTIMATED_HOURS))
}

// ============================================================================
// Requests
// ============================================================================

export function itemTitle(taskTitle: string, item: WorkItemInput): string {
  const name = item.title?.trim() || DEFAULT_ITEM_TITLE
  return `${taskTitle}: ${name}`
}

/** Requests keep the input order; `index` records each item's position. */
export function toWorkItemRequests(
  taskTitle: string,
  items: readonly WorkItemInput[],
  context: PlanHintContext
): WorkItemRequest[] {
  return items.map((item, index) => {
    const preferredStart = parsePlanHint(item.plannedStart, context)
    const focus = item.focus?.trim()
    return {
      title: itemTitle(taskTitle, item),
      durationMinutes: normalizeEstimatedHours(item.estimatedHours) * 60,
      ...(preferredStart ? { preferredStart } : {}),
      index,
      ...(focus ? { focus } : {}),
    }
  })
}

// ============================================================================
// Deadline
// ============================================================================

/** A YYYY-MM-DD due date is due at 23:59 local on that day. */
export function deadlineFromDueDate(dueDate: string): Result<LocalDateTime, ParseError> {
  const parsed = parseDate(dueDate.trim())
  if (!parsed.ok) return Err(parsed.error)
  return Ok(makeDateTime(parsed.value, makeTime(DUE_HOUR, DUE_MINUTE, 0)))
}
