/**
 * Plan Hint Resolution
 *
 * Turns the free-text preferred-time hints that come back from an AI task
 * breakdown ("2026-03-15", "15 Mar 2026 evening", "Tuesday afternoon",
 * ISO datetimes) into a concrete LocalDateTime in the student's timezone.
 * The scheduler only ever sees the resolved value.
 */

import type { LocalDate, LocalDateTime, Weekday } from './time-date'
import {
  addDays, addMinutes, dateOf, dayOfWeek, daysInMonth,
  makeDate, makeDateTime, makeTime, parseDate, toLocal, weekdayToIndex,
} from './time-date'

// ============================================================================
// Types
// ============================================================================

export type PlanHintContext = {
  now: LocalDateTime
  timezone: string
}

// ============================================================================
// Vocabulary
// ============================================================================

/** Checked in order; the first keyword found sets the hour. */
const TIME_OF_DAY: Array<[string, number]> = [
  ['evening', 19],
  ['afternoon', 14],
  ['morning', 10],
  ['night', 21],
]

const DEFAULT_HINT_HOUR = 9

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
]

const WEEKDAY_NAMES = new Map<string, Weekday>([
  ['monday', 'mon'], ['mon', 'mon'],
  ['tuesday', 'tue'], ['tue', 'tue'], ['tues', 'tue'],
  ['wednesday', 'wed'], ['wed', 'wed'],
  ['thursday', 'thu'], ['thu', 'thu'], ['thurs', 'thu'],
  ['friday', 'fri'], ['fri', 'fri'],
  ['saturday', 'sat'], ['sat', 'sat'],
  ['sunday', 'sun'], ['sun', 'sun'],
])

// ============================================================================
// Helpers
// ============================================================================

function hintHour(lower: string): number {
  for (const [keyword, hour] of TIME_OF_DAY) {
    if (lower.includes(keyword)) return hour
  }
  return DEFAULT_HINT_HOUR
}

function stripTimeOfDay(value: string): string {
  return value.replace(/\s+(evening|afternoon|morning|night)\b.*$/i, '').trim()
}

/** Full month name or its three-letter abbreviation → 1..12 */
function monthNumber(name: string): number | null {
  const lower = name.toLowerCase()
  const idx = MONTHS.findIndex((m) => m === lower || (lower.length === 3 && m.startsWith(lower)))
  return idx === -1 ? null : idx + 1
}

function validDate(year: number, month: number, day: number): LocalDate | null {
  if (month < 1 || month > 12) return null
  if (day < 1 || day > daysInMonth(year, month)) return null
  return makeDate(year, month, day)
}

function at(date: LocalDate, hour: number, minute = 0, second = 0): LocalDateTime {
  return makeDateTime(date, makeTime(hour, minute, second))
}

// ============================================================================
// Date Forms
// ============================================================================

function parseNamedDate(value: string): LocalDate | null {
  // 15 Mar 2026 / 15 March 2026
  let m = /^(\d{1,2})\s+([A-Za-z]+)\s+(\d{4})$/.exec(value)
  if (m) {
    const month = monthNumber(m[2] ?? '')
    return month ? validDate(Number(m[3]), month, Number(m[1])) : null
  }
  // Mar 15 2026 / March 15 2026
  m = /^([A-Za-z]+)\s+(\d{1,2})\s+(\d{4})$/.exec(value)
  if (m) {
    const month = monthNumber(m[1] ?? '')
    return month ? validDate(Number(m[3]), month, Number(m[2])) : null
  }
  return null
}

function parseRelativeDay(value: string, today: LocalDate): LocalDate | null {
  const lower = value.toLowerCase()
  if (lower === 'today' || lower === 'tonight') return today
  if (lower === 'tomorrow') return addDays(today, 1)
  if (lower === 'next week') return addDays(today, 7)

  const name = lower.replace(/^(next|this)\s+/, '')
  const weekday = WEEKDAY_NAMES.get(name)
  if (!weekday) return null

  // Next occurrence strictly after today
  const diff = (weekdayToIndex(weekday) - weekdayToIndex(dayOfWeek(today)) + 7) % 7
  return addDays(today, diff === 0 ? 7 : diff)
}

function parseIso(value: string, timezone: string): LocalDateTime | null {
  const m = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/.exec(value)
  if (!m) return null

  const date = validDate(Number(m[1]), Number(m[2]), Number(m[3]))
  const hour = Number(m[4]), minute = Number(m[5]), second = Number(m[6] ?? 0)
  if (!date || hour > 23 || minute > 59 || second > 59) return null

  const local = at(date, hour, minute, second)
  const zone = m[7]
  if (zone === undefined) return local

  // Offset-qualified: normalise to UTC, then read in the student's timezone
  let offsetMinutes = 0
  if (zone !== 'Z') {
    const sign = zone.startsWith('-') ? -1 : 1
    const digits = zone.slice(1).replace(':', '')
    offsetMinutes = sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2)))
  }
  return toLocal(addMinutes(local, -offsetMinutes), timezone)
}

// ============================================================================
// Public Entry Point
// ============================================================================

/**
 * Resolve a hint to a timestamp, or null when it cannot be understood.
 * A date without a time takes the hour implied by a time-of-day keyword
 * (evening 19:00, afternoon 14:00, morning 10:00, night 21:00) or 09:00.
 */
export function parsePlanHint(text: string | null | undefined, context: PlanHintContext): LocalDateTime | null {
  if (!text) return null
  const value = text.trim()
  if (!value) return null

  const iso = parseIso(value, context.timezone)
  if (iso) return iso

  const hour = hintHour(value.toLowerCase())
  const datePart = stripTimeOfDay(value)

  const plain = parseDate(datePart)
  if (plain.ok) return at(plain.value, hour)

  const named = parseNamedDate(datePart)
  if (named) return at(named, hour)

  const relative = parseRelativeDay(datePart, dateOf(context.now))
  if (relative) return at(relative, hour)

  return null
}
