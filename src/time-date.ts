/**
 * Time & Date Utilities
 *
 * Pure functions for date/time parsing, arithmetic, and timezone conversion.
 * All scheduling math runs on wall-clock LocalDateTime values in the student's
 * timezone; stored UTC instants are converted at the boundary with toLocal/toUTC.
 * Uses Julian Day Number for date arithmetic to avoid month-length edge cases.
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 datetime string: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

const SECONDS_PER_DAY = 86400

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  const days = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (month === 2 && isLeapYear(year)) return 29
  return days[month] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

function toInt(s: string | undefined): number {
  return s === undefined ? 0 : parseInt(s, 10)
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = toInt(match[1])
  const month = toInt(match[2])
  const day = toInt(match[3])

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = toInt(match[1])
  const minute = toInt(match[2])
  const second = toInt(match[3])

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59)
    return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok(makeTime(hour, minute, second))
}

export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const tIdx = str.indexOf('T')
  if (tIdx === -1) return Err(new ParseError(`Invalid datetime format (missing T): '${str}'`))

  const dateResult = parseDate(str.substring(0, tIdx))
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  const timeResult = parseTime(str.substring(tIdx + 1))
  if (!timeResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  return Ok(makeDateTime(dateResult.value, timeResult.value))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

export function secondOf(time: LocalTime): number {
  return parseInt(time.substring(6, 8), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11) as LocalTime
}

function secondOfDay(time: LocalTime): number {
  return hourOf(time) * 3600 + minuteOf(time) * 60 + secondOf(time)
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  const { year, month, day } = jdnToDate(jdn + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  const jdnA = dateToJDN(yearOf(a), monthOf(a), dayOf(a))
  const jdnB = dateToJDN(yearOf(b), monthOf(b), dayOf(b))
  return jdnB - jdnA
}

// ============================================================================
// DateTime Arithmetic
// ============================================================================

/** Shift by whole seconds; fractional input is rounded to the nearest second. */
export function addSeconds(dt: LocalDateTime, n: number): LocalDateTime {
  let total = secondOfDay(timeOf(dt)) + Math.round(n)

  // Handle day overflow/underflow (avoid JS % sign-preservation bug)
  const dayDelta = Math.floor(total / SECONDS_PER_DAY)
  total = total - dayDelta * SECONDS_PER_DAY

  const hour = Math.floor(total / 3600)
  const minute = Math.floor((total % 3600) / 60)
  const second = total % 60

  const date = dayDelta === 0 ? dateOf(dt) : addDays(dateOf(dt), dayDelta)
  return makeDateTime(date, makeTime(hour, minute, second))
}

export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  return addSeconds(dt, n * 60)
}

export function secondsBetween(a: LocalDateTime, b: LocalDateTime): number {
  const days = daysBetween(dateOf(a), dateOf(b))
  return days * SECONDS_PER_DAY + (secondOfDay(timeOf(b)) - secondOfDay(timeOf(a)))
}

export function minutesBetween(a: LocalDateTime, b: LocalDateTime): number {
  return secondsBetween(a, b) / 60
}

/** Drop the seconds field. */
export function truncateToMinute(dt: LocalDateTime): LocalDateTime {
  const t = timeOf(dt)
  return makeDateTime(dateOf(dt), makeTime(hourOf(t), minuteOf(t), 0))
}

// ============================================================================
// Day-of-Week
// ============================================================================

const WEEKDAYS: Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

export function dayOfWeek(date: LocalDate): Weekday {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  // JDN 0 = Monday (Julian day 0 is Mon Jan 1, 4713 BC)
  const idx = ((jdn % 7) + 7) % 7
  return WEEKDAYS[idx] ?? 'mon'
}

export function weekdayToIndex(w: Weekday): number {
  return WEEKDAYS.indexOf(w)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function maxDateTime(a: LocalDateTime, b: LocalDateTime): LocalDateTime {
  return a >= b ? a : b
}

// ============================================================================
// Timezone Conversion
// ============================================================================

/** Given a UTC epoch in ms, return the UTC offset in minutes for timezone tz */
function utcOffsetAtMs(utcMs: number, tz: string): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  })

  const parts = formatter.formatToParts(new Date(utcMs))
  const get = (type: string) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  let h = get('hour')
  if (h === 24) h = 0
  const localMs = Date.UTC(get('year'), get('month') - 1, get('day'), h, get('minute'), get('second'))
  return (localMs - Math.floor(utcMs / 1000) * 1000) / 60000
}

/** Convert a LocalDateTime to epoch ms (treating it as UTC) */
function dtToMs(dt: LocalDateTime): number {
  const d = dateOf(dt), t = timeOf(dt)
  return Date.UTC(yearOf(d), monthOf(d) - 1, dayOf(d), hourOf(t), minuteOf(t), secondOf(t))
}

/** Convert epoch ms to a LocalDateTime (treating ms as UTC) */
function msToDt(ms: number): LocalDateTime {
  const d = new Date(ms)
  return makeDateTime(
    makeDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate()),
    makeTime(d.getUTCHours(), d.getUTCMinutes(), d.getUTCSeconds())
  )
}

export function toLocal(utc: LocalDateTime, tz: string): LocalDateTime {
  const utcMs = dtToMs(utc)
  const offset = utcOffsetAtMs(utcMs, tz)
  return msToDt(utcMs + offset * 60000)
}

/** Wall-clock reading of a JS Date in timezone tz (sub-second part dropped). */
export function fromDate(date: Date, tz: string): LocalDateTime {
  const utcMs = Math.floor(date.getTime() / 1000) * 1000
  return toLocal(msToDt(utcMs), tz)
}

export function toUTC(local: LocalDateTime, tz: string): LocalDateTime {
  if (tz === 'UTC') return local

  const localMs = dtToMs(local)
  const year = yearOf(dateOf(local))

  // Determine standard and daylight offsets from Jan/Jul
  const janMs = Date.UTC(year, 0, 15, 12, 0, 0)
  const julMs = Date.UTC(year, 6, 15, 12, 0, 0)
  const janOffset = utcOffsetAtMs(janMs, tz)
  const julOffset = utcOffsetAtMs(julMs, tz)

  if (janOffset === julOffset) {
    return msToDt(localMs - janOffset * 60000)
  }

  const stdOffset = Math.min(janOffset, julOffset)
  const dstOffset = Math.max(janOffset, julOffset)
  const dstStatus = isDSTAt(local, tz)

  if (dstStatus === 'gap') {
    // DST transitions are always minute-aligned
    const utcViaDst = localMs - dstOffset * 60000
    const utcViaStd = localMs - stdOffset * 60000
    for (let ms = utcViaDst; ms <= utcViaStd; ms += 60000) {
      if (utcOffsetAtMs(ms, tz) !== stdOffset) {
        return msToDt(ms)
      }
    }
    return msToDt(utcViaStd)
  }

  if (dstStatus === 'overlap') {
    // Use standard time (post-fallback)
    return msToDt(localMs - stdOffset * 60000)
  }

  if (dstStatus === true) {
    return msToDt(localMs - dstOffset * 60000)
  }

  return msToDt(localMs - stdOffset * 60000)
}

export function isDSTAt(
  dt: LocalDateTime,
  tz: string
): boolean | 'gap' | 'overlap' {
  if (tz === 'UTC') return false

  const localMs = dtToMs(dt)
  const year = yearOf(dateOf(dt))

  const janMs = Date.UTC(year, 0, 15, 12, 0, 0)
  const julMs = Date.UTC(year, 6, 15, 12, 0, 0)
  const janOffset = utcOffsetAtMs(janMs, tz)
  const julOffset = utcOffsetAtMs(julMs, tz)

  if (janOffset === julOffset) return false

  const stdOffset = Math.min(janOffset, julOffset)
  const dstOffset = Math.max(janOffset, julOffset)

  // Try both possible offsets to map local → UTC, then check round-trip
  const utcViaStd = localMs - stdOffset * 60000
  const utcViaDst = localMs - dstOffset * 60000

  const localViaStd = utcViaStd + utcOffsetAtMs(utcViaStd, tz) * 60000
  const localViaDst = utcViaDst + utcOffsetAtMs(utcViaDst, tz) * 60000

  const stdMapsBack = localViaStd === localMs
  const dstMapsBack = localViaDst === localMs

  if (stdMapsBack && dstMapsBack) return 'overlap'
  if (!stdMapsBack && !dstMapsBack) return 'gap'

  return dstMapsBack
}

export function isValidTimezone(tz: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
}
