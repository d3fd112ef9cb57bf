/**
 * Segment 07: Plan Hint Resolution Tests
 *
 * Free-text preferred times resolved against a fixed Monday morning.
 */

import { describe, it, expect } from 'vitest'
import { parsePlanHint, type PlanHintContext } from '../src/plan-hint'
import type { LocalDateTime } from '../src/time-date'

const context: PlanHintContext = {
  now: '2026-03-02T08:00:00' as LocalDateTime,
  timezone: 'UTC',
}

describe('parsePlanHint', () => {
  describe('dates', () => {
    it('defaults a bare date to 09:00', () => {
      expect(parsePlanHint('2026-03-15', context)).toBe('2026-03-15T09:00:00')
    })

    it('honours a time-of-day keyword', () => {
      expect(parsePlanHint('2026-03-15 evening', context)).toBe('2026-03-15T19:00:00')
      expect(parsePlanHint('15 Mar 2026 afternoon', context)).toBe('2026-03-15T14:00:00')
      expect(parsePlanHint('March 15 2026 morning', context)).toBe('2026-03-15T10:00:00')
    })

    it('reads day-month-year and month-day-year names', () => {
      expect(parsePlanHint('15 March 2026', context)).toBe('2026-03-15T09:00:00')
      expect(parsePlanHint('Mar 15 2026', context)).toBe('2026-03-15T09:00:00')
    })

    it('rejects impossible dates', () => {
      expect(parsePlanHint('2026-02-30', context)).toBeNull()
      expect(parsePlanHint('31 Feb 2026', context)).toBeNull()
    })
  })

  describe('datetimes', () => {
    it('keeps an explicit wall-clock time', () => {
      expect(parsePlanHint('2026-03-15T14:30', context)).toBe('2026-03-15T14:30:00')
      expect(parsePlanHint('2026-03-15 14:30', context)).toBe('2026-03-15T14:30:00')
    })

    it('drops fractional seconds', () => {
      expect(parsePlanHint('2026-03-15T14:30:15.250', context)).toBe('2026-03-15T14:30:15')
    })

    it('converts an offset to the student timezone', () => {
      expect(parsePlanHint('2026-03-15T14:30:00+02:00', context)).toBe('2026-03-15T12:30:00')
      expect(parsePlanHint('2026-03-15T14:30:00Z', { ...context, timezone: 'America/New_York' }))
        .toBe('2026-03-15T10:30:00')
    })
  })

  describe('relative days', () => {
    it('resolves today, tonight and tomorrow', () => {
      expect(parsePlanHint('today', context)).toBe('2026-03-02T09:00:00')
      expect(parsePlanHint('tonight', context)).toBe('2026-03-02T21:00:00')
      expect(parsePlanHint('Tomorrow Evening', context)).toBe('2026-03-03T19:00:00')
      expect(parsePlanHint('next week', context)).toBe('2026-03-09T09:00:00')
    })

    it('picks the next occurrence of a weekday', () => {
      expect(parsePlanHint('Wednesday morning', context)).toBe('2026-03-04T10:00:00')
      expect(parsePlanHint('next friday', context)).toBe('2026-03-06T09:00:00')
      expect(parsePlanHint('sun', context)).toBe('2026-03-08T09:00:00')
    })

    it('never resolves a weekday to today', () => {
      expect(parsePlanHint('Monday', context)).toBe('2026-03-09T09:00:00')
    })
  })

  describe('unusable hints', () => {
    it('returns null for empty input', () => {
      expect(parsePlanHint(null, context)).toBeNull()
      expect(parsePlanHint(undefined, context)).toBeNull()
      expect(parsePlanHint('   ', context)).toBeNull()
    })

    it('returns null for text it cannot place', () => {
      expect(parsePlanHint('someday', context)).toBeNull()
      expect(parsePlanHint('evening', context)).toBeNull()
      expect(parsePlanHint('constructor', context)).toBeNull()
    })
  })
})
