/**
 * Segment 04: Free-Slot Generator Tests
 *
 * Working windows over the horizon, clipped to "now", minus busy time.
 */

import { describe, it, expect } from 'vitest'
import { generateFreeSlots, workingWindow } from '../src/free-slots'
import type { LocalDate, LocalDateTime } from '../src/time-date'
import type { BusyInterval, FreeSlot } from '../src/types'

function datetime(iso: string): LocalDateTime {
  return iso as LocalDateTime
}

function slot(start: string, end: string): FreeSlot {
  return { start: datetime(start), end: datetime(end) }
}

function busy(start: string, end: string): BusyInterval {
  return { start: datetime(start), end: datetime(end) }
}

const MONDAY_MORNING = datetime('2026-03-02T08:00:00')

describe('workingWindow', () => {
  it('spans 09:00 to 21:00', () => {
    expect(workingWindow('2026-03-02' as LocalDate)).toEqual(
      slot('2026-03-02T09:00:00', '2026-03-02T21:00:00')
    )
  })
})

describe('generateFreeSlots', () => {
  it('yields one full window per day with no busy time', () => {
    const slots = generateFreeSlots([], { now: MONDAY_MORNING, horizonDays: 2 })
    expect(slots).toEqual([
      slot('2026-03-02T09:00:00', '2026-03-02T21:00:00'),
      slot('2026-03-03T09:00:00', '2026-03-03T21:00:00'),
    ])
  })

  it('defaults to a 21-day horizon', () => {
    const slots = generateFreeSlots([], { now: MONDAY_MORNING })
    expect(slots).toHaveLength(21)
    expect(slots[20]).toEqual(slot('2026-03-22T09:00:00', '2026-03-22T21:00:00'))
  })

  it('clips the first window to now, keeping seconds', () => {
    const slots = generateFreeSlots([], { now: datetime('2026-03-02T10:15:20'), horizonDays: 1 })
    expect(slots).toEqual([slot('2026-03-02T10:15:20', '2026-03-02T21:00:00')])
  })

  it('skips a day whose window has ended', () => {
    const slots = generateFreeSlots([], { now: datetime('2026-03-02T21:00:00'), horizonDays: 2 })
    expect(slots).toEqual([slot('2026-03-03T09:00:00', '2026-03-03T21:00:00')])
  })

  it('drops a clipped remainder shorter than 30 minutes', () => {
    const slots = generateFreeSlots([], { now: datetime('2026-03-02T20:45:00'), horizonDays: 1 })
    expect(slots).toEqual([])
  })

  it('subtracts a busy hour', () => {
    const slots = generateFreeSlots(
      [busy('2026-03-02T10:00:00', '2026-03-02T11:00:00')],
      { now: MONDAY_MORNING, horizonDays: 1 }
    )
    expect(slots).toEqual([
      slot('2026-03-02T09:00:00', '2026-03-02T10:00:00'),
      slot('2026-03-02T11:00:00', '2026-03-02T21:00:00'),
    ])
  })

  it('drops gaps shorter than 30 minutes', () => {
    const slots = generateFreeSlots(
      [
        busy('2026-03-02T09:20:00', '2026-03-02T12:00:00'),
        busy('2026-03-02T12:20:00', '2026-03-02T20:00:00'),
      ],
      { now: MONDAY_MORNING, horizonDays: 1 }
    )
    expect(slots).toEqual([slot('2026-03-02T20:00:00', '2026-03-02T21:00:00')])
  })

  it('a busy interval only affects the day it starts on', () => {
    const slots = generateFreeSlots(
      [busy('2026-03-02T20:00:00', '2026-03-03T10:00:00')],
      { now: MONDAY_MORNING, horizonDays: 2 }
    )
    expect(slots).toEqual([
      slot('2026-03-02T09:00:00', '2026-03-02T20:00:00'),
      slot('2026-03-03T09:00:00', '2026-03-03T21:00:00'),
    ])
  })

  it('a fully booked day contributes nothing', () => {
    const slots = generateFreeSlots(
      [busy('2026-03-02T08:00:00', '2026-03-02T22:00:00')],
      { now: MONDAY_MORNING, horizonDays: 2 }
    )
    expect(slots).toEqual([slot('2026-03-03T09:00:00', '2026-03-03T21:00:00')])
  })

  it('busy time before now does not re-open the clipped window', () => {
    const slots = generateFreeSlots(
      [busy('2026-03-02T09:00:00', '2026-03-02T09:30:00')],
      { now: datetime('2026-03-02T12:00:00'), horizonDays: 1 }
    )
    expect(slots).toEqual([slot('2026-03-02T12:00:00', '2026-03-02T21:00:00')])
  })
})
