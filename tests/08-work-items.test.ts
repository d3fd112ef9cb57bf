/**
 * Segment 08: Work Item Tests
 *
 * Normalising a task breakdown into scheduler requests.
 */

import { describe, it, expect } from 'vitest'
import {
  normalizeEstimatedHours,
  itemTitle,
  toWorkItemRequests,
  deadlineFromDueDate,
} from '../src/work-items'
import { ParseError } from '../src/errors'
import type { LocalDateTime } from '../src/time-date'

const context = { now: '2026-03-02T08:00:00' as LocalDateTime, timezone: 'UTC' }

describe('normalizeEstimatedHours', () => {
  it.each([
    [2.5, 2.5],
    ['3', 3],
    [' 1.5 ', 1.5],
    [10, 6],
    [0.1, 0.5],
    [0, 0.5],
    [-1, 0.5],
  ])('%j → %d', (input, expected) => {
    expect(normalizeEstimatedHours(input)).toBe(expected)
  })

  it.each([[undefined], [null], [''], ['abc'], [Number.NaN], [Number.POSITIVE_INFINITY], [{}]])(
    'falls back to 2h for %j',
    (input) => {
      expect(normalizeEstimatedHours(input)).toBe(2)
    }
  )
})

describe('itemTitle', () => {
  it('joins task and item names', () => {
    expect(itemTitle('Essay', { title: 'Outline' })).toBe('Essay: Outline')
  })

  it('names an untitled item Subtask', () => {
    expect(itemTitle('Essay', { title: '   ' })).toBe('Essay: Subtask')
    expect(itemTitle('Essay', {})).toBe('Essay: Subtask')
  })
})

describe('toWorkItemRequests', () => {
  it('keeps input order and resolves hints', () => {
    const requests = toWorkItemRequests('Essay', [
      { title: 'Outline', estimatedHours: 1.5, plannedStart: '2026-03-04', focus: ' Library ' },
      { title: 'Draft', estimatedHours: 'x', plannedStart: 'whenever' },
    ], context)

    expect(requests).toEqual([
      {
        title: 'Essay: Outline',
        durationMinutes: 90,
        preferredStart: '2026-03-04T09:00:00',
        index: 0,
        focus: 'Library',
      },
      { title: 'Essay: Draft', durationMinutes: 120, index: 1 },
    ])
    expect('preferredStart' in (requests[1] ?? {})).toBe(false)
  })

  it('omits a blank focus', () => {
    const [req] = toWorkItemRequests('Essay', [{ title: 'Edit', focus: '  ' }], context)
    expect(req).toEqual({ title: 'Essay: Edit', durationMinutes: 120, index: 0 })
  })
})

describe('deadlineFromDueDate', () => {
  it('is due at 23:59 on the day', () => {
    const result = deadlineFromDueDate(' 2026-03-20 ')
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value).toBe('2026-03-20T23:59:00')
  })

  it('rejects anything but YYYY-MM-DD', () => {
    const result = deadlineFromDueDate('next week')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toBeInstanceOf(ParseError)
  })
})
