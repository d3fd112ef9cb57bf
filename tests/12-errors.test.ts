/**
 * Segment 12: Error System Tests
 */

import { describe, it, expect } from 'vitest'
import {
  SchedulerError,
  SchedulerErrorCode,
  DuplicateKeyError,
  NotFoundError,
  InvalidDataError,
  ValidationError,
  ParseError,
  InvalidRangeError,
} from '../src/index'

describe('error classes', () => {
  it.each([
    [new DuplicateKeyError('x'), 'DuplicateKeyError', SchedulerErrorCode.DUPLICATE_KEY],
    [new NotFoundError('x'), 'NotFoundError', SchedulerErrorCode.NOT_FOUND],
    [new InvalidDataError('x'), 'InvalidDataError', SchedulerErrorCode.INVALID_DATA],
    [new ValidationError('x'), 'ValidationError', SchedulerErrorCode.VALIDATION],
    [new ParseError('x'), 'ParseError', SchedulerErrorCode.PARSE_ERROR],
    [new InvalidRangeError('x'), 'InvalidRangeError', SchedulerErrorCode.INVALID_RANGE],
  ])('%s carries its name and code', (error, name, code) => {
    expect(error).toBeInstanceOf(SchedulerError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe(name)
    expect(error.code).toBe(code)
    expect(error.message).toBe('x')
  })
})
