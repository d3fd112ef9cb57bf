/**
 * Consolidated error system for the study slot scheduler.
 *
 * All error classes extend SchedulerError, which carries a typed error code.
 * The scheduling core itself never throws: rejected placements degrade to
 * unscheduled items. These errors belong to the boundary (configuration,
 * input validation, parsing, persistence).
 */

// ============================================================================
// Error Codes
// ============================================================================

export const SchedulerErrorCode = {
  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_DATA: 'INVALID_DATA',

  // Planner API
  VALIDATION: 'VALIDATION',

  // Time & date, plan hints
  PARSE_ERROR: 'PARSE_ERROR',

  // Intervals
  INVALID_RANGE: 'INVALID_RANGE',
} as const

export type SchedulerErrorCode = (typeof SchedulerErrorCode)[keyof typeof SchedulerErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode

  constructor(code: SchedulerErrorCode, message: string) {
    super(message)
    this.name = 'SchedulerError'
    this.code = code
  }
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends SchedulerError {
  constructor(message: string) {
    super(SchedulerErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends SchedulerError {
  constructor(message: string) {
    super(SchedulerErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class InvalidDataError extends SchedulerError {
  constructor(message: string) {
    super(SchedulerErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Planner API Errors
// ============================================================================

export class ValidationError extends SchedulerError {
  constructor(message: string) {
    super(SchedulerErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Parsing Errors
// ============================================================================

export class ParseError extends SchedulerError {
  constructor(message: string) {
    super(SchedulerErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Interval Errors
// ============================================================================

export class InvalidRangeError extends SchedulerError {
  constructor(message: string) {
    super(SchedulerErrorCode.INVALID_RANGE, message)
    this.name = 'InvalidRangeError'
  }
}
