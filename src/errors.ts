/**
 * Consolidated error system for pet-care-planner.
 *
 * All error classes extend PlannerError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import from either place.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const PlannerErrorCode = {
  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  FOREIGN_KEY: 'FOREIGN_KEY',
  INVALID_DATA: 'INVALID_DATA',

  // Scheduler input
  VALIDATION: 'VALIDATION',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type PlannerErrorCode = (typeof PlannerErrorCode)[keyof typeof PlannerErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class PlannerError extends Error {
  readonly code: PlannerErrorCode

  constructor(code: PlannerErrorCode, message: string) {
    super(message)
    this.name = 'PlannerError'
    this.code = code
  }
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends PlannerError {
  constructor(message: string) {
    super(PlannerErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends PlannerError {
  constructor(message: string) {
    super(PlannerErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class ForeignKeyError extends PlannerError {
  constructor(message: string) {
    super(PlannerErrorCode.FOREIGN_KEY, message)
    this.name = 'ForeignKeyError'
  }
}

export class InvalidDataError extends PlannerError {
  constructor(message: string) {
    super(PlannerErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Scheduler Errors
// ============================================================================

export class ValidationError extends PlannerError {
  constructor(message: string) {
    super(PlannerErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends PlannerError {
  constructor(message: string) {
    super(PlannerErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}
