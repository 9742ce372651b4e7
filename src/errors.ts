/**
 * Consolidated error system for care-planner.
 *
 * All error classes extend CarePlannerError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * wherever the failing operation lives.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CarePlannerErrorCode = {
  // Input boundary
  VALIDATION: 'VALIDATION',
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Aggregate lookups
  NOT_FOUND: 'NOT_FOUND',

  // Scheduler fail-fast guard
  INVALID_TASK: 'INVALID_TASK',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type CarePlannerErrorCode = (typeof CarePlannerErrorCode)[keyof typeof CarePlannerErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CarePlannerError extends Error {
  readonly code: CarePlannerErrorCode

  constructor(code: CarePlannerErrorCode, message: string) {
    super(message)
    this.name = 'CarePlannerError'
    this.code = code
  }
}

// ============================================================================
// Input Boundary Errors
// ============================================================================

export class ValidationError extends CarePlannerError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(CarePlannerErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
    this.issues = issues
  }
}

export class ConfigError extends CarePlannerError {
  constructor(message: string) {
    super(CarePlannerErrorCode.INVALID_CONFIG, message)
    this.name = 'ConfigError'
  }
}

// ============================================================================
// Aggregate Errors
// ============================================================================

export class NotFoundError extends CarePlannerError {
  constructor(message: string) {
    super(CarePlannerErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

// ============================================================================
// Scheduler Errors
// ============================================================================

export class InvalidTaskError extends CarePlannerError {
  constructor(message: string) {
    super(CarePlannerErrorCode.INVALID_TASK, message)
    this.name = 'InvalidTaskError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends CarePlannerError {
  constructor(message: string) {
    super(CarePlannerErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}
