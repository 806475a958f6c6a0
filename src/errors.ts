/**
 * Error system for recurrence-picker.
 *
 * All error classes extend PickerError, which carries a typed error code.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const PickerErrorCode = {
  // Construction
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',

  // Queries
  INVALID_STEPS: 'INVALID_STEPS',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',
  DATE_OUT_OF_RANGE: 'DATE_OUT_OF_RANGE',
} as const

export type PickerErrorCode = (typeof PickerErrorCode)[keyof typeof PickerErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class PickerError extends Error {
  readonly code: PickerErrorCode

  constructor(code: PickerErrorCode, message: string) {
    super(message)
    this.name = 'PickerError'
    this.code = code
  }
}

// ============================================================================
// Subclasses
// ============================================================================

/** Raised once, at construction. The instance is unusable; build a new one. */
export class InvalidConfigurationError extends PickerError {
  constructor(message: string) {
    super(PickerErrorCode.INVALID_CONFIGURATION, message)
    this.name = 'InvalidConfigurationError'
  }
}

export class InvalidStepsError extends PickerError {
  constructor(message: string) {
    super(PickerErrorCode.INVALID_STEPS, message)
    this.name = 'InvalidStepsError'
  }
}

export class ParseError extends PickerError {
  constructor(message: string) {
    super(PickerErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

/** Arithmetic left the four-digit years 0000..9999. */
export class DateRangeError extends PickerError {
  constructor(message: string) {
    super(PickerErrorCode.DATE_OUT_OF_RANGE, message)
    this.name = 'DateRangeError'
  }
}
