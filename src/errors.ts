/**
 * Consolidated error system for calendrical.
 *
 * All error classes extend CalendricalError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * the module they use.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CalendricalErrorCode = {
  // Construction
  INVALID_DATE: 'INVALID_DATE',

  // Arithmetic
  INVALID_AMOUNT: 'INVALID_AMOUNT',

  // Unit dispatch
  UNSUPPORTED_UNIT: 'UNSUPPORTED_UNIT',

  // Date ranges
  INVALID_RANGE: 'INVALID_RANGE',

  // ISO-8601 text
  PARSE_ERROR: 'PARSE_ERROR',

  // Zones
  INVALID_ZONE: 'INVALID_ZONE',
} as const

export type CalendricalErrorCode = (typeof CalendricalErrorCode)[keyof typeof CalendricalErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CalendricalError extends Error {
  readonly code: CalendricalErrorCode

  constructor(code: CalendricalErrorCode, message: string) {
    super(message)
    this.name = 'CalendricalError'
    this.code = code
  }
}

// ============================================================================
// Construction Errors
// ============================================================================

/** Calendar or clock field that failed validation */
export type DateField =
  | 'year'
  | 'month'
  | 'day'
  | 'dayOfYear'
  | 'hour'
  | 'minute'
  | 'second'
  | 'nano'

export class InvalidDateError extends CalendricalError {
  readonly field: DateField
  readonly value: number

  constructor(field: DateField, value: number, message: string) {
    super(CalendricalErrorCode.INVALID_DATE, message)
    this.name = 'InvalidDateError'
    this.field = field
    this.value = value
  }
}

// ============================================================================
// Arithmetic Errors
// ============================================================================

/** Amounts added to a value must be whole numbers of their unit */
export class InvalidAmountError extends CalendricalError {
  readonly amount: number

  constructor(amount: number) {
    super(CalendricalErrorCode.INVALID_AMOUNT, `Invalid amount: ${amount} (expected an integer)`)
    this.name = 'InvalidAmountError'
    this.amount = amount
  }
}

// ============================================================================
// Unit Dispatch Errors
// ============================================================================

export class UnsupportedUnitError extends CalendricalError {
  readonly unit: string
  readonly valueKind: string

  constructor(unit: string, valueKind: string) {
    super(CalendricalErrorCode.UNSUPPORTED_UNIT, `Unit '${unit}' is not supported for ${valueKind} values`)
    this.name = 'UnsupportedUnitError'
    this.unit = unit
    this.valueKind = valueKind
  }
}

// ============================================================================
// Date Range Errors
// ============================================================================

/**
 * Raised when a constructed range breaks its own invariants. Indicates a
 * defect in a period rule, never bad caller input.
 */
export class InvalidRangeError extends CalendricalError {
  constructor(message: string) {
    super(CalendricalErrorCode.INVALID_RANGE, message)
    this.name = 'InvalidRangeError'
  }
}

// ============================================================================
// Parsing Errors
// ============================================================================

export class ParseError extends CalendricalError {
  constructor(message: string) {
    super(CalendricalErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

export class InvalidZoneError extends CalendricalError {
  readonly zone: string

  constructor(zone: string) {
    super(CalendricalErrorCode.INVALID_ZONE, `Unknown time zone: '${zone}'`)
    this.name = 'InvalidZoneError'
    this.zone = zone
  }
}
