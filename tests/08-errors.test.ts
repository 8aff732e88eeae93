/**
 * Segment 08: Error System Tests
 *
 * Tests the consolidated error system in errors.ts and the Result helpers:
 * CalendricalError base class, error code enum, and all error subclasses.
 */

import { describe, it, expect } from 'vitest'
import {
  CalendricalError,
  CalendricalErrorCode,
  InvalidDateError,
  InvalidAmountError,
  UnsupportedUnitError,
  InvalidRangeError,
  ParseError,
  InvalidZoneError,
} from '../src/errors'
import { Ok, Err, unwrap } from '../src/result'
import * as api from '../src/index'

describe('Segment 08: Error System', () => {
  // ========================================================================
  // CalendricalError Base Class
  // ========================================================================

  describe('CalendricalError base class', () => {
    it('constructor sets code and message', () => {
      const err = new CalendricalError(CalendricalErrorCode.INVALID_DATE, 'test message')
      expect(err.code).toBe('INVALID_DATE')
      expect(err.message).toBe('test message')
    })

    it('is an Error', () => {
      expect(new CalendricalError(CalendricalErrorCode.PARSE_ERROR, 'x')).toBeInstanceOf(Error)
    })

    it('name property is CalendricalError', () => {
      expect(new CalendricalError(CalendricalErrorCode.PARSE_ERROR, 'x').name).toBe('CalendricalError')
    })
  })

  // ========================================================================
  // Subclasses
  // ========================================================================

  describe('InvalidDateError', () => {
    const err = new InvalidDateError('month', 13, 'Invalid month: 13 (expected 1-12)')

    it('carries the field and value', () => {
      expect(err.field).toBe('month')
      expect(err.value).toBe(13)
    })

    it('has code, name and base class', () => {
      expect(err.code).toBe(CalendricalErrorCode.INVALID_DATE)
      expect(err.name).toBe('InvalidDateError')
      expect(err).toBeInstanceOf(CalendricalError)
    })
  })

  describe('InvalidAmountError', () => {
    it('carries the rejected amount', () => {
      const err = new InvalidAmountError(1.5)
      expect(err.amount).toBe(1.5)
      expect(err.message).toBe('Invalid amount: 1.5 (expected an integer)')
      expect(err.code).toBe('INVALID_AMOUNT')
      expect(err.name).toBe('InvalidAmountError')
      expect(err).toBeInstanceOf(CalendricalError)
    })
  })

  describe('UnsupportedUnitError', () => {
    it('formats its message from unit and value kind', () => {
      const err = new UnsupportedUnitError('weeks', 'time')
      expect(err.message).toBe("Unit 'weeks' is not supported for time values")
      expect(err.code).toBe('UNSUPPORTED_UNIT')
      expect(err.name).toBe('UnsupportedUnitError')
    })
  })

  describe('InvalidRangeError', () => {
    it('has code and name', () => {
      const err = new InvalidRangeError('broken')
      expect(err.code).toBe('INVALID_RANGE')
      expect(err.name).toBe('InvalidRangeError')
      expect(err).toBeInstanceOf(CalendricalError)
    })
  })

  describe('ParseError', () => {
    it('has code and name', () => {
      const err = new ParseError('bad text')
      expect(err.code).toBe('PARSE_ERROR')
      expect(err.name).toBe('ParseError')
    })
  })

  describe('InvalidZoneError', () => {
    it('carries the zone id', () => {
      const err = new InvalidZoneError('Mars/Olympus')
      expect(err.zone).toBe('Mars/Olympus')
      expect(err.code).toBe('INVALID_ZONE')
      expect(err.message).toBe("Unknown time zone: 'Mars/Olympus'")
    })
  })

  it('lists every error code', () => {
    expect(Object.values(CalendricalErrorCode)).toEqual([
      'INVALID_DATE', 'INVALID_AMOUNT', 'UNSUPPORTED_UNIT', 'INVALID_RANGE', 'PARSE_ERROR', 'INVALID_ZONE',
    ])
  })

  // ========================================================================
  // Result
  // ========================================================================

  describe('Result', () => {
    it('wraps values and errors', () => {
      expect(Ok(1)).toEqual({ ok: true, value: 1 })
      expect(Err('nope')).toEqual({ ok: false, error: 'nope' })
    })

    it('unwrap returns the value or throws the error', () => {
      expect(unwrap(Ok('yes'))).toBe('yes')
      expect(() => unwrap(Err(new ParseError('bad')))).toThrow(ParseError)
    })
  })

  // ========================================================================
  // Public API
  // ========================================================================

  it('re-exports the error classes from the package entry', () => {
    expect(api.InvalidDateError).toBe(InvalidDateError)
    expect(api.CalendricalError).toBe(CalendricalError)
    expect(api.InvalidRangeError).toBe(InvalidRangeError)
  })
})
