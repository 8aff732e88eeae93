/**
 * Month-Level Values
 *
 * Month-of-year helpers plus the YearMonth and MonthDay value types.
 */

import { type Result, Ok, Err } from './result'
import {
  type CalendarDate,
  buildDate,
  compareDates,
  daysInMonth,
  isLeapYear,
  MAX_YEAR,
  MIN_YEAR,
  ofDate,
} from './time-date'
import { floorDiv, floorMod, isIntegerInRange } from './internal/helpers'

export { InvalidDateError } from './errors'
import { InvalidDateError } from './errors'

// ============================================================================
// Month of Year
// ============================================================================

const MONTH_NAMES = [
  'JANUARY', 'FEBRUARY', 'MARCH', 'APRIL', 'MAY', 'JUNE',
  'JULY', 'AUGUST', 'SEPTEMBER', 'OCTOBER', 'NOVEMBER', 'DECEMBER',
] as const

export type MonthName = (typeof MONTH_NAMES)[number]

export function monthName(month: number): MonthName {
  return MONTH_NAMES[floorMod(month - 1, 12)] ?? 'JANUARY'
}

export function monthLength(month: number, leapYear: boolean): number {
  return daysInMonth(leapYear ? 2000 : 2001, month)
}

/** Shifts a month-of-year (1-12) by n months, wrapping around the year */
export function plusMonthOfYear(month: number, n: number): number {
  return floorMod(month - 1 + n, 12) + 1
}

// ============================================================================
// YearMonth
// ============================================================================

export type YearMonth = {
  readonly year: number
  readonly month: number
}

export function yearMonthOf(year: number, month: number): Result<YearMonth, InvalidDateError> {
  if (!isIntegerInRange(year, MIN_YEAR, MAX_YEAR)) {
    return Err(new InvalidDateError('year', year, `Invalid year: ${year} (expected ${MIN_YEAR} to ${MAX_YEAR})`))
  }
  if (!isIntegerInRange(month, 1, 12)) {
    return Err(new InvalidDateError('month', month, `Invalid month: ${month} (expected 1-12)`))
  }
  return Ok(Object.freeze({ year, month }))
}

export function yearMonthOfDate(date: CalendarDate): YearMonth {
  return Object.freeze({ year: date.year, month: date.month })
}

export function plusYearMonths(ym: YearMonth, n: number): YearMonth {
  const total = ym.year * 12 + (ym.month - 1) + n
  const year = floorDiv(total, 12)
  if (!isIntegerInRange(year, MIN_YEAR, MAX_YEAR)) {
    throw new InvalidDateError('year', year, `Invalid year: ${year} (expected ${MIN_YEAR} to ${MAX_YEAR})`)
  }
  return Object.freeze({ year, month: floorMod(total, 12) + 1 })
}

export function lengthOfYearMonth(ym: YearMonth): number {
  return daysInMonth(ym.year, ym.month)
}

export function atDay(ym: YearMonth, day: number): Result<CalendarDate, InvalidDateError> {
  return ofDate(ym.year, ym.month, day)
}

export function firstDayOf(ym: YearMonth): CalendarDate {
  return buildDate(ym.year, ym.month, 1)
}

export function lastDayOf(ym: YearMonth): CalendarDate {
  return buildDate(ym.year, ym.month, lengthOfYearMonth(ym))
}

export function compareYearMonths(a: YearMonth, b: YearMonth): number {
  if (a.year !== b.year) return a.year < b.year ? -1 : 1
  if (a.month !== b.month) return a.month < b.month ? -1 : 1
  return 0
}

// ============================================================================
// MonthDay
// ============================================================================

/** A month and day with no year; February 29 is allowed */
export type MonthDay = {
  readonly month: number
  readonly day: number
}

export function monthDayOf(month: number, day: number): Result<MonthDay, InvalidDateError> {
  if (!isIntegerInRange(month, 1, 12)) {
    return Err(new InvalidDateError('month', month, `Invalid month: ${month} (expected 1-12)`))
  }
  const maxDay = monthLength(month, true)
  if (!isIntegerInRange(day, 1, maxDay)) {
    return Err(new InvalidDateError('day', day, `Invalid day: ${day} for month ${month} (expected 1-${maxDay})`))
  }
  return Ok(Object.freeze({ month, day }))
}

/** Places the month-day in a year, moving Feb 29 to Feb 28 in non-leap years */
export function monthDayAtYear(md: MonthDay, year: number): CalendarDate {
  return buildDate(year, md.month, Math.min(md.day, monthLength(md.month, isLeapYear(year))))
}

export function compareMonthDays(a: MonthDay, b: MonthDay): number {
  // Any leap year orders month-days the same way
  return compareDates(monthDayAtYear(a, 2000), monthDayAtYear(b, 2000))
}
