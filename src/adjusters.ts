/**
 * Date Adjusters
 *
 * Functions that move a date to a related date: month and year edges,
 * weekday searches and single-field replacement.
 */

import { type Result, Ok, Err } from './result'
import {
  type CalendarDate,
  type Weekday,
  buildDate,
  dayOfWeek,
  daysInMonth,
  daysInYear,
  fromEpochDay,
  ofDate,
  toEpochDay,
  weekdayToIndex,
} from './time-date'
import { floorMod, isIntegerInRange } from './internal/helpers'

export { InvalidDateError } from './errors'
import { InvalidDateError } from './errors'

// ============================================================================
// Month & Year Edges
// ============================================================================

export function firstDayOfMonth(date: CalendarDate): CalendarDate {
  return buildDate(date.year, date.month, 1)
}

export function lastDayOfMonth(date: CalendarDate): CalendarDate {
  return buildDate(date.year, date.month, daysInMonth(date.year, date.month))
}

export function firstDayOfNextMonth(date: CalendarDate): CalendarDate {
  return date.month === 12 ? buildDate(date.year + 1, 1, 1) : buildDate(date.year, date.month + 1, 1)
}

export function firstDayOfYear(date: CalendarDate): CalendarDate {
  return buildDate(date.year, 1, 1)
}

export function lastDayOfYear(date: CalendarDate): CalendarDate {
  return buildDate(date.year, 12, 31)
}

export function firstDayOfNextYear(date: CalendarDate): CalendarDate {
  return buildDate(date.year + 1, 1, 1)
}

// ============================================================================
// Weekday Searches
// ============================================================================

/** Days to move forward from `from` to reach `to`, in [0, 6] */
function daysUntil(from: Weekday, to: Weekday): number {
  return floorMod(weekdayToIndex(to) - weekdayToIndex(from), 7)
}

function shiftDays(date: CalendarDate, n: number): CalendarDate {
  return n === 0 ? date : fromEpochDay(toEpochDay(date) + n)
}

/** First occurrence of the weekday in the date's month */
export function firstInMonth(date: CalendarDate, weekday: Weekday): CalendarDate {
  const first = firstDayOfMonth(date)
  return shiftDays(first, daysUntil(dayOfWeek(first), weekday))
}

/** Last occurrence of the weekday in the date's month */
export function lastInMonth(date: CalendarDate, weekday: Weekday): CalendarDate {
  const last = lastDayOfMonth(date)
  return shiftDays(last, -daysUntil(weekday, dayOfWeek(last)))
}

/** Next date falling on the weekday, strictly after the input */
export function nextWeekday(date: CalendarDate, weekday: Weekday): CalendarDate {
  const n = daysUntil(dayOfWeek(date), weekday)
  return shiftDays(date, n === 0 ? 7 : n)
}

export function nextOrSameWeekday(date: CalendarDate, weekday: Weekday): CalendarDate {
  return shiftDays(date, daysUntil(dayOfWeek(date), weekday))
}

export function previousWeekday(date: CalendarDate, weekday: Weekday): CalendarDate {
  const n = daysUntil(weekday, dayOfWeek(date))
  return shiftDays(date, n === 0 ? -7 : -n)
}

export function previousOrSameWeekday(date: CalendarDate, weekday: Weekday): CalendarDate {
  return shiftDays(date, -daysUntil(weekday, dayOfWeek(date)))
}

// ============================================================================
// Field Replacement
// ============================================================================
// Unlike month arithmetic these never clamp: an impossible result is an error.

export function withDayOfMonth(date: CalendarDate, day: number): Result<CalendarDate, InvalidDateError> {
  return ofDate(date.year, date.month, day)
}

export function withMonth(date: CalendarDate, month: number): Result<CalendarDate, InvalidDateError> {
  return ofDate(date.year, month, date.day)
}

export function withYear(date: CalendarDate, year: number): Result<CalendarDate, InvalidDateError> {
  return ofDate(year, date.month, date.day)
}

export function withDayOfYear(date: CalendarDate, dayOfYear: number): Result<CalendarDate, InvalidDateError> {
  const length = daysInYear(date.year)
  if (!isIntegerInRange(dayOfYear, 1, length)) {
    return Err(new InvalidDateError('dayOfYear', dayOfYear, `Invalid day of year: ${dayOfYear} (expected 1-${length})`))
  }
  return Ok(shiftDays(firstDayOfYear(date), dayOfYear - 1))
}
