/**
 * Time & Date Values
 *
 * Branded, frozen value types for calendar dates, times of day and combined
 * date-times, with validated construction, ISO-8601 parsing/formatting and
 * comparison. Day arithmetic goes through epoch-day numbers (days since
 * 1970-01-01 in the proleptic Gregorian calendar) so month lengths never
 * need special cases.
 */

import { type Result, Ok, Err } from './result'
import { floorDiv, floorMod, isIntegerInRange, pad2, pad4, pad9 } from './internal/helpers'

// ============================================================================
// Branded Types
// ============================================================================

declare const __calendarDate: unique symbol
declare const __timeOfDay: unique symbol
declare const __calendarDateTime: unique symbol

/** Proleptic Gregorian date. Only the constructors in this module produce one. */
export type CalendarDate = {
  readonly year: number
  readonly month: number
  readonly day: number
  readonly [__calendarDate]: true
}

/** Wall-clock time of day with nanosecond resolution */
export type TimeOfDay = {
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly nano: number
  readonly [__timeOfDay]: true
}

/** A date paired with a time of day, with no zone or offset */
export type CalendarDateTime = {
  readonly date: CalendarDate
  readonly time: TimeOfDay
  readonly [__calendarDateTime]: true
}

export type Temporal = CalendarDate | TimeOfDay | CalendarDateTime

export type TemporalKind = 'date' | 'time' | 'dateTime'

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

// ============================================================================
// Errors
// ============================================================================

export { InvalidDateError, ParseError } from './errors'
import { InvalidDateError, ParseError } from './errors'

// ============================================================================
// Constants
// ============================================================================

export const MIN_YEAR = -999_999_999
export const MAX_YEAR = 999_999_999

export const NANOS_PER_SECOND = 1_000_000_000
export const SECONDS_PER_DAY = 86_400
export const NANOS_PER_DAY = SECONDS_PER_DAY * NANOS_PER_SECOND

// 1970-01-01 counted from 0000-03-01
const DAYS_0000_TO_1970 = 719_468
const DAYS_PER_ERA = 146_097

// ============================================================================
// Validity Oracle
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28
    case 4:
    case 6:
    case 9:
    case 11:
      return 30
    default:
      return 31
  }
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

// ============================================================================
// Epoch Days
// ============================================================================

/** Days since 1970-01-01 (negative before it) */
export function toEpochDay(date: CalendarDate): number {
  const y = date.month <= 2 ? date.year - 1 : date.year
  const era = floorDiv(y, 400)
  const yearOfEra = y - era * 400
  const shiftedMonth = date.month > 2 ? date.month - 3 : date.month + 9
  const dayOfYr = Math.floor((153 * shiftedMonth + 2) / 5) + date.day - 1
  const dayOfEra = yearOfEra * 365 + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100) + dayOfYr
  return era * DAYS_PER_ERA + dayOfEra - DAYS_0000_TO_1970
}

export function fromEpochDay(epochDay: number): CalendarDate {
  const z = epochDay + DAYS_0000_TO_1970
  const era = floorDiv(z, DAYS_PER_ERA)
  const dayOfEra = z - era * DAYS_PER_ERA
  const yearOfEra = Math.floor(
    (dayOfEra - Math.floor(dayOfEra / 1460) + Math.floor(dayOfEra / 36524) - Math.floor(dayOfEra / 146096)) / 365
  )
  const dayOfYr = dayOfEra - (365 * yearOfEra + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100))
  const mp = Math.floor((5 * dayOfYr + 2) / 153)
  const day = dayOfYr - Math.floor((153 * mp + 2) / 5) + 1
  const month = mp < 10 ? mp + 3 : mp - 9
  const year = yearOfEra + era * 400 + (month <= 2 ? 1 : 0)
  return buildDate(year, month, day)
}

// ============================================================================
// Construction
// ============================================================================

function checkYear(year: number): InvalidDateError | undefined {
  if (!isIntegerInRange(year, MIN_YEAR, MAX_YEAR)) {
    return new InvalidDateError('year', year, `Invalid year: ${year} (expected ${MIN_YEAR} to ${MAX_YEAR})`)
  }
  return undefined
}

/**
 * Builds a date from fields already known to be a valid month/day pair.
 * Only the year is checked, since arithmetic can carry it out of range.
 */
export function buildDate(year: number, month: number, day: number): CalendarDate {
  const yearError = checkYear(year)
  if (yearError) throw yearError
  return Object.freeze({ year, month, day }) as CalendarDate
}

export function ofDate(year: number, month: number, day: number): Result<CalendarDate, InvalidDateError> {
  const yearError = checkYear(year)
  if (yearError) return Err(yearError)
  if (!isIntegerInRange(month, 1, 12)) {
    return Err(new InvalidDateError('month', month, `Invalid month: ${month} (expected 1-12)`))
  }
  const maxDay = daysInMonth(year, month)
  if (!isIntegerInRange(day, 1, maxDay)) {
    return Err(new InvalidDateError('day', day, `Invalid day: ${day} for ${formatYear(year)}-${pad2(month)} (expected 1-${maxDay})`))
  }
  return Ok(buildDate(year, month, day))
}

/** Like ofDate, but throws InvalidDateError */
export function makeDate(year: number, month: number, day: number): CalendarDate {
  const result = ofDate(year, month, day)
  if (!result.ok) throw result.error
  return result.value
}

export function ofTime(hour: number, minute: number, second = 0, nano = 0): Result<TimeOfDay, InvalidDateError> {
  if (!isIntegerInRange(hour, 0, 23)) {
    return Err(new InvalidDateError('hour', hour, `Invalid hour: ${hour} (expected 0-23)`))
  }
  if (!isIntegerInRange(minute, 0, 59)) {
    return Err(new InvalidDateError('minute', minute, `Invalid minute: ${minute} (expected 0-59)`))
  }
  if (!isIntegerInRange(second, 0, 59)) {
    return Err(new InvalidDateError('second', second, `Invalid second: ${second} (expected 0-59)`))
  }
  if (!isIntegerInRange(nano, 0, NANOS_PER_SECOND - 1)) {
    return Err(new InvalidDateError('nano', nano, `Invalid nano: ${nano} (expected 0-999999999)`))
  }
  return Ok(Object.freeze({ hour, minute, second, nano }) as TimeOfDay)
}

export function makeTime(hour: number, minute: number, second?: number, nano?: number): TimeOfDay {
  const result = ofTime(hour, minute, second, nano)
  if (!result.ok) throw result.error
  return result.value
}

export const MIDNIGHT: TimeOfDay = makeTime(0, 0)
export const NOON: TimeOfDay = makeTime(12, 0)

export function ofDateTime(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  nano = 0
): Result<CalendarDateTime, InvalidDateError> {
  const date = ofDate(year, month, day)
  if (!date.ok) return date
  const time = ofTime(hour, minute, second, nano)
  if (!time.ok) return time
  return Ok(atTime(date.value, time.value))
}

export function makeDateTime(
  year: number,
  month: number,
  day: number,
  hour?: number,
  minute?: number,
  second?: number,
  nano?: number
): CalendarDateTime {
  const result = ofDateTime(year, month, day, hour, minute, second, nano)
  if (!result.ok) throw result.error
  return result.value
}

export function atTime(date: CalendarDate, time: TimeOfDay): CalendarDateTime {
  return Object.freeze({ date, time }) as CalendarDateTime
}

export function atStartOfDay(date: CalendarDate): CalendarDateTime {
  return atTime(date, MIDNIGHT)
}

export function dateOf(dt: CalendarDateTime): CalendarDate {
  return dt.date
}

export function timeOf(dt: CalendarDateTime): TimeOfDay {
  return dt.time
}

// ============================================================================
// Nano-of-Day
// ============================================================================

export function toNanoOfDay(time: TimeOfDay): number {
  return ((time.hour * 60 + time.minute) * 60 + time.second) * NANOS_PER_SECOND + time.nano
}

/** Inverse of toNanoOfDay; the input must lie in [0, NANOS_PER_DAY) */
export function fromNanoOfDay(nanoOfDay: number): TimeOfDay {
  const totalSeconds = Math.floor(nanoOfDay / NANOS_PER_SECOND)
  const nano = nanoOfDay - totalSeconds * NANOS_PER_SECOND
  const hour = Math.floor(totalSeconds / 3600)
  const minute = Math.floor((totalSeconds % 3600) / 60)
  const second = totalSeconds % 60
  return makeTime(hour, minute, second, nano)
}

// ============================================================================
// Queries
// ============================================================================

export function kindOf(value: Temporal): TemporalKind {
  if ('date' in value) return 'dateTime'
  if ('hour' in value) return 'time'
  return 'date'
}

const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

export function weekdayToIndex(w: Weekday): number {
  return WEEKDAYS.indexOf(w)
}

export function indexToWeekday(i: number): Weekday {
  return WEEKDAYS[floorMod(i, 7)] ?? 'mon'
}

export function dayOfWeek(date: CalendarDate): Weekday {
  // 1970-01-01 was a Thursday (index 3)
  return indexToWeekday(toEpochDay(date) + 3)
}

/** Shifts a weekday by n days, wrapping around the week */
export function plusWeekdays(w: Weekday, n: number): Weekday {
  return indexToWeekday(weekdayToIndex(w) + n)
}

export function dayOfYear(date: CalendarDate): number {
  return toEpochDay(date) - toEpochDay(buildDate(date.year, 1, 1)) + 1
}

export function lengthOfMonth(date: CalendarDate): number {
  return daysInMonth(date.year, date.month)
}

export function lengthOfYear(date: CalendarDate): number {
  return daysInYear(date.year)
}

// ============================================================================
// Parsing
// ============================================================================

const DATE_PATTERN = /^([+-]\d{4,9}|\d{4})-(\d{2})-(\d{2})$/
const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/

export function parseDate(str: string): Result<CalendarDate, ParseError> {
  const match = DATE_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const [, yearText = '', monthText = '', dayText = ''] = match
  const result = ofDate(parseInt(yearText, 10), parseInt(monthText, 10), parseInt(dayText, 10))
  if (!result.ok) return Err(new ParseError(`Invalid ${result.error.field} in date: '${str}'`))
  return result
}

export function parseTime(str: string): Result<TimeOfDay, ParseError> {
  const match = TIME_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const [, hourText = '', minuteText = '', secondText, fractionText] = match
  const second = secondText ? parseInt(secondText, 10) : 0
  const nano = fractionText ? parseInt(fractionText.padEnd(9, '0'), 10) : 0
  const result = ofTime(parseInt(hourText, 10), parseInt(minuteText, 10), second, nano)
  if (!result.ok) return Err(new ParseError(`Invalid ${result.error.field} in time: '${str}'`))
  return result
}

export function parseDateTime(str: string): Result<CalendarDateTime, ParseError> {
  const tIdx = str.indexOf('T')
  if (tIdx === -1) return Err(new ParseError(`Invalid datetime format (missing T): '${str}'`))

  const dateResult = parseDate(str.substring(0, tIdx))
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  const timeResult = parseTime(str.substring(tIdx + 1))
  if (!timeResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  return Ok(atTime(dateResult.value, timeResult.value))
}

// ============================================================================
// Formatting
// ============================================================================

function formatYear(year: number): string {
  if (year > 9999) return '+' + year
  if (year < 0) return '-' + pad4(-year)
  return pad4(year)
}

export function formatDate(date: CalendarDate): string {
  return `${formatYear(date.year)}-${pad2(date.month)}-${pad2(date.day)}`
}

/** HH:MM:SS, with a 3, 6 or 9 digit fraction when nano is non-zero */
export function formatTime(time: TimeOfDay): string {
  const base = `${pad2(time.hour)}:${pad2(time.minute)}:${pad2(time.second)}`
  if (time.nano === 0) return base
  const fraction = pad9(time.nano)
  if (time.nano % 1_000_000 === 0) return `${base}.${fraction.substring(0, 3)}`
  if (time.nano % 1_000 === 0) return `${base}.${fraction.substring(0, 6)}`
  return `${base}.${fraction}`
}

export function formatDateTime(dt: CalendarDateTime): string {
  return `${formatDate(dt.date)}T${formatTime(dt.time)}`
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  if (a.year !== b.year) return a.year < b.year ? -1 : 1
  if (a.month !== b.month) return a.month < b.month ? -1 : 1
  if (a.day !== b.day) return a.day < b.day ? -1 : 1
  return 0
}

export function compareTimes(a: TimeOfDay, b: TimeOfDay): number {
  const na = toNanoOfDay(a)
  const nb = toNanoOfDay(b)
  if (na < nb) return -1
  if (na > nb) return 1
  return 0
}

export function compareDateTimes(a: CalendarDateTime, b: CalendarDateTime): number {
  const byDate = compareDates(a.date, b.date)
  return byDate !== 0 ? byDate : compareTimes(a.time, b.time)
}

export function dateEquals(a: CalendarDate, b: CalendarDate): boolean {
  return compareDates(a, b) === 0
}

export function timeEquals(a: TimeOfDay, b: TimeOfDay): boolean {
  return compareTimes(a, b) === 0
}

export function dateTimeEquals(a: CalendarDateTime, b: CalendarDateTime): boolean {
  return compareDateTimes(a, b) === 0
}

function compareSameKind(a: Temporal, b: Temporal): number {
  if ('date' in a && 'date' in b) return compareDateTimes(a, b)
  if ('hour' in a && 'hour' in b) return compareTimes(a, b)
  if ('year' in a && 'year' in b) return compareDates(a, b)
  throw new TypeError(`Cannot compare a ${kindOf(a)} with a ${kindOf(b)}`)
}

export function isBefore(a: CalendarDate, b: CalendarDate): boolean
export function isBefore(a: TimeOfDay, b: TimeOfDay): boolean
export function isBefore(a: CalendarDateTime, b: CalendarDateTime): boolean
export function isBefore(a: Temporal, b: Temporal): boolean {
  return compareSameKind(a, b) < 0
}

export function isAfter(a: CalendarDate, b: CalendarDate): boolean
export function isAfter(a: TimeOfDay, b: TimeOfDay): boolean
export function isAfter(a: CalendarDateTime, b: CalendarDateTime): boolean
export function isAfter(a: Temporal, b: Temporal): boolean {
  return compareSameKind(a, b) > 0
}

export function isOnOrBefore(a: CalendarDate, b: CalendarDate): boolean
export function isOnOrBefore(a: TimeOfDay, b: TimeOfDay): boolean
export function isOnOrBefore(a: CalendarDateTime, b: CalendarDateTime): boolean
export function isOnOrBefore(a: Temporal, b: Temporal): boolean {
  return compareSameKind(a, b) <= 0
}

export function isOnOrAfter(a: CalendarDate, b: CalendarDate): boolean
export function isOnOrAfter(a: TimeOfDay, b: TimeOfDay): boolean
export function isOnOrAfter(a: CalendarDateTime, b: CalendarDateTime): boolean
export function isOnOrAfter(a: Temporal, b: Temporal): boolean {
  return compareSameKind(a, b) >= 0
}

export function minDate(a: CalendarDate, b: CalendarDate): CalendarDate {
  return compareDates(a, b) <= 0 ? a : b
}

export function maxDate(a: CalendarDate, b: CalendarDate): CalendarDate {
  return compareDates(a, b) >= 0 ? a : b
}
