/**
 * Calendar Arithmetic
 *
 * Adds and subtracts calendar units on dates, times and date-times, and counts
 * whole units between two values.
 *
 * Month and year addition clamps the day-of-month to the target month's
 * length (Jan 31 + 1 month = Feb 28/29). Day and week addition is exact.
 * Sub-day addition on a date-time carries into the date; on a bare time of
 * day it wraps around midnight.
 */

import {
  type CalendarDate,
  type CalendarDateTime,
  type TimeOfDay,
  atTime,
  buildDate,
  compareDates,
  compareDateTimes,
  daysInMonth,
  fromEpochDay,
  fromNanoOfDay,
  toEpochDay,
  toNanoOfDay,
} from './time-date'
import { bigFloorDiv, floorDiv, floorMod, requireWholeAmount, truncDiv } from './internal/helpers'

export { InvalidAmountError } from './errors'

type DateLike = CalendarDate | CalendarDateTime
type TimeLike = TimeOfDay | CalendarDateTime

export const NANOS_PER_DAY_BIG = 86_400_000_000_000n
export const NANOS_PER_HOUR_BIG = 3_600_000_000_000n
export const NANOS_PER_MINUTE_BIG = 60_000_000_000n
export const NANOS_PER_SECOND_BIG = 1_000_000_000n
export const NANOS_PER_MILLI_BIG = 1_000_000n
export const NANOS_PER_MICRO_BIG = 1_000n

// ============================================================================
// Date Part Helpers
// ============================================================================

function addDaysToDate(date: CalendarDate, n: number): CalendarDate {
  requireWholeAmount(n)
  if (n === 0) return date
  return fromEpochDay(toEpochDay(date) + n)
}

function addMonthsToDate(date: CalendarDate, n: number): CalendarDate {
  requireWholeAmount(n)
  if (n === 0) return date
  const total = date.year * 12 + (date.month - 1) + n
  const year = floorDiv(total, 12)
  const month = floorMod(total, 12) + 1
  return buildDate(year, month, Math.min(date.day, daysInMonth(year, month)))
}

function addYearsToDate(date: CalendarDate, n: number): CalendarDate {
  requireWholeAmount(n)
  if (n === 0) return date
  const year = date.year + n
  return buildDate(year, date.month, Math.min(date.day, daysInMonth(year, date.month)))
}

function mapDate(value: DateLike, fn: (date: CalendarDate) => CalendarDate): DateLike {
  if ('date' in value) return atTime(fn(value.date), value.time)
  return fn(value)
}

// ============================================================================
// Days & Weeks
// ============================================================================

export function plusDays(value: CalendarDate, n: number): CalendarDate
export function plusDays(value: CalendarDateTime, n: number): CalendarDateTime
export function plusDays(value: DateLike, n: number): DateLike {
  return mapDate(value, (d) => addDaysToDate(d, n))
}

export function minusDays(value: CalendarDate, n: number): CalendarDate
export function minusDays(value: CalendarDateTime, n: number): CalendarDateTime
export function minusDays(value: DateLike, n: number): DateLike {
  return mapDate(value, (d) => addDaysToDate(d, -n))
}

export function plusWeeks(value: CalendarDate, n: number): CalendarDate
export function plusWeeks(value: CalendarDateTime, n: number): CalendarDateTime
export function plusWeeks(value: DateLike, n: number): DateLike {
  return mapDate(value, (d) => addDaysToDate(d, n * 7))
}

export function minusWeeks(value: CalendarDate, n: number): CalendarDate
export function minusWeeks(value: CalendarDateTime, n: number): CalendarDateTime
export function minusWeeks(value: DateLike, n: number): DateLike {
  return mapDate(value, (d) => addDaysToDate(d, -n * 7))
}

// ============================================================================
// Months & Years (clamped)
// ============================================================================

export function plusMonths(value: CalendarDate, n: number): CalendarDate
export function plusMonths(value: CalendarDateTime, n: number): CalendarDateTime
export function plusMonths(value: DateLike, n: number): DateLike {
  return mapDate(value, (d) => addMonthsToDate(d, n))
}

export function minusMonths(value: CalendarDate, n: number): CalendarDate
export function minusMonths(value: CalendarDateTime, n: number): CalendarDateTime
export function minusMonths(value: DateLike, n: number): DateLike {
  return mapDate(value, (d) => addMonthsToDate(d, -n))
}

export function plusYears(value: CalendarDate, n: number): CalendarDate
export function plusYears(value: CalendarDateTime, n: number): CalendarDateTime
export function plusYears(value: DateLike, n: number): DateLike {
  return mapDate(value, (d) => addYearsToDate(d, n))
}

export function minusYears(value: CalendarDate, n: number): CalendarDate
export function minusYears(value: CalendarDateTime, n: number): CalendarDateTime
export function minusYears(value: DateLike, n: number): DateLike {
  return mapDate(value, (d) => addYearsToDate(d, -n))
}

// ============================================================================
// Time of Day (carrying / wrapping)
// ============================================================================

function shift(value: TimeLike, delta: bigint): TimeLike {
  if (delta === 0n) return value
  const time = 'date' in value ? value.time : value
  const total = BigInt(toNanoOfDay(time)) + delta
  const dayDelta = bigFloorDiv(total, NANOS_PER_DAY_BIG)
  const newTime = fromNanoOfDay(Number(total - dayDelta * NANOS_PER_DAY_BIG))
  if ('date' in value) return atTime(addDaysToDate(value.date, Number(dayDelta)), newTime)
  return newTime
}

function shiftBy(value: TimeLike, n: number, unitNanos: bigint): TimeLike {
  return shift(value, BigInt(requireWholeAmount(n)) * unitNanos)
}

/**
 * Shifts by an exact number of nanoseconds. A date-time carries whole days
 * into its date; a time of day keeps only the remainder.
 */
export function shiftNanos(value: TimeOfDay, delta: bigint): TimeOfDay
export function shiftNanos(value: CalendarDateTime, delta: bigint): CalendarDateTime
export function shiftNanos(value: TimeLike, delta: bigint): TimeLike {
  return shift(value, delta)
}

export function plusHours(value: TimeOfDay, n: number): TimeOfDay
export function plusHours(value: CalendarDateTime, n: number): CalendarDateTime
export function plusHours(value: TimeLike, n: number): TimeLike {
  return shiftBy(value, n, NANOS_PER_HOUR_BIG)
}

export function minusHours(value: TimeOfDay, n: number): TimeOfDay
export function minusHours(value: CalendarDateTime, n: number): CalendarDateTime
export function minusHours(value: TimeLike, n: number): TimeLike {
  return shiftBy(value, -n, NANOS_PER_HOUR_BIG)
}

export function plusMinutes(value: TimeOfDay, n: number): TimeOfDay
export function plusMinutes(value: CalendarDateTime, n: number): CalendarDateTime
export function plusMinutes(value: TimeLike, n: number): TimeLike {
  return shiftBy(value, n, NANOS_PER_MINUTE_BIG)
}

export function minusMinutes(value: TimeOfDay, n: number): TimeOfDay
export function minusMinutes(value: CalendarDateTime, n: number): CalendarDateTime
export function minusMinutes(value: TimeLike, n: number): TimeLike {
  return shiftBy(value, -n, NANOS_PER_MINUTE_BIG)
}

export function plusSeconds(value: TimeOfDay, n: number): TimeOfDay
export function plusSeconds(value: CalendarDateTime, n: number): CalendarDateTime
export function plusSeconds(value: TimeLike, n: number): TimeLike {
  return shiftBy(value, n, NANOS_PER_SECOND_BIG)
}

export function minusSeconds(value: TimeOfDay, n: number): TimeOfDay
export function minusSeconds(value: CalendarDateTime, n: number): CalendarDateTime
export function minusSeconds(value: TimeLike, n: number): TimeLike {
  return shiftBy(value, -n, NANOS_PER_SECOND_BIG)
}

export function plusMillis(value: TimeOfDay, n: number): TimeOfDay
export function plusMillis(value: CalendarDateTime, n: number): CalendarDateTime
export function plusMillis(value: TimeLike, n: number): TimeLike {
  return shiftBy(value, n, NANOS_PER_MILLI_BIG)
}

export function minusMillis(value: TimeOfDay, n: number): TimeOfDay
export function minusMillis(value: CalendarDateTime, n: number): CalendarDateTime
export function minusMillis(value: TimeLike, n: number): TimeLike {
  return shiftBy(value, -n, NANOS_PER_MILLI_BIG)
}

export function plusNanos(value: TimeOfDay, n: number): TimeOfDay
export function plusNanos(value: CalendarDateTime, n: number): CalendarDateTime
export function plusNanos(value: TimeLike, n: number): TimeLike {
  return shiftBy(value, n, 1n)
}

export function minusNanos(value: TimeOfDay, n: number): TimeOfDay
export function minusNanos(value: CalendarDateTime, n: number): CalendarDateTime
export function minusNanos(value: TimeLike, n: number): TimeLike {
  return shiftBy(value, -n, 1n)
}

// ============================================================================
// Between
// ============================================================================

/** Exact signed nanoseconds from a to b */
export function nanosBetween(a: TimeOfDay, b: TimeOfDay): bigint
export function nanosBetween(a: CalendarDateTime, b: CalendarDateTime): bigint
export function nanosBetween(a: TimeLike, b: TimeLike): bigint {
  if ('date' in a && 'date' in b) {
    const days = BigInt(toEpochDay(b.date) - toEpochDay(a.date))
    return days * NANOS_PER_DAY_BIG + BigInt(toNanoOfDay(b.time) - toNanoOfDay(a.time))
  }
  const ta = 'date' in a ? a.time : a
  const tb = 'date' in b ? b.time : b
  return BigInt(toNanoOfDay(tb) - toNanoOfDay(ta))
}

function wholeDays(a: DateLike, b: DateLike): number {
  if ('date' in a && 'date' in b) return Number(nanosBetween(a, b) / NANOS_PER_DAY_BIG)
  const da = 'date' in a ? a.date : a
  const db = 'date' in b ? b.date : b
  return toEpochDay(db) - toEpochDay(da)
}

/** Whole days from a to b; a trailing partial day on date-times is dropped */
export function daysBetween(a: CalendarDate, b: CalendarDate): number
export function daysBetween(a: CalendarDateTime, b: CalendarDateTime): number
export function daysBetween(a: DateLike, b: DateLike): number {
  return wholeDays(a, b)
}

export function weeksBetween(a: CalendarDate, b: CalendarDate): number
export function weeksBetween(a: CalendarDateTime, b: CalendarDateTime): number
export function weeksBetween(a: DateLike, b: DateLike): number {
  return truncDiv(wholeDays(a, b), 7)
}

function compareDateLike(a: DateLike, b: DateLike): number {
  if ('date' in a && 'date' in b) return compareDateTimes(a, b)
  return compareDates('date' in a ? a.date : a, 'date' in b ? b.date : b)
}

/**
 * Largest k with plusMonths(start, k) <= end, for start <= end. Because the
 * comparison uses the clamped date, Jan 31 to Feb 28 counts as a full month.
 */
function countMonthsForward(start: DateLike, end: DateLike): number {
  const s = 'date' in start ? start.date : start
  const e = 'date' in end ? end.date : end
  let months = (e.year - s.year) * 12 + (e.month - s.month)
  if (compareDateLike(mapDate(start, (d) => addMonthsToDate(d, months)), end) > 0) months--
  return months
}

export function monthsBetween(a: CalendarDate, b: CalendarDate): number
export function monthsBetween(a: CalendarDateTime, b: CalendarDateTime): number
export function monthsBetween(a: DateLike, b: DateLike): number {
  if (compareDateLike(a, b) > 0) return 0 - countMonthsForward(b, a)
  return countMonthsForward(a, b)
}

export function yearsBetween(a: CalendarDate, b: CalendarDate): number
export function yearsBetween(a: CalendarDateTime, b: CalendarDateTime): number
export function yearsBetween(a: DateLike, b: DateLike): number {
  const forward = compareDateLike(a, b) <= 0
  const months = forward ? countMonthsForward(a, b) : countMonthsForward(b, a)
  const years = truncDiv(months, 12)
  return forward ? years : 0 - years
}
