/**
 * ChronoUnit
 *
 * A closed set of addressable units. Each unit knows how to add itself to a
 * value and how to count whole units between two values. Sub-day units need
 * a time component; days and larger need a date component.
 */

import {
  type CalendarDate,
  type CalendarDateTime,
  type Temporal,
  type TimeOfDay,
  atTime,
  kindOf,
} from './time-date'
import {
  NANOS_PER_DAY_BIG,
  NANOS_PER_HOUR_BIG,
  NANOS_PER_MICRO_BIG,
  NANOS_PER_MILLI_BIG,
  NANOS_PER_MINUTE_BIG,
  NANOS_PER_SECOND_BIG,
  daysBetween,
  monthsBetween,
  nanosBetween,
  plusDays,
  plusMonths,
  plusWeeks,
  plusYears,
  shiftNanos,
  weeksBetween,
  yearsBetween,
} from './arithmetic'
import { type Duration, durationFromNanos } from './duration'

export { UnsupportedUnitError } from './errors'
import { UnsupportedUnitError } from './errors'
import { requireWholeAmount } from './internal/helpers'

// ============================================================================
// Types
// ============================================================================

export type TimeUnit = 'nanos' | 'micros' | 'millis' | 'seconds' | 'minutes' | 'hours' | 'halfDays'

export type DateUnit = 'days' | 'weeks' | 'months' | 'years'

export type ChronoUnit = TimeUnit | DateUnit

export const CHRONO_UNITS: readonly ChronoUnit[] = [
  'nanos', 'micros', 'millis', 'seconds', 'minutes', 'hours', 'halfDays',
  'days', 'weeks', 'months', 'years',
]

const HALF_DAY_NANOS = 12n * NANOS_PER_HOUR_BIG

// ============================================================================
// Classification
// ============================================================================

export function isTimeBased(unit: ChronoUnit): unit is TimeUnit {
  switch (unit) {
    case 'nanos':
    case 'micros':
    case 'millis':
    case 'seconds':
    case 'minutes':
    case 'hours':
    case 'halfDays':
      return true
    case 'days':
    case 'weeks':
    case 'months':
    case 'years':
      return false
  }
}

export function isDateBased(unit: ChronoUnit): unit is DateUnit {
  return !isTimeBased(unit)
}

/** Exact length of a time unit in nanoseconds */
function unitNanos(unit: TimeUnit): bigint {
  switch (unit) {
    case 'nanos':
      return 1n
    case 'micros':
      return NANOS_PER_MICRO_BIG
    case 'millis':
      return NANOS_PER_MILLI_BIG
    case 'seconds':
      return NANOS_PER_SECOND_BIG
    case 'minutes':
      return NANOS_PER_MINUTE_BIG
    case 'hours':
      return NANOS_PER_HOUR_BIG
    case 'halfDays':
      return HALF_DAY_NANOS
  }
}

/**
 * Estimated length of a unit. Days and weeks are exact; months count as 30
 * days and years as 365.
 */
export function unitDuration(unit: ChronoUnit): Duration {
  switch (unit) {
    case 'days':
      return durationFromNanos(NANOS_PER_DAY_BIG)
    case 'weeks':
      return durationFromNanos(7n * NANOS_PER_DAY_BIG)
    case 'months':
      return durationFromNanos(30n * NANOS_PER_DAY_BIG)
    case 'years':
      return durationFromNanos(365n * NANOS_PER_DAY_BIG)
    default:
      return durationFromNanos(unitNanos(unit))
  }
}

export function unitName(unit: ChronoUnit): string {
  return unit.replace(/([A-Z])/g, '_$1').toUpperCase()
}

// ============================================================================
// Add
// ============================================================================

function addTimeUnit(unit: TimeUnit, value: Temporal, amount: number): Temporal {
  const delta = BigInt(requireWholeAmount(amount)) * unitNanos(unit)
  if ('date' in value) return shiftNanos(value, delta)
  if ('hour' in value) return shiftNanos(value, delta)
  throw new UnsupportedUnitError(unit, 'date')
}

function shiftDate(unit: DateUnit, date: CalendarDate, amount: number): CalendarDate {
  switch (unit) {
    case 'days':
      return plusDays(date, amount)
    case 'weeks':
      return plusWeeks(date, amount)
    case 'months':
      return plusMonths(date, amount)
    case 'years':
      return plusYears(date, amount)
  }
}

function addDateUnit(unit: DateUnit, value: Temporal, amount: number): Temporal {
  if ('hour' in value) throw new UnsupportedUnitError(unit, 'time')
  if ('date' in value) return atTime(shiftDate(unit, value.date, amount), value.time)
  return shiftDate(unit, value, amount)
}

/**
 * Adds `amount` of `unit` to a value, returning a value of the same kind.
 * Throws UnsupportedUnitError when the value lacks the component the unit
 * operates on.
 */
export function addTo(unit: ChronoUnit, value: CalendarDate, amount: number): CalendarDate
export function addTo(unit: ChronoUnit, value: TimeOfDay, amount: number): TimeOfDay
export function addTo(unit: ChronoUnit, value: CalendarDateTime, amount: number): CalendarDateTime
export function addTo(unit: ChronoUnit, value: Temporal, amount: number): Temporal {
  return isTimeBased(unit) ? addTimeUnit(unit, value, amount) : addDateUnit(unit, value, amount)
}

export function subtractFrom(unit: ChronoUnit, value: CalendarDate, amount: number): CalendarDate
export function subtractFrom(unit: ChronoUnit, value: TimeOfDay, amount: number): TimeOfDay
export function subtractFrom(unit: ChronoUnit, value: CalendarDateTime, amount: number): CalendarDateTime
export function subtractFrom(unit: ChronoUnit, value: Temporal, amount: number): Temporal {
  return isTimeBased(unit) ? addTimeUnit(unit, value, -amount) : addDateUnit(unit, value, -amount)
}

// ============================================================================
// Between
// ============================================================================

function timeUnitsBetween(unit: TimeUnit, start: Temporal, end: Temporal): number {
  let nanos: bigint
  if ('date' in start && 'date' in end) nanos = nanosBetween(start, end)
  else if ('hour' in start && 'hour' in end) nanos = nanosBetween(start, end)
  else throw new UnsupportedUnitError(unit, 'date')
  return Number(nanos / unitNanos(unit))
}

function dateUnitsBetween(unit: DateUnit, start: CalendarDate | CalendarDateTime, end: CalendarDate | CalendarDateTime): number {
  if ('date' in start && 'date' in end) {
    switch (unit) {
      case 'days':
        return daysBetween(start, end)
      case 'weeks':
        return weeksBetween(start, end)
      case 'months':
        return monthsBetween(start, end)
      case 'years':
        return yearsBetween(start, end)
    }
  }
  const s = 'date' in start ? start.date : start
  const e = 'date' in end ? end.date : end
  switch (unit) {
    case 'days':
      return daysBetween(s, e)
    case 'weeks':
      return weeksBetween(s, e)
    case 'months':
      return monthsBetween(s, e)
    case 'years':
      return yearsBetween(s, e)
  }
}

/**
 * Whole units elapsed from start to end, truncated toward zero. Swapping the
 * arguments negates the result.
 */
export function between(unit: ChronoUnit, start: CalendarDate, end: CalendarDate): number
export function between(unit: ChronoUnit, start: TimeOfDay, end: TimeOfDay): number
export function between(unit: ChronoUnit, start: CalendarDateTime, end: CalendarDateTime): number
export function between(unit: ChronoUnit, start: Temporal, end: Temporal): number {
  const startKind = kindOf(start)
  const endKind = kindOf(end)
  if (startKind !== endKind) throw new UnsupportedUnitError(unit, `mixed ${startKind}/${endKind}`)

  if (isTimeBased(unit)) return timeUnitsBetween(unit, start, end)
  if ('hour' in start || 'hour' in end) throw new UnsupportedUnitError(unit, 'time')
  if ('date' in start && 'date' in end) return dateUnitsBetween(unit, start, end)
  if ('year' in start && 'year' in end) return dateUnitsBetween(unit, start, end)
  throw new UnsupportedUnitError(unit, `mixed ${startKind}/${endKind}`)
}
