/**
 * Period
 *
 * A calendar-field delta. Years, months and days are kept separately and are
 * never folded into a single scalar, because a month is not a fixed number of
 * days.
 */

import type { CalendarDate, CalendarDateTime } from './time-date'
import { daysBetween, monthsBetween, plusDays, plusMonths } from './arithmetic'
import { truncDiv } from './internal/helpers'

export type Period = {
  readonly years: number
  readonly months: number
  readonly days: number
}

type DateLike = CalendarDate | CalendarDateTime

// ============================================================================
// Construction
// ============================================================================

export function periodOf(years = 0, months = 0, days = 0): Period {
  return Object.freeze({ years, months, days })
}

export const ZERO_PERIOD: Period = periodOf()

export function periodOfYears(years: number): Period {
  return periodOf(years, 0, 0)
}

export function periodOfMonths(months: number): Period {
  return periodOf(0, months, 0)
}

export function periodOfWeeks(weeks: number): Period {
  return periodOf(0, 0, weeks * 7)
}

export function periodOfDays(days: number): Period {
  return periodOf(0, 0, days)
}

// ============================================================================
// Field Arithmetic
// ============================================================================

export function plusPeriod(a: Period, b: Period): Period {
  return periodOf(a.years + b.years, a.months + b.months, a.days + b.days)
}

export function minusPeriod(a: Period, b: Period): Period {
  return periodOf(a.years - b.years, a.months - b.months, a.days - b.days)
}

export function negatePeriod(p: Period): Period {
  return periodOf(0 - p.years, 0 - p.months, 0 - p.days)
}

export function periodPlusYears(p: Period, years: number): Period {
  return periodOf(p.years + years, p.months, p.days)
}

export function periodPlusMonths(p: Period, months: number): Period {
  return periodOf(p.years, p.months + months, p.days)
}

export function periodPlusDays(p: Period, days: number): Period {
  return periodOf(p.years, p.months, p.days + days)
}

export function isZeroPeriod(p: Period): boolean {
  return p.years === 0 && p.months === 0 && p.days === 0
}

export function isNegativePeriod(p: Period): boolean {
  return p.years < 0 || p.months < 0 || p.days < 0
}

export function totalMonths(p: Period): number {
  return p.years * 12 + p.months
}

/** Rebalances months into years; days are left alone */
export function normalizePeriod(p: Period): Period {
  const months = totalMonths(p)
  return periodOf(truncDiv(months, 12), months - truncDiv(months, 12) * 12, p.days)
}

// ============================================================================
// Temporal Interop
// ============================================================================

/**
 * Years and months are applied together as one month offset (so only one
 * clamp happens), then days.
 */
export function addPeriodTo(value: CalendarDate, p: Period): CalendarDate
export function addPeriodTo(value: CalendarDateTime, p: Period): CalendarDateTime
export function addPeriodTo(value: DateLike, p: Period): DateLike {
  return 'date' in value
    ? plusDays(plusMonths(value, totalMonths(p)), p.days)
    : plusDays(plusMonths(value, totalMonths(p)), p.days)
}

export function subtractPeriodFrom(value: CalendarDate, p: Period): CalendarDate
export function subtractPeriodFrom(value: CalendarDateTime, p: Period): CalendarDateTime
export function subtractPeriodFrom(value: DateLike, p: Period): DateLike {
  const negated = negatePeriod(p)
  return 'date' in value ? addPeriodTo(value, negated) : addPeriodTo(value, negated)
}

/**
 * Years, months and days from a to b, using the clamped month count of
 * monthsBetween. For a <= b, addPeriodTo(a, result) equals b. For a > b the
 * result is the negation of periodBetween(b, a).
 */
export function periodBetween(a: CalendarDate, b: CalendarDate): Period {
  if (daysBetween(a, b) < 0) return negatePeriod(periodBetween(b, a))
  const months = monthsBetween(a, b)
  const days = daysBetween(plusMonths(a, months), b)
  return periodOf(truncDiv(months, 12), months % 12, days)
}
