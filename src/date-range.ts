/**
 * Date Ranges
 *
 * Inclusive [start, end] periods of a fixed kind that can be walked with
 * prior() and next(). Every kind except a floating bi-weekly range snaps to
 * canonical calendar boundaries:
 *
 *   weekly       7 days beginning on the configured week start (Monday)
 *   biWeekly     14 days, floating from the input date, or aligned to
 *                fortnights counted from `biWeeklyReference`
 *   semiMonthly  1st-15th, or 16th to the end of the month
 *   monthly      1st to the last day of the month
 *   quarterly    calendar quarters (Jan, Apr, Jul, Oct)
 *   semiAnnual   Jan-Jun or Jul-Dec
 *   annual       Jan 1 to Dec 31
 */

import {
  type CalendarDate,
  type Weekday,
  buildDate,
  compareDates,
  dateEquals,
  daysInMonth,
  formatDate,
  fromEpochDay,
  toEpochDay,
} from './time-date'
import { plusDays, plusMonths } from './arithmetic'
import { previousOrSameWeekday } from './adjusters'
import { floorMod } from './internal/helpers'

export { InvalidRangeError } from './errors'
import { InvalidRangeError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type RangeKind =
  | 'weekly'
  | 'biWeekly'
  | 'semiMonthly'
  | 'monthly'
  | 'quarterly'
  | 'semiAnnual'
  | 'annual'

export const RANGE_KINDS: readonly RangeKind[] = [
  'weekly', 'biWeekly', 'semiMonthly', 'monthly', 'quarterly', 'semiAnnual', 'annual',
]

export type DateRange = {
  readonly kind: RangeKind
  readonly start: CalendarDate
  readonly end: CalendarDate
}

export interface RangeOptions {
  /** First day of a weekly range. Defaults to Monday. */
  weekStart?: Weekday
  /**
   * Anchor for bi-weekly ranges. When set, ranges are the fortnights counted
   * forward and back from this date; when absent, a bi-weekly range floats
   * from whatever date it is built from.
   */
  biWeeklyReference?: CalendarDate
}

type MonthKind = 'monthly' | 'quarterly' | 'semiAnnual' | 'annual'

// ============================================================================
// Period Rules
// ============================================================================

function monthsPerPeriod(kind: MonthKind): number {
  switch (kind) {
    case 'monthly':
      return 1
    case 'quarterly':
      return 3
    case 'semiAnnual':
      return 6
    case 'annual':
      return 12
  }
}

/** Last day of the period of `months` months that begins on `start` */
function monthPeriodEnd(start: CalendarDate, months: number): CalendarDate {
  const last = plusMonths(start, months - 1)
  return buildDate(last.year, last.month, daysInMonth(last.year, last.month))
}

function monthPeriodContaining(kind: MonthKind, date: CalendarDate): DateRange {
  const months = monthsPerPeriod(kind)
  const firstMonth = Math.floor((date.month - 1) / months) * months + 1
  const start = buildDate(date.year, firstMonth, 1)
  return makeRange(kind, start, monthPeriodEnd(start, months))
}

function semiMonthContaining(date: CalendarDate): DateRange {
  return date.day <= 15
    ? makeRange('semiMonthly', buildDate(date.year, date.month, 1), buildDate(date.year, date.month, 15))
    : makeRange('semiMonthly', buildDate(date.year, date.month, 16), buildDate(date.year, date.month, daysInMonth(date.year, date.month)))
}

function weekContaining(date: CalendarDate, weekStart: Weekday): DateRange {
  const start = previousOrSameWeekday(date, weekStart)
  return makeRange('weekly', start, plusDays(start, 6))
}

function fortnightContaining(date: CalendarDate, reference: CalendarDate): DateRange {
  const offset = floorMod(toEpochDay(date) - toEpochDay(reference), 14)
  const start = plusDays(date, -offset)
  return makeRange('biWeekly', start, plusDays(start, 13))
}

// ============================================================================
// Invariants
// ============================================================================

function fail(kind: RangeKind, start: CalendarDate, end: CalendarDate, reason: string): never {
  throw new InvalidRangeError(`Invalid ${kind} range ${formatDate(start)}/${formatDate(end)}: ${reason}`)
}

/**
 * Checks that [start, end] is a well-formed period of the given kind. A
 * failure here is a defect in a period rule, so it throws rather than
 * returning a Result.
 */
function assertRange(kind: RangeKind, start: CalendarDate, end: CalendarDate): void {
  if (compareDates(start, end) > 0) fail(kind, start, end, 'start is after end')
  const length = toEpochDay(end) - toEpochDay(start) + 1

  switch (kind) {
    case 'weekly':
      if (length !== 7) fail(kind, start, end, `expected 7 days, got ${length}`)
      return
    case 'biWeekly':
      if (length !== 14) fail(kind, start, end, `expected 14 days, got ${length}`)
      return
    case 'semiMonthly': {
      const expectedEnd = start.day === 1 ? 15 : daysInMonth(start.year, start.month)
      if (start.day !== 1 && start.day !== 16) fail(kind, start, end, 'must start on the 1st or 16th')
      if (end.year !== start.year || end.month !== start.month || end.day !== expectedEnd) {
        fail(kind, start, end, 'must end with its half month')
      }
      return
    }
    case 'monthly':
    case 'quarterly':
    case 'semiAnnual':
    case 'annual': {
      const months = monthsPerPeriod(kind)
      if (start.day !== 1 || (start.month - 1) % months !== 0) {
        fail(kind, start, end, 'must start on a period boundary')
      }
      if (!dateEquals(end, monthPeriodEnd(start, months))) fail(kind, start, end, 'must end on the last day of the period')
      return
    }
  }
}

function makeRange(kind: RangeKind, start: CalendarDate, end: CalendarDate): DateRange {
  assertRange(kind, start, end)
  return Object.freeze({ kind, start, end })
}

// ============================================================================
// Construction
// ============================================================================

/**
 * The range of `kind` beginning at `date`. Canonical kinds snap to the period
 * containing `date`, so the returned start may be earlier than `date`.
 */
export function withStartDate(kind: RangeKind, date: CalendarDate, options: RangeOptions = {}): DateRange {
  switch (kind) {
    case 'weekly':
      return weekContaining(date, options.weekStart ?? 'mon')
    case 'biWeekly':
      return options.biWeeklyReference
        ? fortnightContaining(date, options.biWeeklyReference)
        : makeRange(kind, date, plusDays(date, 13))
    case 'semiMonthly':
      return semiMonthContaining(date)
    case 'monthly':
    case 'quarterly':
    case 'semiAnnual':
    case 'annual':
      return monthPeriodContaining(kind, date)
  }
}

/** The range of `kind` ending at `date`, snapped like withStartDate */
export function withEndDate(kind: RangeKind, date: CalendarDate, options: RangeOptions = {}): DateRange {
  if (kind === 'biWeekly' && !options.biWeeklyReference) {
    return makeRange(kind, plusDays(date, -13), date)
  }
  return withStartDate(kind, date, options)
}

export function startDate(range: DateRange): CalendarDate {
  return range.start
}

export function endDate(range: DateRange): CalendarDate {
  return range.end
}

// ============================================================================
// Navigation
// ============================================================================

function step(range: DateRange, direction: 1 | -1): DateRange {
  const { kind, start } = range
  switch (kind) {
    case 'weekly':
      return makeRange(kind, plusDays(start, 7 * direction), plusDays(range.end, 7 * direction))
    case 'biWeekly':
      return makeRange(kind, plusDays(start, 14 * direction), plusDays(range.end, 14 * direction))
    case 'semiMonthly': {
      // Half-month steps: 1st <-> 16th, crossing a month boundary every other step
      if (start.day === 1) {
        return semiMonthContaining(direction === 1 ? buildDate(start.year, start.month, 16) : plusDays(start, -1))
      }
      return semiMonthContaining(direction === 1 ? plusDays(range.end, 1) : buildDate(start.year, start.month, 1))
    }
    case 'monthly':
    case 'quarterly':
    case 'semiAnnual':
    case 'annual': {
      const months = monthsPerPeriod(kind)
      const nextStart = plusMonths(start, months * direction)
      return makeRange(kind, nextStart, monthPeriodEnd(nextStart, months))
    }
  }
}

/** The adjacent period after this one */
export function next(range: DateRange): DateRange {
  return step(range, 1)
}

/** The adjacent period before this one */
export function prior(range: DateRange): DateRange {
  return step(range, -1)
}

// ============================================================================
// Queries
// ============================================================================

export function rangeContains(range: DateRange, date: CalendarDate): boolean {
  return compareDates(range.start, date) <= 0 && compareDates(date, range.end) <= 0
}

export function rangeLengthInDays(range: DateRange): number {
  return toEpochDay(range.end) - toEpochDay(range.start) + 1
}

/** Every date in the range, in order */
export function* rangeDates(range: DateRange): Generator<CalendarDate> {
  const first = toEpochDay(range.start)
  const last = toEpochDay(range.end)
  for (let day = first; day <= last; day++) {
    yield fromEpochDay(day)
  }
}

export function rangeEquals(a: DateRange, b: DateRange): boolean {
  return a.kind === b.kind && dateEquals(a.start, b.start) && dateEquals(a.end, b.end)
}

/** ISO-8601 interval form, e.g. 2024-01-01/2024-03-31 */
export function formatRange(range: DateRange): string {
  return `${formatDate(range.start)}/${formatDate(range.end)}`
}

