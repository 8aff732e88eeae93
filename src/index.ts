/**
 * calendrical
 *
 * Public API exports
 */

// Error system (canonical source: base class, codes, all error classes)
export {
  CalendricalError, CalendricalErrorCode,
  InvalidDateError, InvalidAmountError, UnsupportedUnitError, InvalidRangeError,
  ParseError, InvalidZoneError,
} from './errors'
export type { CalendricalErrorCode as CalendricalErrorCodeType, DateField } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Time & Date (canonical source: branded types + utilities)
export type {
  CalendarDate, TimeOfDay, CalendarDateTime,
  Temporal, TemporalKind, Weekday,
} from './time-date'
export {
  MIN_YEAR, MAX_YEAR, MIDNIGHT, NOON,
  isLeapYear, daysInMonth, daysInYear,
  toEpochDay, fromEpochDay, toNanoOfDay, fromNanoOfDay,
  ofDate, makeDate, ofTime, makeTime, ofDateTime, makeDateTime,
  atTime, atStartOfDay, dateOf, timeOf, kindOf,
  dayOfWeek, weekdayToIndex, indexToWeekday, plusWeekdays,
  dayOfYear, lengthOfMonth, lengthOfYear,
  parseDate, parseTime, parseDateTime,
  formatDate, formatTime, formatDateTime,
  compareDates, compareTimes, compareDateTimes,
  dateEquals, timeEquals, dateTimeEquals,
  isBefore, isAfter, isOnOrBefore, isOnOrAfter,
  minDate, maxDate,
} from './time-date'

// Calendar arithmetic
export {
  plusDays, minusDays, plusWeeks, minusWeeks,
  plusMonths, minusMonths, plusYears, minusYears,
  plusHours, minusHours, plusMinutes, minusMinutes,
  plusSeconds, minusSeconds, plusMillis, minusMillis,
  plusNanos, minusNanos, shiftNanos,
  nanosBetween, daysBetween, weeksBetween, monthsBetween, yearsBetween,
} from './arithmetic'

// Period
export type { Period } from './period'
export {
  periodOf, ZERO_PERIOD,
  periodOfYears, periodOfMonths, periodOfWeeks, periodOfDays,
  plusPeriod, minusPeriod, negatePeriod,
  periodPlusYears, periodPlusMonths, periodPlusDays,
  isZeroPeriod, isNegativePeriod, totalMonths, normalizePeriod,
  addPeriodTo, subtractPeriodFrom, periodBetween,
} from './period'

// Duration
export type { Duration } from './duration'
export {
  durationOf, durationFromNanos, ZERO_DURATION,
  ofDays, ofHours, ofMinutes, ofSeconds, ofMillis, ofNanos,
  toNanos, toDays, toHours, toMinutes, toSeconds, toMillis,
  plusDuration, minusDuration, negateDuration, absDuration, multiplyDuration,
  isZeroDuration, isNegativeDuration, isPositiveDuration, compareDurations,
  durationBetween, addDurationTo, subtractDurationFrom,
} from './duration'

// Units
export type { ChronoUnit, TimeUnit, DateUnit } from './chrono-unit'
export {
  CHRONO_UNITS,
  isTimeBased, isDateBased, unitDuration, unitName,
  addTo, subtractFrom, between,
} from './chrono-unit'

// Month-level values
export type { MonthName, YearMonth, MonthDay } from './year-month'
export {
  monthName, monthLength, plusMonthOfYear,
  yearMonthOf, yearMonthOfDate, plusYearMonths, lengthOfYearMonth,
  atDay, firstDayOf, lastDayOf, compareYearMonths,
  monthDayOf, monthDayAtYear, compareMonthDays,
} from './year-month'

// Adjusters
export {
  firstDayOfMonth, lastDayOfMonth, firstDayOfNextMonth,
  firstDayOfYear, lastDayOfYear, firstDayOfNextYear,
  firstInMonth, lastInMonth,
  nextWeekday, nextOrSameWeekday, previousWeekday, previousOrSameWeekday,
  withDayOfMonth, withDayOfYear, withMonth, withYear,
} from './adjusters'

// Date ranges
export type { RangeKind, DateRange, RangeOptions } from './date-range'
export {
  RANGE_KINDS,
  withStartDate, withEndDate, startDate, endDate, prior, next,
  rangeContains, rangeLengthInDays, rangeDates, rangeEquals, formatRange,
} from './date-range'

// Clock
export type { Clock } from './clock'
export {
  fixedClock, systemClock, withZone, clockMillis,
  zoneOffset, dateTimeAt, now, today,
} from './clock'
