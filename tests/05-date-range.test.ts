/**
 * Segment 05: Date Range Tests
 *
 * Construction from start and end, prior()/next() navigation for every kind,
 * bi-weekly anchoring, and the internal invariant check.
 */

import { describe, it, expect } from 'vitest'
import {
  withStartDate,
  withEndDate,
  startDate,
  endDate,
  prior,
  next,
  rangeContains,
  rangeLengthInDays,
  rangeDates,
  rangeEquals,
  formatRange,
  InvalidRangeError,
  type DateRange,
} from '../src/date-range'
import { formatDate, makeDate, InvalidDateError } from '../src/time-date'
import { d } from './helpers/dates'

// ============================================================================
// 1. ANNUAL / SEMI-ANNUAL / QUARTERLY / MONTHLY
// ============================================================================

describe('Annual', () => {
  it('spans Jan 1 to Dec 31', () => {
    const range = withStartDate('annual', d('2023-01-01'))
    expect(formatDate(endDate(range))).toBe('2023-12-31')
    expect(formatDate(startDate(next(range)))).toBe('2024-01-01')
  })

  it('snaps a leap day to its calendar year', () => {
    const range = withStartDate('annual', d('2020-02-29'))
    expect(formatRange(range)).toBe('2020-01-01/2020-12-31')
    expect(formatRange(next(range))).toBe('2021-01-01/2021-12-31')
  })

  it('steps back a year', () => {
    expect(formatRange(prior(withStartDate('annual', d('2024-07-04'))))).toBe('2023-01-01/2023-12-31')
  })
})

describe('SemiAnnual', () => {
  it('spans the calendar half containing the date', () => {
    expect(formatRange(withStartDate('semiAnnual', d('2024-08-20')))).toBe('2024-07-01/2024-12-31')
    expect(formatRange(withStartDate('semiAnnual', d('2024-06-30')))).toBe('2024-01-01/2024-06-30')
  })

  it('rolls into the next year', () => {
    expect(formatRange(next(withStartDate('semiAnnual', d('2024-08-20'))))).toBe('2025-01-01/2025-06-30')
  })
})

describe('Quarterly', () => {
  it('spans the calendar quarter containing the date', () => {
    expect(formatRange(withStartDate('quarterly', d('2024-02-15')))).toBe('2024-01-01/2024-03-31')
  })

  it('moves to adjacent quarters', () => {
    const q1 = withStartDate('quarterly', d('2024-02-15'))
    expect(formatRange(next(q1))).toBe('2024-04-01/2024-06-30')
    expect(formatRange(prior(q1))).toBe('2023-10-01/2023-12-31')
  })
})

describe('Monthly', () => {
  it('ends on the true last day of February', () => {
    expect(formatRange(withStartDate('monthly', d('2024-02-10')))).toBe('2024-02-01/2024-02-29')
    expect(formatRange(withStartDate('monthly', d('2023-02-10')))).toBe('2023-02-01/2023-02-28')
  })

  it('recomputes the end for each month', () => {
    const feb = withStartDate('monthly', d('2024-02-10'))
    expect(formatRange(next(feb))).toBe('2024-03-01/2024-03-31')
    expect(formatRange(prior(feb))).toBe('2024-01-01/2024-01-31')
  })

  it('builds the same range from its end date', () => {
    expect(formatRange(withEndDate('monthly', d('2024-02-29')))).toBe('2024-02-01/2024-02-29')
  })
})

// ============================================================================
// 2. SEMI-MONTHLY
// ============================================================================

describe('SemiMonthly', () => {
  it('splits the month at the 15th', () => {
    expect(formatRange(withStartDate('semiMonthly', d('2024-02-15')))).toBe('2024-02-01/2024-02-15')
    expect(formatRange(withStartDate('semiMonthly', d('2024-02-16')))).toBe('2024-02-16/2024-02-29')
  })

  it('moves from the first half to the second half of the same month', () => {
    const first = withStartDate('semiMonthly', d('2024-02-10'))
    expect(formatRange(next(first))).toBe('2024-02-16/2024-02-29')
  })

  it('moves from the second half to the first half of the next month', () => {
    const second = withStartDate('semiMonthly', d('2024-02-20'))
    expect(formatRange(next(second))).toBe('2024-03-01/2024-03-15')
  })

  it('walks backward across a month boundary', () => {
    const march = withStartDate('semiMonthly', d('2024-03-01'))
    expect(formatRange(prior(march))).toBe('2024-02-16/2024-02-29')
    expect(formatRange(prior(prior(march)))).toBe('2024-02-01/2024-02-15')
  })

  it('rolls over the year', () => {
    expect(formatRange(next(withStartDate('semiMonthly', d('2024-12-31'))))).toBe('2025-01-01/2025-01-15')
  })
})

// ============================================================================
// 3. WEEKLY & BI-WEEKLY
// ============================================================================

describe('Weekly', () => {
  it('starts on Monday by default', () => {
    expect(formatRange(withStartDate('weekly', d('2024-01-03')))).toBe('2024-01-01/2024-01-07')
  })

  it('honors a configured week start', () => {
    const range = withStartDate('weekly', d('2024-01-03'), { weekStart: 'sun' })
    expect(formatRange(range)).toBe('2023-12-31/2024-01-06')
    expect(formatRange(next(range))).toBe('2024-01-07/2024-01-13')
  })

  it('crosses a year boundary', () => {
    expect(formatRange(withStartDate('weekly', d('2024-12-31')))).toBe('2024-12-30/2025-01-05')
  })
})

describe('BiWeekly', () => {
  describe('floating', () => {
    it('starts exactly on the given date', () => {
      expect(formatRange(withStartDate('biWeekly', d('2024-02-20')))).toBe('2024-02-20/2024-03-04')
    })

    it('ends exactly on the given date', () => {
      expect(formatRange(withEndDate('biWeekly', d('2024-03-04')))).toBe('2024-02-20/2024-03-04')
    })

    it('moves by fourteen days', () => {
      const range = withStartDate('biWeekly', d('2024-02-20'))
      expect(formatRange(next(range))).toBe('2024-03-05/2024-03-18')
      expect(formatRange(prior(range))).toBe('2024-02-06/2024-02-19')
    })
  })

  describe('anchored to a reference date', () => {
    const options = { biWeeklyReference: d('2024-01-01') }

    it('snaps to the fortnight containing the date', () => {
      expect(formatRange(withStartDate('biWeekly', d('2024-01-20'), options))).toBe('2024-01-15/2024-01-28')
    })

    it('snaps fortnights before the reference', () => {
      expect(formatRange(withStartDate('biWeekly', d('2023-12-31'), options))).toBe('2023-12-18/2023-12-31')
    })

    it('agrees between start and end construction', () => {
      const fromStart = withStartDate('biWeekly', d('2024-01-20'), options)
      const fromEnd = withEndDate('biWeekly', d('2024-01-20'), options)
      expect(rangeEquals(fromStart, fromEnd)).toBe(true)
    })
  })
})

// ============================================================================
// 4. QUERIES
// ============================================================================

describe('Queries', () => {
  const q1 = withStartDate('quarterly', d('2024-01-01'))

  it('tests membership inclusively', () => {
    expect(rangeContains(q1, d('2024-01-01'))).toBe(true)
    expect(rangeContains(q1, d('2024-03-31'))).toBe(true)
    expect(rangeContains(q1, d('2024-04-01'))).toBe(false)
  })

  it('counts days inclusively', () => {
    expect(rangeLengthInDays(q1)).toBe(91)
    expect(rangeLengthInDays(withStartDate('biWeekly', d('2024-01-01')))).toBe(14)
  })

  it('iterates every date in order', () => {
    const dates = [...rangeDates(withStartDate('weekly', d('2024-01-03')))].map(formatDate)
    expect(dates).toEqual([
      '2024-01-01', '2024-01-02', '2024-01-03', '2024-01-04',
      '2024-01-05', '2024-01-06', '2024-01-07',
    ])
  })

  it('compares kind and bounds', () => {
    expect(rangeEquals(q1, withEndDate('quarterly', d('2024-03-31')))).toBe(true)
    expect(rangeEquals(q1, withStartDate('monthly', d('2024-01-01')))).toBe(false)
  })
})

// ============================================================================
// 5. ERRORS
// ============================================================================

describe('Errors', () => {
  it('surfaces invalid input dates from date construction', () => {
    expect(() => withStartDate('monthly', makeDate(2023, 2, 30))).toThrow(InvalidDateError)
  })

  it('raises InvalidRangeError when a malformed range is navigated', () => {
    const malformed: DateRange = { kind: 'monthly', start: d('2024-01-15'), end: d('2024-02-14') }
    expect(() => next(malformed)).toThrow(InvalidRangeError)
    expect(() => next(malformed)).toThrow('Invalid monthly range 2024-02-15/2024-02-29: must start on a period boundary')
  })

  it('returns frozen ranges', () => {
    expect(Object.isFrozen(withStartDate('annual', d('2024-01-01')))).toBe(true)
  })
})
