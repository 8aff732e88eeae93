/**
 * Literal builders for tests. Each parses ISO text and throws on bad input,
 * so a typo in a fixture fails loudly instead of producing a Result.
 */
import {
  type CalendarDate,
  type CalendarDateTime,
  type TimeOfDay,
  parseDate,
  parseDateTime,
  parseTime,
} from '../../src/time-date'
import { unwrap } from '../../src/result'

export function d(text: string): CalendarDate {
  return unwrap(parseDate(text))
}

export function t(text: string): TimeOfDay {
  return unwrap(parseTime(text))
}

export function dt(text: string): CalendarDateTime {
  return unwrap(parseDateTime(text))
}

