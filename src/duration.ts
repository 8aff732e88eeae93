/**
 * Duration
 *
 * Elapsed, unit-uniform time: whole seconds plus a nanosecond adjustment in
 * [0, 999_999_999]. Negative durations keep a non-negative nano part, so
 * -0.5s is { seconds: -1, nanos: 500_000_000 }.
 */

import type { CalendarDateTime, TimeOfDay } from './time-date'
import {
  NANOS_PER_DAY_BIG,
  NANOS_PER_HOUR_BIG,
  NANOS_PER_MILLI_BIG,
  NANOS_PER_MINUTE_BIG,
  NANOS_PER_SECOND_BIG,
  nanosBetween,
  shiftNanos,
} from './arithmetic'
import { bigFloorDiv, bigFloorMod, requireWholeAmount } from './internal/helpers'

export type Duration = {
  readonly seconds: number
  readonly nanos: number
}

type TimeLike = TimeOfDay | CalendarDateTime

// ============================================================================
// Construction
// ============================================================================

export function durationFromNanos(total: bigint): Duration {
  const seconds = bigFloorDiv(total, NANOS_PER_SECOND_BIG)
  const nanos = bigFloorMod(total, NANOS_PER_SECOND_BIG)
  return Object.freeze({ seconds: Number(seconds), nanos: Number(nanos) })
}

/** Nanos outside [0, 1e9) are folded into the seconds */
export function durationOf(seconds: number, nanos = 0): Duration {
  return durationFromNanos(BigInt(requireWholeAmount(seconds)) * NANOS_PER_SECOND_BIG + BigInt(requireWholeAmount(nanos)))
}

export const ZERO_DURATION: Duration = durationOf(0)

export function ofDays(days: number): Duration {
  return durationFromNanos(BigInt(requireWholeAmount(days)) * NANOS_PER_DAY_BIG)
}

export function ofHours(hours: number): Duration {
  return durationFromNanos(BigInt(requireWholeAmount(hours)) * NANOS_PER_HOUR_BIG)
}

export function ofMinutes(minutes: number): Duration {
  return durationFromNanos(BigInt(requireWholeAmount(minutes)) * NANOS_PER_MINUTE_BIG)
}

export function ofSeconds(seconds: number): Duration {
  return durationOf(seconds)
}

export function ofMillis(millis: number): Duration {
  return durationFromNanos(BigInt(requireWholeAmount(millis)) * NANOS_PER_MILLI_BIG)
}

export function ofNanos(nanos: number | bigint): Duration {
  return durationFromNanos(typeof nanos === 'bigint' ? nanos : BigInt(requireWholeAmount(nanos)))
}

// ============================================================================
// Conversion (truncating toward zero)
// ============================================================================

export function toNanos(d: Duration): bigint {
  return BigInt(d.seconds) * NANOS_PER_SECOND_BIG + BigInt(d.nanos)
}

export function toDays(d: Duration): number {
  return Number(toNanos(d) / NANOS_PER_DAY_BIG)
}

export function toHours(d: Duration): number {
  return Number(toNanos(d) / NANOS_PER_HOUR_BIG)
}

export function toMinutes(d: Duration): number {
  return Number(toNanos(d) / NANOS_PER_MINUTE_BIG)
}

export function toSeconds(d: Duration): number {
  return Number(toNanos(d) / NANOS_PER_SECOND_BIG)
}

export function toMillis(d: Duration): number {
  return Number(toNanos(d) / NANOS_PER_MILLI_BIG)
}

// ============================================================================
// Arithmetic
// ============================================================================

export function plusDuration(a: Duration, b: Duration): Duration {
  return durationFromNanos(toNanos(a) + toNanos(b))
}

export function minusDuration(a: Duration, b: Duration): Duration {
  return durationFromNanos(toNanos(a) - toNanos(b))
}

export function negateDuration(d: Duration): Duration {
  return durationFromNanos(-toNanos(d))
}

export function absDuration(d: Duration): Duration {
  return isNegativeDuration(d) ? negateDuration(d) : d
}

export function multiplyDuration(d: Duration, factor: number): Duration {
  return durationFromNanos(toNanos(d) * BigInt(requireWholeAmount(factor)))
}

// ============================================================================
// Queries
// ============================================================================

export function isZeroDuration(d: Duration): boolean {
  return d.seconds === 0 && d.nanos === 0
}

export function isNegativeDuration(d: Duration): boolean {
  return d.seconds < 0
}

export function isPositiveDuration(d: Duration): boolean {
  return !isNegativeDuration(d) && !isZeroDuration(d)
}

export function compareDurations(a: Duration, b: Duration): number {
  const na = toNanos(a)
  const nb = toNanos(b)
  if (na < nb) return -1
  if (na > nb) return 1
  return 0
}

// ============================================================================
// Temporal Interop
// ============================================================================

export function durationBetween(a: TimeOfDay, b: TimeOfDay): Duration
export function durationBetween(a: CalendarDateTime, b: CalendarDateTime): Duration
export function durationBetween(a: TimeLike, b: TimeLike): Duration {
  if ('date' in a && 'date' in b) return durationFromNanos(nanosBetween(a, b))
  if ('hour' in a && 'hour' in b) return durationFromNanos(nanosBetween(a, b))
  throw new TypeError('durationBetween requires two values of the same kind')
}

export function addDurationTo(value: TimeOfDay, d: Duration): TimeOfDay
export function addDurationTo(value: CalendarDateTime, d: Duration): CalendarDateTime
export function addDurationTo(value: TimeLike, d: Duration): TimeLike {
  return 'date' in value ? shiftNanos(value, toNanos(d)) : shiftNanos(value, toNanos(d))
}

export function subtractDurationFrom(value: TimeOfDay, d: Duration): TimeOfDay
export function subtractDurationFrom(value: CalendarDateTime, d: Duration): CalendarDateTime
export function subtractDurationFrom(value: TimeLike, d: Duration): TimeLike {
  return 'date' in value ? shiftNanos(value, -toNanos(d)) : shiftNanos(value, -toNanos(d))
}
