/**
 * Clocks & Zone Offsets
 *
 * A Clock supplies the current instant and the zone used to read it as a
 * local date. Fixed clocks make today() and now() deterministic; the system
 * clock reads Date.now(). Zone offsets come from Intl.DateTimeFormat.
 */

import {
  type CalendarDate,
  type CalendarDateTime,
  atTime,
  fromEpochDay,
  fromNanoOfDay,
} from './time-date'
import { floorDiv, floorMod } from './internal/helpers'

export { InvalidZoneError } from './errors'
import { InvalidZoneError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Clock =
  | { readonly type: 'fixed'; readonly epochMillis: number; readonly zone: string }
  | { readonly type: 'system'; readonly zone: string }

const MILLIS_PER_DAY = 86_400_000
const NANOS_PER_MILLI = 1_000_000

const FIXED_OFFSET_PATTERN = /^([+-])(\d{2}):?(\d{2})$/

// ============================================================================
// Construction
// ============================================================================

export function fixedClock(epochMillis: number, zone = 'UTC'): Clock {
  return Object.freeze({ type: 'fixed', epochMillis, zone })
}

export function systemClock(zone = 'UTC'): Clock {
  return Object.freeze({ type: 'system', zone })
}

export function withZone(clock: Clock, zone: string): Clock {
  return clock.type === 'fixed' ? fixedClock(clock.epochMillis, zone) : systemClock(zone)
}

export function clockMillis(clock: Clock): number {
  switch (clock.type) {
    case 'fixed':
      return clock.epochMillis
    case 'system':
      return Date.now()
  }
}

// ============================================================================
// Zone Offsets
// ============================================================================

function fixedOffset(zone: string): number | undefined {
  if (zone === 'UTC' || zone === 'Z') return 0
  const match = FIXED_OFFSET_PATTERN.exec(zone)
  if (!match) return undefined
  const [, sign = '+', hourText = '', minuteText = ''] = match
  const hours = parseInt(hourText, 10)
  const minutes = parseInt(minuteText, 10)
  if (hours > 18 || minutes > 59) throw new InvalidZoneError(zone)
  const seconds = hours * 3600 + minutes * 60
  return sign === '-' ? -seconds : seconds
}

function formatterFor(zone: string): Intl.DateTimeFormat {
  try {
    return new Intl.DateTimeFormat('en-US', {
      timeZone: zone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hour12: false,
    })
  } catch (e) {
    if (e instanceof RangeError) throw new InvalidZoneError(zone)
    throw e
  }
}

/**
 * Offset from UTC, in seconds, of the zone at the given instant. Accepts
 * 'UTC', 'Z', fixed offsets such as '+05:30', and IANA zone ids.
 */
export function zoneOffset(zone: string, epochMillis: number): number {
  const fixed = fixedOffset(zone)
  if (fixed !== undefined) return fixed

  const utcMs = epochMillis - floorMod(epochMillis, 1000)
  const parts = formatterFor(zone).formatToParts(new Date(utcMs))
  const get = (type: Intl.DateTimeFormatPartTypes) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  let hour = get('hour')
  if (hour === 24) hour = 0
  const year = get('year')
  const localMs = Date.UTC(year, get('month') - 1, get('day'), hour, get('minute'), get('second'))
  // Date.UTC maps years 0-99 onto 1900-1999
  const correctedMs = year >= 0 && year < 100 ? new Date(localMs).setUTCFullYear(year) : localMs
  return (correctedMs - utcMs) / 1000
}

// ============================================================================
// Reading a Clock
// ============================================================================

/** Local date-time of an instant in the given zone */
export function dateTimeAt(epochMillis: number, zone: string): CalendarDateTime {
  const localMs = epochMillis + zoneOffset(zone, epochMillis) * 1000
  const date = fromEpochDay(floorDiv(localMs, MILLIS_PER_DAY))
  return atTime(date, fromNanoOfDay(floorMod(localMs, MILLIS_PER_DAY) * NANOS_PER_MILLI))
}

export function now(clock: Clock): CalendarDateTime {
  return dateTimeAt(clockMillis(clock), clock.zone)
}

export function today(clock: Clock): CalendarDate {
  return now(clock).date
}
