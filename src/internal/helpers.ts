/**
 * Internal Helpers
 *
 * Integer arithmetic and padding shared across modules.
 */

import { InvalidAmountError } from '../errors'

// ============================================================================
// Floor Division
// ============================================================================

/** Division rounding toward negative infinity */
export function floorDiv(a: number, b: number): number {
  return Math.floor(a / b)
}

/** Remainder with the sign of the divisor (avoids JS % sign-preservation) */
export function floorMod(a: number, b: number): number {
  return a - Math.floor(a / b) * b
}

/** Division rounding toward zero, with -0 normalized to 0 */
export function truncDiv(a: number, b: number): number {
  const q = Math.trunc(a / b)
  return q === 0 ? 0 : q
}

export function bigFloorDiv(a: bigint, b: bigint): bigint {
  const q = a / b
  return (a % b !== 0n && (a < 0n) !== (b < 0n)) ? q - 1n : q
}

export function bigFloorMod(a: bigint, b: bigint): bigint {
  return a - bigFloorDiv(a, b) * b
}

// ============================================================================
// Padding
// ============================================================================

export function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

export function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

export function pad9(n: number): string {
  return String(n).padStart(9, '0')
}

// ============================================================================
// Validation
// ============================================================================

export function isIntegerInRange(n: number, min: number, max: number): boolean {
  return Number.isInteger(n) && n >= min && n <= max
}

/** Throws InvalidAmountError unless `n` is an integer */
export function requireWholeAmount(n: number): number {
  if (!Number.isInteger(n)) throw new InvalidAmountError(n)
  return n
}
