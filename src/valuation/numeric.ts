/**
 * Guard policy shared by every formula that divides.
 *
 * Zero checks are exact (`=== 0`, so `-0` counts as zero) with no epsilon.
 * Reference outputs depend on near-zero divisors still producing a number.
 */

export function isExactZero(value: number): boolean {
  return value === 0;
}

/**
 * Divide, or return null when the divisor is exactly zero
 */
export function divideOrNull(numerator: number, divisor: number): number | null {
  if (isExactZero(divisor)) {
    return null;
  }
  return numerator / divisor;
}

/**
 * Convert a fractional ratio to a percentage, passing null through
 */
export function toPercent(ratio: number | null): number | null {
  if (ratio === null) {
    return null;
  }
  return ratio * 100;
}
