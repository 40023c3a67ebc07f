import { isExactZero } from './numeric';

/**
 * Calculate Compound Annual Growth Rate (CAGR) of EPS
 * CAGR = ((Final EPS / Initial EPS)^(1 / years) - 1) × 100
 *
 * Returns null when initial EPS is zero or years is not positive. A negative
 * EPS ratio under a fractional exponent gives NaN, which is returned as-is.
 *
 * @param years Length of the period; fractional years are allowed
 * @returns CAGR percentage or null
 */
export function calculateEpsCagr(initialEps: number, finalEps: number, years: number): number | null {
  if (isExactZero(initialEps) || years <= 0) {
    return null;
  }
  return ((finalEps / initialEps) ** (1 / years) - 1) * 100;
}
