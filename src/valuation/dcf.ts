/**
 * Discounted Cash Flow (DCF) intrinsic value
 * Projects owner's earnings at a constant growth rate and discounts each year
 * back to present value at a constant discount rate.
 */

import { divideOrNull, toPercent } from './numeric';
import type { DcfProjectionYear } from './types';

/**
 * Calculate intrinsic value as the sum of discounted future owner's earnings
 *
 * Σ (Owner's Earnings × (1 + g)^t / (1 + d)^t) for t = 1..years
 *
 * Terms are added in ascending year order. Zero years yields 0 whatever the rates.
 *
 * @param growthRate Fractional annual growth (0.05 = 5%)
 * @param discountRate Fractional annual discount rate
 * @param years Number of whole projection years
 */
export function calculateIntrinsicValue(
  initialOwnersEarnings: number,
  growthRate: number,
  discountRate: number,
  years: number
): number {
  let totalValue = 0;
  for (let t = 1; t <= years; t++) {
    const futureEarnings = initialOwnersEarnings * (1 + growthRate) ** t;
    const presentValue = futureEarnings / (1 + discountRate) ** t;
    totalValue += presentValue;
  }
  return totalValue;
}

/**
 * Calculate intrinsic value per share
 * @returns Intrinsic value divided by shares outstanding, or null for zero shares
 */
export function calculateIntrinsicValuePerShare(
  initialOwnersEarnings: number,
  growthRate: number,
  discountRate: number,
  years: number,
  sharesOutstanding: number
): number | null {
  return divideOrNull(
    calculateIntrinsicValue(initialOwnersEarnings, growthRate, discountRate, years),
    sharesOutstanding
  );
}

/**
 * Year-by-year breakdown of calculateIntrinsicValue.
 * The last cumulativeValue equals calculateIntrinsicValue for the same inputs.
 */
export function calculateIntrinsicValueSchedule(
  initialOwnersEarnings: number,
  growthRate: number,
  discountRate: number,
  years: number
): DcfProjectionYear[] {
  const schedule: DcfProjectionYear[] = [];
  let cumulativeValue = 0;

  for (let t = 1; t <= years; t++) {
    const futureEarnings = initialOwnersEarnings * (1 + growthRate) ** t;
    const discountFactor = (1 + discountRate) ** t;
    const presentValue = futureEarnings / discountFactor;
    cumulativeValue += presentValue;
    schedule.push({ year: t, futureEarnings, discountFactor, presentValue, cumulativeValue });
  }

  return schedule;
}

/**
 * Calculate Margin of Safety
 * Margin of Safety = ((Intrinsic Value per Share - Market Price) / Intrinsic Value per Share) × 100
 *
 * Negative when the market price is above intrinsic value.
 */
export function calculateMarginOfSafety(
  intrinsicValuePerShare: number | null,
  marketPrice: number | null
): number | null {
  if (intrinsicValuePerShare === null || marketPrice === null) {
    return null;
  }
  return toPercent(divideOrNull(intrinsicValuePerShare - marketPrice, intrinsicValuePerShare));
}
