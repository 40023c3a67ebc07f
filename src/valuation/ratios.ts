/**
 * Single-period ratio and earnings formulas
 * Owner's Earnings, ROE, RONTA, Debt-to-Equity and EPS from raw statement figures
 */

import { divideOrNull, toPercent } from './numeric';

/**
 * Calculate Owner's Earnings
 * Owner's Earnings = Net Income + Depreciation & Amortization - Maintenance CapEx
 *
 * Only the capital expenditure needed to maintain current operations is subtracted,
 * not spending on growth.
 */
export function calculateOwnersEarnings(
  netIncome: number,
  depreciationAmortization: number,
  maintenanceCapex: number
): number {
  return netIncome + depreciationAmortization - maintenanceCapex;
}

/**
 * Calculate Return on Equity (ROE)
 * ROE = (Net Income / Shareholders' Equity) × 100
 *
 * @returns ROE percentage or null when equity is zero
 */
export function calculateReturnOnEquity(netIncome: number, shareholdersEquity: number): number | null {
  return toPercent(divideOrNull(netIncome, shareholdersEquity));
}

/**
 * Calculate Return on Net Tangible Assets (RONTA)
 * RONTA = (Net Income / (Total Assets - Total Liabilities - Intangible Assets)) × 100
 *
 * Only the resulting net tangible assets are checked for zero. A subtraction that
 * nearly cancels still yields a (possibly huge) number.
 *
 * @returns RONTA percentage or null when net tangible assets are zero
 */
export function calculateReturnOnNetTangibleAssets(
  netIncome: number,
  totalAssets: number,
  totalLiabilities: number,
  intangibleAssets: number
): number | null {
  const netTangibleAssets = totalAssets - totalLiabilities - intangibleAssets;
  return toPercent(divideOrNull(netIncome, netTangibleAssets));
}

/**
 * Calculate Debt-to-Equity ratio
 * D/E = Total Liabilities / Shareholders' Equity
 */
export function calculateDebtToEquity(totalLiabilities: number, shareholdersEquity: number): number | null {
  return divideOrNull(totalLiabilities, shareholdersEquity);
}

/**
 * Calculate Earnings Per Share (EPS)
 * EPS = Net Income / Shares Outstanding
 */
export function calculateEarningsPerShare(netIncome: number, sharesOutstanding: number): number | null {
  return divideOrNull(netIncome, sharesOutstanding);
}
