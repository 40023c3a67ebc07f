// Valuation Module
// Owner's earnings, return ratios, leverage, EPS, EPS CAGR and DCF intrinsic value

export { analyzeValuation, hasValuationWarnings } from './analysis.js';
export {
  calculateIntrinsicValue,
  calculateIntrinsicValuePerShare,
  calculateIntrinsicValueSchedule,
  calculateMarginOfSafety,
} from './dcf.js';
export { calculateEpsCagr } from './growth.js';
export { divideOrNull, isExactZero, toPercent } from './numeric.js';
export {
  calculateDebtToEquity,
  calculateEarningsPerShare,
  calculateOwnersEarnings,
  calculateReturnOnEquity,
  calculateReturnOnNetTangibleAssets,
} from './ratios.js';
export type { EpsHistory, ValuationInput } from './schemas.js';
export { EpsHistorySchema, formatIssues, parseValuationInput, ValuationInputSchema } from './schemas.js';
export type {
  AnalyzeValuationOptions,
  DcfProjectionYear,
  ValuationAnalysisResult,
  ValuationAssumptions,
  ValuationMetrics,
} from './types.js';
export { ValuationInputError } from './types.js';
