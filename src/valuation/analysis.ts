import { getConfig } from '../config';
import { logger as defaultLogger } from '../utils/logger';
import {
  calculateIntrinsicValue,
  calculateIntrinsicValuePerShare,
  calculateIntrinsicValueSchedule,
  calculateMarginOfSafety,
} from './dcf';
import { calculateEpsCagr } from './growth';
import {
  calculateDebtToEquity,
  calculateEarningsPerShare,
  calculateOwnersEarnings,
  calculateReturnOnEquity,
  calculateReturnOnNetTangibleAssets,
} from './ratios';
import { parseValuationInput, type ValuationInput } from './schemas';
import type {
  AnalyzeValuationOptions,
  ValuationAnalysisResult,
  ValuationAssumptions,
  ValuationMetrics,
} from './types';

type MetricKey = keyof ValuationMetrics;

const METRIC_KEYS: readonly MetricKey[] = [
  'ownersEarnings',
  'returnOnEquity',
  'returnOnNetTangibleAssets',
  'debtToEquity',
  'earningsPerShare',
  'epsCagr',
  'intrinsicValue',
  'intrinsicValuePerShare',
  'marginOfSafety',
];

/**
 * Why each metric can come out null. Optional metrics are only reported
 * when their inputs were supplied.
 */
const NULL_REASONS: Partial<Record<MetricKey, { reason: string; applies: (input: ValuationInput) => boolean }>> = {
  returnOnEquity: { reason: 'shareholders equity is zero', applies: () => true },
  returnOnNetTangibleAssets: { reason: 'net tangible assets are zero', applies: () => true },
  debtToEquity: { reason: 'shareholders equity is zero', applies: () => true },
  earningsPerShare: { reason: 'shares outstanding is zero', applies: () => true },
  epsCagr: {
    reason: 'initial EPS is zero or the period is not positive',
    applies: (input) => input.epsHistory !== undefined,
  },
  intrinsicValuePerShare: { reason: 'shares outstanding is zero', applies: () => true },
  marginOfSafety: {
    reason: 'intrinsic value per share is zero',
    applies: (input) => input.marketPrice !== undefined && input.sharesOutstanding !== 0,
  },
};

function resolveAssumptions(input: ValuationInput): ValuationAssumptions {
  const { defaults } = getConfig();
  return {
    growthRate: input.growthRate ?? defaults.growthRate,
    discountRate: input.discountRate ?? defaults.discountRate,
    projectionYears: input.projectionYears ?? defaults.projectionYears,
  };
}

function collectWarnings(metrics: ValuationMetrics, input: ValuationInput): string[] {
  const warnings: string[] = [];

  for (const key of METRIC_KEYS) {
    const value = metrics[key];
    if (value === null) {
      const rule = NULL_REASONS[key];
      if (rule?.applies(input)) {
        warnings.push(`${key}: ${rule.reason}`);
      }
    } else if (!Number.isFinite(value)) {
      warnings.push(`${key}: result is not a finite number (${value})`);
    }
  }

  return warnings;
}

/**
 * Derive every valuation metric for one company's statement figures
 *
 * Growth rate, discount rate and projection years fall back to the configured
 * defaults when the record omits them.
 *
 * @param input Unvalidated record, see ValuationInputSchema
 * @throws ValuationInputError when the record fails validation
 */
export function analyzeValuation(input: unknown, options: AnalyzeValuationOptions = {}): ValuationAnalysisResult {
  const parsed = parseValuationInput(input);
  const log = (options.logger ?? defaultLogger).child({ component: 'valuation-analysis' });
  const assumptions = resolveAssumptions(parsed);
  const { growthRate, discountRate, projectionYears } = assumptions;

  const ownersEarnings = calculateOwnersEarnings(
    parsed.netIncome,
    parsed.depreciationAmortization,
    parsed.maintenanceCapex
  );
  const schedule = calculateIntrinsicValueSchedule(ownersEarnings, growthRate, discountRate, projectionYears);
  const intrinsicValue = calculateIntrinsicValue(ownersEarnings, growthRate, discountRate, projectionYears);
  const intrinsicValuePerShare = calculateIntrinsicValuePerShare(
    ownersEarnings,
    growthRate,
    discountRate,
    projectionYears,
    parsed.sharesOutstanding
  );

  const metrics: ValuationMetrics = {
    ownersEarnings,
    returnOnEquity: calculateReturnOnEquity(parsed.netIncome, parsed.shareholdersEquity),
    returnOnNetTangibleAssets: calculateReturnOnNetTangibleAssets(
      parsed.netIncome,
      parsed.totalAssets,
      parsed.totalLiabilities,
      parsed.intangibleAssets
    ),
    debtToEquity: calculateDebtToEquity(parsed.totalLiabilities, parsed.shareholdersEquity),
    earningsPerShare: calculateEarningsPerShare(parsed.netIncome, parsed.sharesOutstanding),
    epsCagr: parsed.epsHistory
      ? calculateEpsCagr(parsed.epsHistory.initialEps, parsed.epsHistory.finalEps, parsed.epsHistory.years)
      : null,
    intrinsicValue,
    intrinsicValuePerShare,
    marginOfSafety: calculateMarginOfSafety(intrinsicValuePerShare, parsed.marketPrice ?? null),
  };

  const warnings = collectWarnings(metrics, parsed);
  for (const warning of warnings) {
    log.debug(`Valuation metric unavailable for ${parsed.code ?? 'unnamed company'}`, { warning });
  }

  return {
    code: parsed.code,
    metrics,
    assumptions,
    schedule,
    analyzedAt: options.now ?? new Date(),
    metadata: { warnings },
  };
}

export function hasValuationWarnings(result: ValuationAnalysisResult): boolean {
  return result.metadata.warnings.length > 0;
}
