import type { ZodIssue } from 'zod';
import { BadRequestError } from '../errors';
import type { ILogger } from '../utils/logger-interface';

/**
 * One projected year of the DCF model
 */
export interface DcfProjectionYear {
  /** 1-based projection year */
  year: number;
  /** Owner's earnings grown to this year */
  futureEarnings: number;
  /** (1 + discount rate)^year */
  discountFactor: number;
  presentValue: number;
  /** Running sum of present values up to and including this year */
  cumulativeValue: number;
}

/**
 * Every metric derived for one company. null marks a mathematically undefined result.
 */
export interface ValuationMetrics {
  ownersEarnings: number;
  /** ROE percentage */
  returnOnEquity: number | null;
  /** RONTA percentage */
  returnOnNetTangibleAssets: number | null;
  debtToEquity: number | null;
  earningsPerShare: number | null;
  /** EPS CAGR percentage; null when no EPS history was supplied */
  epsCagr: number | null;
  intrinsicValue: number;
  intrinsicValuePerShare: number | null;
  /** Percentage; null when no market price was supplied */
  marginOfSafety: number | null;
}

/**
 * Growth, discount and horizon actually used after applying configured defaults
 */
export interface ValuationAssumptions {
  growthRate: number;
  discountRate: number;
  projectionYears: number;
}

export interface ValuationAnalysisResult {
  /** Company identifier if supplied */
  code?: string;
  metrics: ValuationMetrics;
  assumptions: ValuationAssumptions;
  schedule: DcfProjectionYear[];
  analyzedAt: Date;
  metadata: {
    warnings: string[];
  };
}

export interface AnalyzeValuationOptions {
  /** Timestamp recorded as analyzedAt (default: current time) */
  now?: Date;
  /** Receives one debug line per warning */
  logger?: ILogger;
}

/**
 * Error thrown when a valuation input record fails validation
 */
export class ValuationInputError extends BadRequestError {
  override readonly code: string = 'INVALID_VALUATION_INPUT';
  public readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[]) {
    super(message);
    this.issues = issues;
    this.name = 'ValuationInputError';
  }
}
