/**
 * Zod schemas for valuation input records
 */

import { type ZodIssue, z } from 'zod';
import { ValuationInputError } from './types';

const finiteNumber = z.number().finite();

export const EpsHistorySchema = z.object({
  initialEps: finiteNumber,
  finalEps: finiteNumber,
  /** Fractional years allowed; non-positive values make the CAGR undefined */
  years: finiteNumber,
});

export const ValuationInputSchema = z.object({
  code: z.string().min(1, 'Company code must not be empty').optional(),
  netIncome: finiteNumber,
  depreciationAmortization: finiteNumber,
  maintenanceCapex: finiteNumber,
  shareholdersEquity: finiteNumber,
  totalAssets: finiteNumber,
  totalLiabilities: finiteNumber,
  intangibleAssets: finiteNumber,
  sharesOutstanding: finiteNumber.nonnegative('Shares outstanding must be non-negative'),
  epsHistory: EpsHistorySchema.optional(),
  growthRate: finiteNumber.optional(),
  discountRate: finiteNumber.optional(),
  projectionYears: z.number().int('Projection years must be a whole number').nonnegative().optional(),
  marketPrice: finiteNumber.positive('Market price must be positive').optional(),
});

export type EpsHistory = z.infer<typeof EpsHistorySchema>;
export type ValuationInput = z.infer<typeof ValuationInputSchema>;

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an unknown value as a valuation input record
 * @throws ValuationInputError listing every failing field
 */
export function parseValuationInput(value: unknown): ValuationInput {
  const result = ValuationInputSchema.safeParse(value);
  if (!result.success) {
    const { issues } = result.error;
    throw new ValuationInputError(`Invalid valuation input: ${formatIssues(issues)}`, issues);
  }
  return result.data;
}
