/**
 * Errors raised while validating valuation input records.
 * The formulas themselves report undefined results as null and never throw.
 */

export abstract class ValuationLibError extends Error {
  /** Stable identifier, e.g. INVALID_VALUATION_INPUT */
  abstract readonly code: string;
  /** Status a service wrapping analyzeValuation should answer with */
  abstract readonly httpStatus: number;

  constructor(
    message: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * The caller supplied figures the library cannot work with
 */
export class BadRequestError extends ValuationLibError {
  readonly code: string = 'BAD_REQUEST';
  readonly httpStatus = 400 as const;
}

export function isValuationLibError(error: unknown): error is ValuationLibError {
  return error instanceof ValuationLibError;
}

/**
 * Get a safe error message from an unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
