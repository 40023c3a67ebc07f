/**
 * Valuation Metrics - Main Entry Point
 *
 * Pure formulas for value-investing fundamentals plus a validated analysis
 * layer that composes them over one company's statement figures.
 */

// ===== CONFIGURATION EXPORTS =====
export type { LogFormat, ValuationConfig, ValuationDefaults } from './config';
export { getConfig, resetConfig, setConfig } from './config';
// ===== ERROR EXPORTS =====
export { BadRequestError, getErrorMessage, isValuationLibError, ValuationLibError } from './errors';
// ===== LOGGER EXPORTS =====
export type { LoggerOptions } from './utils/logger';
export { createLogger, logger } from './utils/logger';
export type { ILogger, LogContext, LogLevel } from './utils/logger-interface';
// ===== VALUATION EXPORTS =====
export * from './valuation';
