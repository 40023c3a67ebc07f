/**
 * Library configuration with environment variable support
 */

import { isLogLevel, type LogLevel } from '../utils/logger-interface';

export interface ValuationDefaults {
  /** Annual owner's earnings growth used when an input omits it (0.05 = 5%) */
  growthRate: number;
  /** Annual discount rate used when an input omits it */
  discountRate: number;
  /** DCF projection horizon in whole years */
  projectionYears: number;
}

export interface ValuationConfig {
  defaults: ValuationDefaults;
  logLevel: LogLevel;
  /** Coloured text for terminals, or one JSON object per line */
  logFormat: LogFormat;
}

export type LogFormat = 'text' | 'json';

const DEFAULT_DEFAULTS: ValuationDefaults = {
  growthRate: 0.05,
  discountRate: 0.1,
  projectionYears: 10,
};

/**
 * Parse numeric environment variable with fallback
 */
function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseYears(value: string | undefined, fallback: number): number {
  const parsed = parseNumber(value, fallback);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * Parse log level, falling back to a level derived from NODE_ENV
 */
function parseLogLevel(value: string | undefined, nodeEnv: string | undefined): LogLevel {
  const level = value?.toUpperCase();
  if (level && isLogLevel(level)) {
    return level;
  }

  switch (nodeEnv) {
    case 'test':
      return 'SILENT';
    case 'production':
      return 'WARN';
    default:
      return 'INFO';
  }
}

function parseLogFormat(value: string | undefined, nodeEnv: string | undefined): LogFormat {
  const format = value?.toLowerCase();
  if (format === 'json' || format === 'text') {
    return format;
  }
  return nodeEnv === 'production' ? 'json' : 'text';
}

/**
 * Load configuration from environment variables with defaults
 */
function loadConfig(env: NodeJS.ProcessEnv = process.env): ValuationConfig {
  return {
    defaults: {
      growthRate: parseNumber(env.VALUATION_GROWTH_RATE, DEFAULT_DEFAULTS.growthRate),
      discountRate: parseNumber(env.VALUATION_DISCOUNT_RATE, DEFAULT_DEFAULTS.discountRate),
      projectionYears: parseYears(env.VALUATION_PROJECTION_YEARS, DEFAULT_DEFAULTS.projectionYears),
    },
    logLevel: parseLogLevel(env.LOG_LEVEL, env.NODE_ENV),
    logFormat: parseLogFormat(env.LOG_FORMAT, env.NODE_ENV),
  };
}

let configInstance: ValuationConfig | null = null;

/**
 * Get library configuration
 */
export function getConfig(): ValuationConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (mainly for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Override specific configuration values (mainly for testing)
 */
export function setConfig(overrides: Partial<ValuationConfig>): void {
  configInstance = {
    ...getConfig(),
    ...overrides,
  };
}

export { loadConfig };
