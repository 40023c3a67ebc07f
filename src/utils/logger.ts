import { getConfig } from '../config';
import type { ILogger, LogContext, LogLevel } from './logger-interface';

export interface LoggerOptions {
  level?: LogLevel;
  /** Emit one JSON object per line instead of coloured text */
  json?: boolean;
  component?: string;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
  SILENT: 6,
};

const COLOR_MAP: Record<LogLevel, string> = {
  TRACE: '\x1b[37m',
  DEBUG: '\x1b[36m',
  INFO: '\x1b[32m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  FATAL: '\x1b[35m',
  SILENT: '\x1b[0m',
};

const RESET = '\x1b[0m';

class LoggerImpl implements ILogger {
  // Unset options follow the current config, so setConfig/resetConfig take effect
  private readonly level?: LogLevel;
  private readonly json?: boolean;
  private readonly component?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level;
    this.json = options.json;
    this.component = options.component;
  }

  private get activeLevel(): LogLevel {
    return this.level ?? getConfig().logLevel;
  }

  private get useJson(): boolean {
    return this.json ?? getConfig().logFormat === 'json';
  }

  private shouldLog(level: LogLevel): boolean {
    return level !== 'SILENT' && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.activeLevel];
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const { component = this.component, ...rest }: LogContext = context ?? {};

    if (this.useJson) {
      return JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        component,
        ...rest,
      });
    }

    const parts = [`${COLOR_MAP[level]}[${level}]${RESET}`];
    if (component) {
      parts.push(`[${component}]`);
    }
    parts.push(message);
    if (Object.keys(rest).length > 0) {
      parts.push(JSON.stringify(rest));
    }
    return parts.join(' ');
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    const formattedMessage = this.formatMessage(level, message, context);

    if (level === 'ERROR' || level === 'FATAL') {
      console.error(formattedMessage);
    } else if (level === 'WARN') {
      console.warn(formattedMessage);
    } else {
      console.log(formattedMessage);
    }
  }

  trace(message: string, context?: LogContext): void {
    this.log('TRACE', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.log('FATAL', message, context);
  }

  child(context: LogContext): LoggerImpl {
    return new LoggerImpl({
      level: this.level,
      json: this.json,
      component: context.component ?? this.component,
    });
  }
}

export function createLogger(options: LoggerOptions = {}): ILogger {
  return new LoggerImpl(options);
}

export const logger: ILogger = new LoggerImpl();
export default logger;
