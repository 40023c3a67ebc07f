import { afterEach, describe, expect, it, vi } from 'vitest';
import { resetConfig, setConfig } from '../../config';
import { createLogger } from '../logger';
import { isLogLevel } from '../logger-interface';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetConfig();
  });

  it('follows the configured level and format when none is given', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = createLogger();

    setConfig({ logLevel: 'SILENT', logFormat: 'text' });
    log.info('before');
    expect(logSpy).not.toHaveBeenCalled();

    setConfig({ logLevel: 'INFO', logFormat: 'text' });
    log.child({ component: 'dcf' }).info('after');
    expect(logSpy).toHaveBeenCalledWith('\x1b[32m[INFO]\x1b[0m [dcf] after');

    setConfig({ logLevel: 'INFO', logFormat: 'json' });
    log.info('structured');
    expect(JSON.parse(String(logSpy.mock.calls[1]?.[0]))).toMatchObject({ level: 'INFO', message: 'structured' });
  });

  it('writes coloured text with component prefix and context', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = createLogger({ level: 'DEBUG', json: false, component: 'valuation' });

    log.debug('metric undefined', { metric: 'returnOnEquity' });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('\x1b[36m[DEBUG]\x1b[0m [valuation] metric undefined {"metric":"returnOnEquity"}');
  });

  it('suppresses messages below the configured level', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = createLogger({ level: 'WARN', json: false });

    log.info('hidden');
    log.debug('hidden');
    log.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('\x1b[33m[WARN]\x1b[0m shown');
  });

  it('routes error and fatal to console.error', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = createLogger({ level: 'TRACE', json: false });

    log.error('bad');
    log.fatal('worse');

    expect(errorSpy).toHaveBeenCalledTimes(2);
  });

  it('writes nothing when SILENT', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = createLogger({ level: 'SILENT' });

    log.info('nothing');
    log.fatal('nothing');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('emits JSON lines when json is enabled', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = createLogger({ level: 'INFO', json: true, component: 'analysis' });

    log.info('done', { code: 'ACME' });

    const line = logSpy.mock.calls[0]?.[0];
    expect(typeof line).toBe('string');
    const parsed: unknown = JSON.parse(String(line));
    expect(parsed).toMatchObject({ level: 'INFO', message: 'done', component: 'analysis', code: 'ACME' });
  });

  it('child loggers inherit level and take a new component', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const parent = createLogger({ level: 'INFO', json: false, component: 'root' });

    parent.child({ component: 'dcf' }).info('projected');

    expect(logSpy).toHaveBeenCalledWith('\x1b[32m[INFO]\x1b[0m [dcf] projected');
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('DEBUG')).toBe(true);
    expect(isLogLevel('debug')).toBe(false);
    expect(isLogLevel('VERBOSE')).toBe(false);
  });
});
