import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel, silentLogger } from '../../src/utils/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('info').warn('Slow query');
    expect(warn).toHaveBeenCalledWith('[treequery] WARN Slow query');
  });

  it('appends context as JSON', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = createLogger('info');
    logger.info('Loaded', { a: 1 });
    logger.info('Empty', {});
    expect(info.mock.calls).toEqual([['[treequery] INFO Loaded {"a":1}'], ['[treequery] INFO Empty']]);
  });

  it('drops messages below the level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('warn');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('prints the stack of a logged error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const cause = new Error('boom');
    createLogger('error').error('Failed', undefined, cause);
    expect(error.mock.calls).toEqual([['[treequery] ERROR Failed'], [cause.stack]]);
  });

  it('is silent when asked to be', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    silentLogger.error('Failed');
    expect(error).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(1)).toBe(false);
  });
});
