import { afterEach, describe, expect, it, vi } from 'vitest';

import { createLogger, getLogLevel, parseLogLevel, setLogLevel } from '../src/logging.js';

describe('logging', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
  });

  it('parses level names case-insensitively', () => {
    expect(parseLogLevel(' WARN ')).toBe('warn');
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });

  it('drops messages below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');

    const logger = createLogger('test');
    logger.info('hidden');
    logger.warn('shown', { detail: 1 });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('[test]'), 'shown', { detail: 1 });
  });

  it('returns the same logger for the same name', () => {
    expect(createLogger('shared')).toBe(createLogger('shared'));
  });
});
