import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, isLogLevel, silentLogger } from './logger.js';

describe('Logger', () => {
  let consoleSpy: {
    debug: ReturnType<typeof vi.spyOn>;
    info: ReturnType<typeof vi.spyOn>;
    warn: ReturnType<typeof vi.spyOn>;
    error: ReturnType<typeof vi.spyOn>;
  };

  beforeEach(() => {
    consoleSpy = {
      debug: vi.spyOn(console, 'debug').mockImplementation(() => {}),
      info: vi.spyOn(console, 'info').mockImplementation(() => {}),
      warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('filters messages below the minimum level', () => {
    const logger = createLogger();

    logger.debug('debug message');
    logger.info('info message');

    expect(consoleSpy.debug).not.toHaveBeenCalled();
    expect(consoleSpy.info).toHaveBeenCalledTimes(1);
  });

  it('formats timestamp, padded level and prefix', () => {
    const logger = createLogger('debug', '[test]');
    logger.warn('careful', { attempt: 1 });

    const [line, extra] = consoleSpy.warn.mock.calls[0];
    expect(line).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z WARN  \[test\] careful$/);
    expect(extra).toEqual({ attempt: 1 });
  });

  it('uses [promptline] as the default prefix', () => {
    createLogger().error('boom');
    expect(consoleSpy.error).toHaveBeenCalledWith(expect.stringContaining('ERROR [promptline] boom'));
  });

  it('extends the prefix for child loggers', () => {
    createLogger('debug').child('cache').debug('hit');
    expect(consoleSpy.debug).toHaveBeenCalledWith(expect.stringContaining('[promptline:cache] hit'));
  });

  it('shares the level between parent and children', () => {
    const root = createLogger('info');
    const child = root.child('retry');

    child.debug('hidden');
    root.setLevel('debug');
    child.debug('visible');

    expect(consoleSpy.debug).toHaveBeenCalledTimes(1);
    expect(consoleSpy.debug).toHaveBeenCalledWith(expect.stringContaining('visible'));
  });

  it('silentLogger writes nothing', () => {
    silentLogger.error('nothing');
    silentLogger.child('x').info('nothing');
    expect(consoleSpy.error).not.toHaveBeenCalled();
    expect(consoleSpy.info).not.toHaveBeenCalled();
  });

  it('recognizes log level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
