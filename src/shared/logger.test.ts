import { describe, it, expect, vi, afterEach } from 'vitest';
import { configureLogger, createLogger, formatLogLine, getLogLevel, isLevelEnabled } from './logger.js';

afterEach(() => {
  configureLogger({ level: 'warn' });
  vi.restoreAllMocks();
});

describe('logger', () => {
  it('filters by level', () => {
    configureLogger({ level: 'info' });
    expect(getLogLevel()).toBe('info');
    expect(isLevelEnabled('debug')).toBe(false);
    expect(isLevelEnabled('info')).toBe(true);
    expect(isLevelEnabled('error')).toBe(true);
  });

  it('formats errors by name and message', () => {
    const line = formatLogLine('warn', 'lookup failed', [new TypeError('bad'), { id: 1 }]);
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] WARN  lookup failed TypeError: bad \{"id":1\}$/);
  });

  it('writes prefixed lines to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    configureLogger({ level: 'debug' });
    createLogger('Test').debug('hello');
    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0])).toMatch(/DEBUG \[Test\] hello\n$/);
  });

  it('stays quiet below the configured level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    createLogger().info('not shown');
    expect(write).not.toHaveBeenCalled();
  });
});
