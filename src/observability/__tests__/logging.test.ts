/**
 * Tests for exporter loggers.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, InMemoryLogger, NoopLogger, createLogger } from '../logging.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write warnings as JSON through console.warn', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    new ConsoleLogger({ level: 'warn', context: { component: 'exporter' } }).warn('Invalid type for gauge', {
      metric: 'g',
    });

    expect(warn).toHaveBeenCalledTimes(1);
    const line = String(warn.mock.calls[0]?.[0]);
    expect(JSON.parse(line)).toMatchObject({
      level: 'warn',
      message: 'Invalid type for gauge',
      context: { component: 'exporter', metric: 'g' },
    });
  });

  it('should drop entries below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: 'warn' });
    logger.debug('hidden');
    logger.info('hidden');

    expect(log).not.toHaveBeenCalled();
  });
});

describe('InMemoryLogger', () => {
  it('should record entries by level', () => {
    const logger = new InMemoryLogger();
    logger.info('a');
    logger.warn('b', { n: 1 });

    expect(logger.getEntries().map((e) => e.message)).toEqual(['a', 'b']);
    expect(logger.getEntriesAtLevel('warn')).toMatchObject([{ message: 'b', context: { n: 1 } }]);

    logger.clear();
    expect(logger.getEntries()).toEqual([]);
  });
});

describe('createLogger', () => {
  it('should return a no-op logger when logging is off', () => {
    expect(createLogger('off')).toBeInstanceOf(NoopLogger);
  });

  it('should return a console logger otherwise', () => {
    expect(createLogger('info')).toBeInstanceOf(ConsoleLogger);
  });
});
