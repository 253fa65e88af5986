/**
 * Tests for logging and metrics
 */

import { ConsoleLogger, InMemoryMetricsCollector, logError, logOperation } from '../index.js';
import type { LogContext, Logger } from '../index.js';

class RecordingLogger implements Logger {
  readonly entries: Array<[string, string, LogContext | undefined]> = [];

  error(message: string, context?: LogContext): void {
    this.entries.push(['error', message, context]);
  }

  warn(message: string, context?: LogContext): void {
    this.entries.push(['warn', message, context]);
  }

  info(message: string, context?: LogContext): void {
    this.entries.push(['info', message, context]);
  }

  debug(message: string, context?: LogContext): void {
    this.entries.push(['debug', message, context]);
  }

  trace(message: string, context?: LogContext): void {
    this.entries.push(['trace', message, context]);
  }
}

describe('ConsoleLogger', () => {
  const now = new Date('2024-01-02T03:04:05.000Z');

  it('should format lines with level and context', () => {
    const logger = new ConsoleLogger();

    expect(logger.format('warn', 'Retrying', { pending: 2 }, now)).toBe(
      '[2024-01-02T03:04:05.000Z] [WARN] Retrying {"pending":2}'
    );
    expect(logger.format('info', 'Ready', {}, now)).toBe('[2024-01-02T03:04:05.000Z] [INFO] Ready');
  });

  it('should filter below the minimum level', () => {
    const logger = new ConsoleLogger('warn');

    expect(logger.isEnabled('debug')).toBe(false);
    expect(logger.isEnabled('warn')).toBe(true);
    expect(logger.isEnabled('error')).toBe(true);
  });

  it('should write enabled levels to the console', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('info');

    logger.error('failed');
    logger.debug('hidden');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(debug).not.toHaveBeenCalled();
  });
});

describe('operation logging', () => {
  it('should log completed and failed operations', () => {
    const logger = new RecordingLogger();

    logOperation(logger, 'GetItem', 'Thread', 12, { returned: 1 });
    logError(logger, 'PutItem', 'Thread', new TypeError('bad value'));

    expect(logger.entries).toEqual([
      ['debug', 'GetItem completed', { operation: 'GetItem', tableName: 'Thread', durationMs: 12, returned: 1 }],
      [
        'error',
        'PutItem failed',
        { operation: 'PutItem', tableName: 'Thread', errorName: 'TypeError', errorMessage: 'bad value' },
      ],
    ]);
  });
});

describe('InMemoryMetricsCollector', () => {
  it('should key counters by sorted labels', () => {
    const metrics = new InMemoryMetricsCollector();

    metrics.incrementCounter('ops', 1, { table: 'Thread', operation: 'Query' });
    metrics.incrementCounter('ops', 2, { operation: 'Query', table: 'Thread' });

    expect(metrics.getCounter('ops', { operation: 'Query', table: 'Thread' })).toBe(3);
    expect(metrics.getCounter('ops')).toBe(0);
  });

  it('should summarize histograms', () => {
    const metrics = new InMemoryMetricsCollector();
    for (const value of [5, 1, 9]) {
      metrics.recordHistogram('duration', value);
    }

    expect(metrics.summarize('duration')).toEqual({ count: 3, sum: 15, min: 1, max: 9 });
    expect(metrics.summarize('missing')).toBeUndefined();

    metrics.reset();
    expect(metrics.getHistogram('duration')).toEqual([]);
  });
});
