import { describe, expect, test, vi } from 'vitest';

import { Logger, createConsoleLogger, createSilentLogger } from './index';

const createSink = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('Logger', () => {
  test('exposes the methods it was constructed with', () => {
    const methods = createSink();
    const logger = new Logger(methods);

    logger.info('hello', 1);

    expect(methods.info).toHaveBeenCalledWith('hello', 1);
    expect(logger.warn).toBe(methods.warn);
  });
});

describe('createConsoleLogger', () => {
  test('forwards messages at or above the minimum level', () => {
    const sink = createSink();
    const logger = createConsoleLogger('warn', sink);

    logger.warn('[Test] careful');
    logger.error('[Test] broken', { page: 2 });

    expect(sink.warn).toHaveBeenCalledWith('[Test] careful');
    expect(sink.error).toHaveBeenCalledWith('[Test] broken', { page: 2 });
  });

  test('drops messages below the minimum level', () => {
    const sink = createSink();
    const logger = createConsoleLogger('warn', sink);

    logger.debug('[Test] noisy');
    logger.info('[Test] chatty');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
  });

  test('defaults to info level', () => {
    const sink = createSink();
    const logger = createConsoleLogger(undefined, sink);

    logger.debug('hidden');
    logger.info('shown');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).toHaveBeenCalledWith('shown');
  });
});

describe('createSilentLogger', () => {
  test('returns a logger whose methods do nothing', () => {
    const logger = createSilentLogger();

    expect(() => logger.error('ignored')).not.toThrow();
    expect(logger).toBeInstanceOf(Logger);
  });
});
