import { describe, it, expect, vi } from 'vitest';
import { createConsoleLogger, isLogLevel, noopLogger } from '../logger';

function createSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('createConsoleLogger', () => {
  it('drops messages below the level', () => {
    const sink = createSink();
    const logger = createConsoleLogger({ level: 'warn', sink });

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d', 42);

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith('c');
    expect(sink.error).toHaveBeenCalledWith('d', 42);
  });

  it('defaults to info', () => {
    const sink = createSink();
    const logger = createConsoleLogger({ sink });

    logger.debug('hidden');
    logger.info('shown');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).toHaveBeenCalledWith('shown');
  });

  it('prefixes messages', () => {
    const sink = createSink();
    createConsoleLogger({ level: 'debug', prefix: '[gfx]', sink }).debug('Resumed');

    expect(sink.debug).toHaveBeenCalledWith('[gfx] Resumed');
  });

  it('writes nothing when silent', () => {
    const sink = createSink();
    createConsoleLogger({ level: 'silent', sink }).error('boom');

    expect(sink.error).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});

describe('noopLogger', () => {
  it('accepts calls without output', () => {
    expect(() => noopLogger.error('ignored')).not.toThrow();
  });
});
