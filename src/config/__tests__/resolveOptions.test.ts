import { describe, it, expect } from 'vitest';
import { DEFAULT_OPTIONS, resolveOptions } from '../resolveOptions';
import type { LogLevel } from '../../utils/logger';

describe('resolveOptions', () => {
  it('returns the defaults when nothing is given', () => {
    expect(resolveOptions()).toEqual({
      powerPreference: undefined,
      maxFrameLatency: 2,
      exitKey: 'Escape',
      logLevel: 'info',
      reportAdapters: true,
    });
    expect(resolveOptions({})).toEqual(DEFAULT_OPTIONS);
  });

  it('keeps provided values', () => {
    expect(
      resolveOptions({
        powerPreference: 'high-performance',
        maxFrameLatency: 3,
        exitKey: 'KeyQ',
        logLevel: 'debug',
        reportAdapters: false,
      })
    ).toEqual({
      powerPreference: 'high-performance',
      maxFrameLatency: 3,
      exitKey: 'KeyQ',
      logLevel: 'debug',
      reportAdapters: false,
    });
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects maxFrameLatency %s', (maxFrameLatency) => {
    expect(() => resolveOptions({ maxFrameLatency })).toThrow(/maxFrameLatency must be a positive integer/);
  });

  it('rejects an empty exit key', () => {
    expect(() => resolveOptions({ exitKey: '  ' })).toThrow('exitKey must be a non-empty key code.');
  });

  it('rejects an unknown power preference', () => {
    expect(() => resolveOptions({ powerPreference: 'balanced' as unknown as GPUPowerPreference })).toThrow(
      'powerPreference must be one of low-power, high-performance, got balanced.'
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => resolveOptions({ logLevel: 'verbose' as unknown as LogLevel })).toThrow('Unknown logLevel: verbose.');
  });
});
