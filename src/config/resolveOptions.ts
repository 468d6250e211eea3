import type { BootstrapOptions, ResolvedBootstrapOptions } from './types';
import { isLogLevel } from '../utils/logger';

export const DEFAULT_MAX_FRAME_LATENCY = 2;

export const DEFAULT_OPTIONS: ResolvedBootstrapOptions = {
  powerPreference: undefined,
  maxFrameLatency: DEFAULT_MAX_FRAME_LATENCY,
  exitKey: 'Escape',
  logLevel: 'info',
  reportAdapters: true,
};

const POWER_PREFERENCES: readonly GPUPowerPreference[] = ['low-power', 'high-performance'];

/**
 * Merges user options over {@link DEFAULT_OPTIONS}.
 *
 * Values that would leave the surface misconfigured throw instead of being clamped.
 */
export function resolveOptions(options: BootstrapOptions = {}): ResolvedBootstrapOptions {
  const maxFrameLatency = options.maxFrameLatency ?? DEFAULT_OPTIONS.maxFrameLatency;
  if (!Number.isInteger(maxFrameLatency) || maxFrameLatency < 1) {
    throw new Error(`maxFrameLatency must be a positive integer, got ${String(maxFrameLatency)}.`);
  }

  const powerPreference = options.powerPreference;
  if (powerPreference !== undefined && !POWER_PREFERENCES.includes(powerPreference)) {
    throw new Error(
      `powerPreference must be one of ${POWER_PREFERENCES.join(', ')}, got ${String(powerPreference)}.`
    );
  }

  const logLevel = options.logLevel ?? DEFAULT_OPTIONS.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new Error(`Unknown logLevel: ${String(logLevel)}.`);
  }

  const exitKey = options.exitKey ?? DEFAULT_OPTIONS.exitKey;
  if (exitKey.trim() === '') {
    throw new Error('exitKey must be a non-empty key code.');
  }

  return {
    powerPreference,
    maxFrameLatency,
    exitKey,
    logLevel,
    reportAdapters: options.reportAdapters ?? DEFAULT_OPTIONS.reportAdapters,
  };
}
