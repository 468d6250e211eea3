/**
 * Bootstrap configuration types.
 */

import type { LogLevel } from '../utils/logger';

export interface BootstrapOptions {
  /** Adapter power preference. Left to the platform when omitted. */
  readonly powerPreference?: GPUPowerPreference;
  /** Frames the surface may queue ahead of presentation (default: 2). */
  readonly maxFrameLatency?: number;
  /** `KeyboardEvent.code`-style key that ends the loop when pressed without modifiers (default: `Escape`). */
  readonly exitKey?: string;
  readonly logLevel?: LogLevel;
  /** Log available adapters and the default adapter at startup (default: true). */
  readonly reportAdapters?: boolean;
}

export interface ResolvedBootstrapOptions {
  readonly powerPreference: GPUPowerPreference | undefined;
  readonly maxFrameLatency: number;
  readonly exitKey: string;
  readonly logLevel: LogLevel;
  readonly reportAdapters: boolean;
}
