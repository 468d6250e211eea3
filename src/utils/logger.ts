export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Diagnostic sink handed to the core. The core never reaches for `console` itself.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  readonly level?: LogLevel;
  /** Prepended to every message, e.g. `[webgpu-bootstrap]`. */
  readonly prefix?: string;
  /** Defaults to the global console. */
  readonly sink?: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const sink = options.sink ?? console;
  const prefix = options.prefix;

  const format = (message: string): string => (prefix ? `${prefix} ${message}` : message);

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void => {
    if (LEVEL_RANK[level] < threshold) return;
    sink[level](format(message), ...details);
  };

  return {
    debug: (message, ...details) => emit('debug', message, details),
    info: (message, ...details) => emit('info', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    error: (message, ...details) => emit('error', message, details),
  };
}

const noop = (): void => {};

export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
