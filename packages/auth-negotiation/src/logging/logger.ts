/**
 * Severity levels, lowest to highest.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured data attached to a log line. Values must be JSON-serializable.
 */
export type LogData = Readonly<Record<string, string | number | boolean | null | readonly string[]>>;

/**
 * Logging sink accepted by the builder and the OIDC token manager.
 *
 * @example
 * ```typescript
 * const log: Log = (level, message, data) => {
 *   console.error(`[${level}] ${message}`, data ?? '');
 * };
 * ```
 */
export type Log = (level: LogLevel, message: string, data?: LogData) => void;

/** Discards everything */
export const noopLog: Log = () => undefined;

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Wraps a sink so that lines below `minimum` are dropped.
 */
export const withMinimumLevel = (log: Log, minimum: LogLevel): Log => {
  const threshold = LEVEL_ORDER[minimum];
  return (level, message, data) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    if (data === undefined) {
      log(level, message);
    } else {
      log(level, message, data);
    }
  };
};

/**
 * Parses a level name, case-insensitively.
 */
export const parseLogLevel = (value: string): LogLevel | undefined => {
  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return normalized;
    case 'warning':
      return 'warn';
    default:
      return undefined;
  }
};
