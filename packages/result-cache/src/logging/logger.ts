import type { ConsoleLoggerOptions, LogLevel, Logger } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Formats a timestamp as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export const formatTimestamp = (date: Date): string =>
  `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

/**
 * Checks whether a string names a log level.
 */
export const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVEL_ORDER, value);

/**
 * Creates a logger that writes `timestamp [LEVEL] message` lines.
 *
 * @param options - Optional logger configuration
 * @returns A Logger instance
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'debug' });
 * logger.info('Successfully connected to Redis');
 * // 2026-01-15 09:30:00 [INFO] Successfully connected to Redis
 * ```
 */
export const createConsoleLogger = (options: ConsoleLoggerOptions = {}): Logger => {
  const {
    level = 'info',
    write = (line: string): void => {
      console.error(line);
    },
    now = (): Date => new Date(),
  } = options;
  const threshold = LEVEL_ORDER[level];

  const emit =
    (messageLevel: LogLevel) =>
    (message: string): void => {
      if (LEVEL_ORDER[messageLevel] < threshold) {
        return;
      }
      write(`${formatTimestamp(now())} [${messageLevel.toUpperCase()}] ${message}`);
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
};

/**
 * Creates a logger that discards everything.
 */
export const createSilentLogger = (): Logger => {
  const discard = (): void => undefined;
  return { debug: discard, info: discard, warn: discard, error: discard };
};
