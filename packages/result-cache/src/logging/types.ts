/**
 * Log severity, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimal logger injected into every cache component.
 * Log lines are human-readable; their wording is not part of any contract.
 */
export interface Logger {
  readonly debug: (message: string) => void;
  readonly info: (message: string) => void;
  readonly warn: (message: string) => void;
  readonly error: (message: string) => void;
}

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
  /** Lowest level that is written (default: "info") */
  readonly level?: LogLevel;
  /** Line sink (default: console.error, keeping stdout for program output) */
  readonly write?: (line: string) => void;
  /** Clock used for timestamps (default: () => new Date()) */
  readonly now?: () => Date;
}
