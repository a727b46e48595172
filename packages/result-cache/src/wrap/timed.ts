import type { Clock, Computation, TimedOptions, WrappedComputation } from './types.js';

export const defaultClock: Clock = () => performance.now();

/**
 * Formats elapsed milliseconds as seconds with microsecond precision.
 */
export const formatElapsedSeconds = (elapsedMs: number): string => (elapsedMs / 1000).toFixed(6);

/**
 * Wraps a function so each call logs when it starts and how long it took.
 * The finish line is written on success and on failure.
 *
 * @param name - Name shown in the log lines
 * @param fn - The function to time
 * @param options - Logger and optional clock
 * @returns An async function with the same parameters
 *
 * @example
 * ```typescript
 * const load = timed('loadFlights', () => loadFlightsCsv(path), { logger });
 * await load();
 * // [INFO] STARTED function 'loadFlights'
 * // [INFO] FINISHED function 'loadFlights' in 0.412345 seconds
 * ```
 */
export const timed = <TArgs extends readonly unknown[], TResult>(
  name: string,
  fn: Computation<TArgs, TResult>,
  options: TimedOptions
): WrappedComputation<TArgs, TResult> => {
  const { logger, clock = defaultClock } = options;

  return async (...args: TArgs): Promise<TResult> => {
    logger.info(`STARTED function '${name}'`);
    const start = clock();
    try {
      return await fn(...args);
    } finally {
      logger.info(`FINISHED function '${name}' in ${formatElapsedSeconds(clock() - start)} seconds`);
    }
  };
};
