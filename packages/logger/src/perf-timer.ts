/**
 * @fileoverview Millisecond timers for `duration_ms` log fields.
 */

export interface PerfTimer {
  readonly startTime: number;

  /** Milliseconds since start, or until stop() if stopped. */
  elapsed(): number;

  /** Freezes the timer; later calls return the same duration. */
  stop(): number;

  isRunning(): boolean;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * const bars = await provider.fetchDailyPrices('AAPL', 6);
 * logger.info('Provider fetch complete', { duration_ms: timer.stop(), count: bars.length });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}

/**
 * Runs `fn` and reports how long it took. Rejections propagate untimed.
 */
export async function measureAsync<T>(fn: () => Promise<T>): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
