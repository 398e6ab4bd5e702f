import logger from './logger.js';

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Rate limiter for the Nominatim OpenStreetMap API.
 *
 * Calls run one at a time, and every call is followed by a fixed pause
 * whether it succeeded or not. Nominatim's policy allows at most one
 * request per second.
 *
 * @see https://operations.osmfoundation.org/policies/nominatim/
 */
export class NominatimRateLimiter {
  private tail: Promise<void> = Promise.resolve();
  private callCount = 0;
  private lastCallEndedAt = 0;

  /**
   * @param delayMs - Pause applied after each call (default: 1000)
   * @param sleepFn - Timer used for the pause; injectable for tests
   */
  constructor(
    private readonly delayMs: number = 1000,
    private readonly sleepFn: SleepFn = sleep
  ) {}

  /**
   * Runs `fn` once all earlier calls and their pauses have finished.
   *
   * @example
   * ```typescript
   * const limiter = new NominatimRateLimiter(1000);
   * const response = await limiter.throttle(() =>
   *   axios.get('https://nominatim.openstreetmap.org/reverse', { params })
   * );
   * ```
   */
  throttle<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      this.callCount++;
      try {
        return await fn();
      } finally {
        this.lastCallEndedAt = Date.now();
        if (this.delayMs > 0) {
          logger.debug(`Nominatim rate limiter: pausing ${this.delayMs}ms after request`);
          await this.sleepFn(this.delayMs);
        }
      }
    });

    // The next call waits for this one to settle, success or failure
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Gets statistics about the rate limiter state.
   */
  getStats(): { calls: number; lastCallEndedAt: number; delayMs: number } {
    return {
      calls: this.callCount,
      lastCallEndedAt: this.lastCallEndedAt,
      delayMs: this.delayMs,
    };
  }
}
