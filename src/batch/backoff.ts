/**
 * Backoff between resubmissions of unprocessed batch entries.
 */

/**
 * Retry policy for store-reported unprocessed batch entries
 */
export interface BatchRetryConfig {
  /** Resubmissions after the first attempt */
  maxRetries: number;
  /** Delay before the first resubmission (milliseconds) */
  baseDelayMs: number;
  /** Upper bound on any single delay (milliseconds) */
  maxDelayMs: number;
}

export type SleepFn = (ms: number) => Promise<void>;

/**
 * Sleep for a specified duration.
 */
export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before resubmission number `retry` (1-indexed): doubling from the
 * base delay, capped at the maximum.
 *
 * @example
 * ```typescript
 * const config = { maxRetries: 5, baseDelayMs: 100, maxDelayMs: 300 };
 * [1, 2, 3].map((n) => calculateBackoff(n, config)); // [100, 200, 300]
 * ```
 */
export function calculateBackoff(retry: number, config: BatchRetryConfig): number {
  const delay = config.baseDelayMs * Math.pow(2, Math.max(retry - 1, 0));
  return Math.min(delay, config.maxDelayMs);
}
