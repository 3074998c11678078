/**
 * Async Utilities
 * Sleep, cancellation and retry helpers shared by the executor and the walkers.
 */

export type StopSignal = () => Promise<boolean> | boolean;

// ==========================================
// Part 1: Sleep & Cancellation
// ==========================================

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

/**
 * Sleeps in slices of `checkIntervalMs`, returning `true` as soon as the stop
 * signal fires. Never throws on cancellation; callers decide what a stop means.
 */
export async function sleepOrCancel(
  ms: number,
  shouldStop: StopSignal | undefined,
  checkIntervalMs: number = 200,
): Promise<boolean> {
  if (!shouldStop) {
    await sleep(ms);
    return false;
  }
  if (await shouldStop()) return true;
  if (ms <= 0) return false;

  const start = Date.now();
  while (Date.now() - start < ms) {
    const remaining = ms - (Date.now() - start);
    if (remaining <= 0) break;
    await sleep(Math.min(remaining, checkIntervalMs));
    if (await shouldStop()) return true;
  }
  return false;
}

// ==========================================
// Part 2: Retry Logic
// ==========================================

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxAttempts?: number;
  delay?: number;
  onRetry?: (error: unknown, attempt: number) => void;
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Runs `fn` up to `maxAttempts` times with a fixed pause between attempts.
 * The last error is rethrown untouched.
 */
export async function retryWithFixedDelay<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const { maxAttempts = 3, delay = 1000, onRetry, shouldRetry } = options;
  const attempts = Math.max(1, maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      if (shouldRetry && !shouldRetry(error)) throw error;
      if (attempt >= attempts) throw error;

      if (onRetry) onRetry(error, attempt);
      await sleep(delay);
    }
  }
}
