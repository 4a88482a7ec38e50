import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import type { Result } from './index.js';

export interface RetryOptions<E> {
  /** Total attempts, `Infinity` for no limit */
  attempts: number;
  /** Fixed delay between attempts */
  backoffMs: number;
  clock?: Clock;
  signal?: AbortSignal;
  /** Return false to stop retrying on this error */
  shouldRetry?: (error: E) => boolean;
  /** Called after a failed attempt that will be retried, before the backoff */
  onRetry?: (attempt: number, error: E) => void | Promise<void>;
}

/**
 * Run an operation until it succeeds or the attempts run out.
 * Backoff is fixed; there is no sleep after the final attempt.
 */
export async function retry<T, E>(
  operation: (attempt: number) => Promise<Result<T, E>>,
  options: RetryOptions<E>,
): Promise<Result<T, E>> {
  const clock = options.clock ?? systemClock;

  for (let attempt = 1; ; attempt++) {
    options.signal?.throwIfAborted();

    const result = await operation(attempt);
    if (result.ok) {
      return result;
    }

    const exhausted = attempt >= options.attempts;
    if (exhausted || (options.shouldRetry && !options.shouldRetry(result.error))) {
      return result;
    }

    await options.onRetry?.(attempt, result.error);
    await clock.sleep(options.backoffMs, options.signal);
  }
}
