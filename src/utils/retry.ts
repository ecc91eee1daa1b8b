/**
 * Bounded retry with exponential backoff.
 */

export interface RetryOptions {
  /** Total attempts including the first one */
  attempts: number;
  /** Delay before the second attempt; doubles after each failure */
  backoffMs: number;
  /** Only errors accepted here are retried; anything else is rethrown at once */
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(action: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  let attempt = 1;
  for (;;) {
    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= options.attempts || !options.shouldRetry(error)) throw error;
      const delayMs = options.backoffMs * 2 ** (attempt - 1);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
      attempt++;
    }
  }
}
