export interface RetryOptions {
  /** Total attempts, the first one included. Default: 3 */
  maxAttempts?: number;
  /** Delay before the first retry. Default: 500 */
  baseDelayMs?: number;
  /** Default: 5_000 */
  maxDelayMs?: number;
  /** Return false to give up on `error` immediately. */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each wait, with the attempt that just failed. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponential = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
  // ±25% jitter
  const jitter = exponential * 0.25 * (2 * Math.random() - 1);
  return Math.max(0, Math.min(exponential + jitter, maxDelayMs));
}

/** Runs `fn` until it resolves, backing off exponentially between attempts. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxAttempts = 3, baseDelayMs = 500, maxDelayMs = 5_000, shouldRetry = () => true, onRetry } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) throw error;

      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      onRetry?.(error, attempt, delay);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
