/**
 * Utilities for managing delays in the crawler service
 */
export class DelayUtils {
  /**
   * Creates a promise that resolves after the specified delay.
   * When `signal` aborts first, the timer is cleared and the promise resolves early.
   */
  public static delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>(resolve => {
      if (ms <= 0 || signal?.aborted) {
        resolve();
        return;
      }

      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Exponential backoff: baseDelay * 2^attempt, capped at maxDelay
   * @param attempt Current attempt number (0-based)
   */
  static exponentialBackoff(attempt: number, baseDelay = 1000, maxDelay = 30000): number {
    const delay = baseDelay * Math.pow(2, attempt);
    return Math.min(delay, maxDelay);
  }

  /**
   * Executes a function with retry capability using exponential backoff
   * @param fn The function to execute that returns a promise
   * @param maxRetries Maximum number of retry attempts
   * @returns The function's value, or rejects with the last error
   */
  static async withRetry<T>(
    fn: () => Promise<T>,
    maxRetries = 3,
    baseDelay = 1000,
    maxDelay = 30000
  ): Promise<T> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt === maxRetries) {
          throw lastError;
        }

        await this.delay(this.exponentialBackoff(attempt, baseDelay, maxDelay));
      }
    }

    throw lastError || new Error('Retry failed');
  }
}
