import { FetchError } from './types';

/**
 * Retry behaviour applied by the crawler around each fetch
 */
export interface IRetryPolicy {
  readonly maxRetries: number;

  /**
   * Whether a failed attempt should be tried again
   * @param attempt Number of failed attempts before this failure
   */
  shouldRetry(error: FetchError, attempt: number): boolean;

  /**
   * Delay before the retry that follows failed attempt number `attempt` (0-based)
   */
  backoff(attempt: number): number;
}
