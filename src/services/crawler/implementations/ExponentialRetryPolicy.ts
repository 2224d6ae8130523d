import { IRetryPolicy } from '../interfaces/IRetryPolicy';
import { FetchError, FetchErrorKind } from '../interfaces/types';
import { DelayUtils } from '../utils/DelayUtils';

/**
 * Whether a fetch failure may succeed on another attempt:
 * timeouts, transport errors, 5xx and 429 responses
 */
export function isTransientFetchError(error: FetchError): boolean {
  switch (error.kind) {
    case FetchErrorKind.TIMEOUT:
    case FetchErrorKind.TRANSPORT_ERROR:
      return true;
    case FetchErrorKind.HTTP_ERROR:
      return error.status === undefined || error.status >= 500 || error.status === 429;
    case FetchErrorKind.NON_HTML_CONTENT:
    case FetchErrorKind.INVALID_URL:
      return false;
  }
}

/**
 * Retries transient failures up to `maxRetries` times with a doubling, capped delay
 */
export class ExponentialRetryPolicy implements IRetryPolicy {
  constructor(
    readonly maxRetries: number,
    private readonly baseDelayMs: number,
    private readonly maxDelayMs: number
  ) {}

  shouldRetry(error: FetchError, attempt: number): boolean {
    return attempt < this.maxRetries && isTransientFetchError(error);
  }

  backoff(attempt: number): number {
    return DelayUtils.exponentialBackoff(attempt, this.baseDelayMs, this.maxDelayMs);
  }
}
