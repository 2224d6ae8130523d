/**
 * Base class for errors raised by the crawler itself (never for a failed page fetch)
 */
export class CrawlerError extends Error {
  readonly isOperational: boolean = true;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid crawl options or environment configuration
 */
export class ConfigurationError extends CrawlerError {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
  }
}

/**
 * The fetch mechanism could not start a session for a domain (browser failed to launch, etc.)
 */
export class FetcherInitError extends CrawlerError {
  constructor(readonly domain: string, cause: unknown) {
    super(`Failed to initialize fetcher for ${domain}: ${cause instanceof Error ? cause.message : String(cause)}`);
  }
}
