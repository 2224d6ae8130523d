import { FetchOptions, FetchResult, FetchStrategy } from './types';

/**
 * Interface for page retrieval strategies.
 * Implementations provide different ways to obtain a page's HTML, such as a
 * plain HTTP client or a headless browser that renders and scrolls the page.
 */
export interface IPageFetcher {
  /**
   * Strategy implemented by this fetcher
   */
  readonly strategy: FetchStrategy;

  /**
   * Prepare a session for a domain (browser context, connection pool, ...)
   * @throws FetcherInitError when the mechanism cannot start
   */
  open(domain: string): Promise<void>;

  /**
   * Retrieve a page. Failures are returned, not thrown.
   */
  fetch(url: string, options: FetchOptions): Promise<FetchResult>;

  /**
   * Release the session of a domain once its crawl is over
   */
  close(domain: string): Promise<void>;

  /**
   * Clean up all resources used by the fetcher
   */
  cleanup(): Promise<void>;
}
