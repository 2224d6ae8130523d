import { CrawlProgress, CrawlResult, CrawlTask, CrawlerState } from './types';

/**
 * Interface for crawler implementations that drive a crawl to completion
 */
export interface ICrawler {
  /**
   * Crawl from the given seed tasks until every domain is done or shutdown is requested
   * @returns The product URLs found per domain; never rejects because of fetch failures
   */
  run(seedTasks: CrawlTask[]): Promise<CrawlResult>;

  /**
   * Ask the crawl to stop. Cooperative: in-flight fetches are allowed to finish.
   */
  shutdown(): void;

  getState(): CrawlerState;

  getProgress(): CrawlProgress;
}
