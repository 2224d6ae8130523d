import { CrawlResult, DomainReport } from './types';

/**
 * Read-only access to what a crawl has found so far
 */
export interface IResultCollector {
  /**
   * Product URLs per domain at call time
   */
  snapshot(): CrawlResult;

  /**
   * Status and counters per domain at call time
   */
  getDomainReports(): DomainReport[];
}
